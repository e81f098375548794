import type { SpeakerSegment } from '../../types/dialogue.types';

export interface DiarizationPort {
  /** Speaker turns in no particular order; turns may overlap. */
  diarizeFile(audioPath: string): Promise<SpeakerSegment[]>;
}
