import type { TranscriptSegment } from '../../types/dialogue.types';

export interface TranscriptionPort {
  /** Chronological text segments for the whole recording. */
  transcribeFile(audioPath: string): Promise<TranscriptSegment[]>;
}
