export * from './types/dialogue.types';
export {
  UNKNOWN_SPEAKER_LABEL,
  alignTranscript,
  findBestOverlap,
  findNearestMidpoint,
  formatSpeakerLabel,
  matchSpeaker,
  overlapScore,
} from './services/transcript-speaker-aligner.service';
export { groupUtterances } from './services/utterance-grouper.service';
export {
  DEFAULT_WINDOW_SIZE,
  buildWindows,
  findExchanges,
  toDialogueMessages,
} from './services/dialogue-windowizer.service';
export { buildSpeakerProfile, loadRecordingsFile } from './services/speaker-profile.service';
export { RecordingPipelineService } from './services/recording-pipeline.service';
export { BatchRunnerService } from './services/batch-runner.service';
export { mergeCorpusFiles } from './services/corpus-merge.service';
export type { TranscriptionPort } from './services/ports/transcription.port';
export type { DiarizationPort } from './services/ports/diarization.port';
export {
  formatAttributedLine,
  formatTranscriptRecords,
  parseAttributedTranscript,
  parseTranscriptRecords,
} from './utils/transcript-format.util';
export * from './utils/errors';
