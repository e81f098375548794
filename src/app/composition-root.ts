import type { PipelineConfig } from '../config/pipeline.config';
import type { SpeakerProfile } from '../types/dialogue.types';
import { RecordingPipelineService } from '../services/recording-pipeline.service';
import { BatchRunnerService } from '../services/batch-runner.service';
import { getDiarizationProvider, getTranscriptionProvider } from '../services/provider.registry';
import { buildSpeakerProfile, loadRecordingsFile } from '../services/speaker-profile.service';
import type { RecordingConfig } from '../utils/zod-schemas/recordings-config.schema';

export interface ResolvedRecording {
  id: string;
  audioFile: string;
  profile?: SpeakerProfile;
  /** Set when the speaker configuration is invalid; fails only this recording. */
  profileError?: Error;
}

export interface CompositionRoot {
  config: PipelineConfig;
  pipeline: RecordingPipelineService;
  batchRunner: BatchRunnerService;
  recordings(): ResolvedRecording[];
}

function resolveRecording(recording: RecordingConfig): ResolvedRecording {
  // Recordings without an explicit file use "<id>.mp3"
  const resolved: ResolvedRecording = { id: recording.id, audioFile: recording.audioFile ?? `${recording.id}.mp3` };
  if (!recording.speakers) return resolved;
  try {
    resolved.profile = buildSpeakerProfile(recording.speakers);
  } catch (err) {
    resolved.profileError = err instanceof Error ? err : new Error(String(err));
  }
  return resolved;
}

export function createCompositionRoot(config: PipelineConfig): CompositionRoot {
  const pipeline = new RecordingPipelineService(
    {
      outputDir: config.outputDir,
      windowSize: config.windowSize,
      partnerPrefix: config.partnerPrefix,
      lineJoin: config.lineJoin,
      outputFormat: config.outputFormat,
    },
    {
      transcription: getTranscriptionProvider(config.transcription),
      diarization: getDiarizationProvider(config.diarization),
    }
  );

  return {
    config,
    pipeline,
    batchRunner: new BatchRunnerService({ concurrency: config.batchConcurrency }),
    recordings: () => loadRecordingsFile(config.recordingsConfigPath).recordings.map(resolveRecording),
  };
}
