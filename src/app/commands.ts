import fs from 'fs';
import path from 'path';
import type { CompositionRoot, ResolvedRecording } from './composition-root';
import type { BatchSummary } from '../services/batch-runner.service';
import type { RecordingResult } from '../services/recording-pipeline.service';
import { artifactPath, attributedTranscriptPath } from '../services/recording-pipeline.service';
import { mergeCorpusFiles, type MergeResult } from '../services/corpus-merge.service';
import { renderMetrics } from '../metrics/pipeline.metrics';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

interface RecordingJob {
  id: string;
  inputPath: string;
  recording: ResolvedRecording;
}

async function dumpMetrics(root: CompositionRoot): Promise<void> {
  const file = root.config.metricsFile;
  if (!file) return;
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, await renderMetrics(), 'utf-8');
  logger.info('metrics.written', { file });
}

/** Transcribe, diarize and align every configured recording. */
export async function runProcessCommand(root: CompositionRoot): Promise<BatchSummary<RecordingResult>> {
  const jobs: RecordingJob[] = root.recordings().map((recording) => ({
    id: recording.id,
    inputPath: path.join(root.config.recordingsDir, recording.audioFile),
    recording,
  }));

  const summary = await root.batchRunner.run(jobs, async (job) => {
    if (job.recording.profileError) throw job.recording.profileError;
    return root.pipeline.processRecording({
      id: job.id,
      audioPath: job.inputPath,
      profile: job.recording.profile,
    });
  });
  await dumpMetrics(root);
  return summary;
}

// `process` writes attributed transcripts to OUTPUT_DIR; hand-made ones may sit beside the recordings
function findAttributedTranscript(root: CompositionRoot, id: string): string {
  const produced = attributedTranscriptPath(root.config.outputDir, id);
  if (fs.existsSync(produced)) return produced;
  const provided = attributedTranscriptPath(root.config.recordingsDir, id);
  return fs.existsSync(provided) ? provided : produced;
}

/** Build training artifacts from already attributed transcripts. */
export async function runConvertCommand(root: CompositionRoot): Promise<BatchSummary<RecordingResult>> {
  const jobs: RecordingJob[] = root.recordings().map((recording) => ({
    id: recording.id,
    inputPath: findAttributedTranscript(root, recording.id),
    recording,
  }));

  const summary = await root.batchRunner.run(jobs, async (job) => {
    if (job.recording.profileError) throw job.recording.profileError;
    const profile = job.recording.profile;
    if (!profile) {
      throw new ConfigurationError(`no speaker configuration for recording ${job.id}`);
    }
    return root.pipeline.convertRecording({ id: job.id, attributedPath: job.inputPath, profile });
  });
  await dumpMetrics(root);
  return summary;
}

/** Merge every recording's JSONL windows into the training corpus. */
export function runMergeCommand(root: CompositionRoot): MergeResult {
  const sources = root.recordings().map((recording) => ({
    id: recording.id,
    path: artifactPath(root.config.outputDir, recording.id, 'jsonl'),
  }));
  return mergeCorpusFiles(sources, path.join(root.config.outputDir, root.config.mergeOutput));
}
