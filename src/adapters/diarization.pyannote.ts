import axios, { AxiosInstance } from 'axios';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { SpeakerSegment, SpeakerTag } from '../types/dialogue.types';
import type { DiarizationPort } from '../services/ports/diarization.port';
import { getProviderLatencyHistogram } from '../metrics/pipeline.metrics';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, sendWithRetry, sleep, type RetryPolicy } from './http-retry.util';

const PROVIDER = 'pyannote';
const DEFAULT_BASE_URL = 'https://api.pyannote.ai/v1';

const MediaInputResponseSchema = z.object({ url: z.string().url() });
const DiarizeResponseSchema = z.object({ jobId: z.string().min(1) });
const JobResponseSchema = z.object({
  jobId: z.string().optional(),
  status: z.string(),
  output: z
    .object({
      diarization: z
        .array(z.object({ speaker: z.string(), start: z.number(), end: z.number() }))
        .optional(),
      error: z.string().optional(),
    })
    .nullish(),
});

const TERMINAL_FAILURES = new Set(['failed', 'canceled']);

export interface PyannoteDiarizationOptions {
  apiKey?: string;
  baseUrl?: string;
  pollIntervalMs?: number;
  jobTimeoutMs?: number;
  requestTimeoutMs?: number;
  retry?: RetryPolicy;
  http?: AxiosInstance;
}

/** "SPEAKER_07" -> 7 so labels read "Speaker 7"; anything else is kept as a string tag. */
export function toSpeakerTag(speaker: string): SpeakerTag {
  const m = /^SPEAKER_(\d+)$/.exec(speaker);
  return m ? parseInt(m[1], 10) : speaker;
}

export function mediaKeyFor(audioPath: string): string {
  const base = path.basename(audioPath).replace(/[^A-Za-z0-9._-]/g, '_');
  return `media://session-dialogue/${base}`;
}

/**
 * pyannoteAI job client: uploads the recording to temporary media storage,
 * starts a diarization job and polls it to completion.
 */
export class PyannoteDiarizationAdapter implements DiarizationPort {
  private readonly http: AxiosInstance;
  private readonly latency = getProviderLatencyHistogram();

  constructor(private readonly options: PyannoteDiarizationOptions = {}) {
    this.http =
      options.http ??
      axios.create({ baseURL: options.baseUrl ?? DEFAULT_BASE_URL, timeout: options.requestTimeoutMs ?? 60_000 });
  }

  async diarizeFile(audioPath: string): Promise<SpeakerSegment[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ProviderError(PROVIDER, 'PYANNOTE_API_KEY is not configured');
    }
    const headers = { Authorization: `Bearer ${apiKey}` };
    const retry = this.options.retry ?? DEFAULT_RETRY_POLICY;
    const stopTimer = this.latency.startTimer({ provider: PROVIDER });

    try {
      const mediaUrl = mediaKeyFor(audioPath);
      const upload = await sendWithRetry(PROVIDER, 'media_input', () =>
        this.http.post('/media/input', { url: mediaUrl }, { headers, validateStatus: () => true }), retry);
      const presigned = MediaInputResponseSchema.safeParse(upload.data);
      if (!presigned.success) throw new ProviderError(PROVIDER, 'media input response has no upload url');

      const audio = await fs.promises.readFile(audioPath);
      await sendWithRetry(PROVIDER, 'media_upload', () =>
        this.http.put(presigned.data.url, audio, {
          headers: { 'Content-Type': 'application/octet-stream' },
          maxBodyLength: Infinity,
          validateStatus: () => true,
        }), retry);

      const started = await sendWithRetry(PROVIDER, 'diarize', () =>
        this.http.post('/diarize', { url: mediaUrl }, { headers, validateStatus: () => true }), retry);
      const job = DiarizeResponseSchema.safeParse(started.data);
      if (!job.success) throw new ProviderError(PROVIDER, 'diarize response has no jobId');

      logger.info('diarization.job_started', { provider: PROVIDER, jobId: job.data.jobId, file: path.basename(audioPath) });
      const segments = await this.pollJob(job.data.jobId, headers, retry);
      logger.info('diarization.completed', { provider: PROVIDER, jobId: job.data.jobId, segments: segments.length });
      return segments;
    } finally {
      stopTimer();
    }
  }

  private async pollJob(jobId: string, headers: Record<string, string>, retry: RetryPolicy): Promise<SpeakerSegment[]> {
    const pollIntervalMs = this.options.pollIntervalMs ?? 5_000;
    const deadline = Date.now() + (this.options.jobTimeoutMs ?? 1_800_000);

    for (let iteration = 1; ; iteration++) {
      const resp = await sendWithRetry(PROVIDER, 'job_status', () =>
        this.http.get(`/jobs/${encodeURIComponent(jobId)}`, { headers, validateStatus: () => true }), retry);
      const parsed = JobResponseSchema.safeParse(resp.data);
      if (!parsed.success) throw new ProviderError(PROVIDER, `job ${jobId} returned an unexpected status payload`);

      const { status, output } = parsed.data;
      if (status === 'succeeded') {
        return (output?.diarization ?? []).map((turn) => ({
          start: turn.start,
          end: turn.end,
          speakerTag: toSpeakerTag(turn.speaker),
        }));
      }
      if (TERMINAL_FAILURES.has(status)) {
        throw new ProviderError(PROVIDER, `job ${jobId} ${status}${output?.error ? `: ${output.error}` : ''}`);
      }
      if (Date.now() >= deadline) {
        throw new ProviderError(PROVIDER, `job ${jobId} did not finish before timeout (last status ${status})`);
      }
      logger.debug('diarization.job_pending', { jobId, status, iteration });
      await sleep(pollIntervalMs);
    }
  }
}
