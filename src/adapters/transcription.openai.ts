import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import FormData = require('form-data');
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { TranscriptSegment } from '../types/dialogue.types';
import type { TranscriptionPort } from '../services/ports/transcription.port';
import { getProviderLatencyHistogram } from '../metrics/pipeline.metrics';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, sendWithRetry, type RetryPolicy } from './http-retry.util';

const PROVIDER = 'openai';
const TRANSCRIPTIONS_URL = 'https://api.openai.com/v1/audio/transcriptions';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.mpga': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.wav': 'audio/wav',
  '.webm': 'audio/webm',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
};

const VerboseTranscriptionSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
      })
    )
    .default([]),
});

export interface OpenAITranscriptionOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  language?: string;
  maxConcurrent?: number;
  retry?: RetryPolicy;
  http?: AxiosInstance;
}

export function mimeForAudioFile(audioPath: string): string {
  return MIME_BY_EXTENSION[path.extname(audioPath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * OpenAI transcription client returning segment-level timestamps
 * (`verbose_json`). Calls are limited so parallel batch runs share the quota.
 */
export class OpenAITranscriptionAdapter implements TranscriptionPort {
  private readonly http: AxiosInstance;
  private readonly limiter: Bottleneck;
  private readonly latency = getProviderLatencyHistogram();

  constructor(private readonly options: OpenAITranscriptionOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 600_000 });
    this.limiter = new Bottleneck({ maxConcurrent: options.maxConcurrent ?? 2, minTime: 0 });
  }

  async transcribeFile(audioPath: string): Promise<TranscriptSegment[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ProviderError(PROVIDER, 'OPENAI_API_KEY is not configured');
    }
    const audio = await fs.promises.readFile(audioPath);
    const filename = path.basename(audioPath);
    const contentType = mimeForAudioFile(audioPath);

    return this.limiter.schedule(async () => {
      const stopTimer = this.latency.startTimer({ provider: PROVIDER });
      try {
        logger.info('transcription.request', { provider: PROVIDER, file: filename, bytes: audio.byteLength });
        const resp = await sendWithRetry(
          PROVIDER,
          'transcribe',
          () => {
            const form = new FormData();
            form.append('file', audio, { filename, contentType });
            form.append('model', this.options.model ?? 'whisper-1');
            form.append('response_format', 'verbose_json');
            form.append('timestamp_granularities[]', 'segment');
            if (this.options.language) form.append('language', this.options.language);
            return this.http.post(TRANSCRIPTIONS_URL, form, {
              headers: { Authorization: `Bearer ${apiKey}`, ...form.getHeaders() },
              maxBodyLength: Infinity,
              validateStatus: () => true,
            });
          },
          this.options.retry ?? DEFAULT_RETRY_POLICY
        );

        const parsed = VerboseTranscriptionSchema.safeParse(resp.data);
        if (!parsed.success) {
          throw new ProviderError(PROVIDER, 'unexpected transcription response shape', resp.status);
        }
        const segments = parsed.data.segments.map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }));
        logger.info('transcription.completed', {
          provider: PROVIDER,
          file: filename,
          segments: segments.length,
          duration: parsed.data.duration,
        });
        return segments;
      } finally {
        stopTimer();
      }
    });
  }
}
