import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { formatZodIssues } from '../utils/zod-schemas/recordings-config.schema';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const PipelineEnvSchema = z.object({
  RECORDINGS_CONFIG: z.string().min(1).default('config/recordings.json'),
  RECORDINGS_DIR: z.string().min(1).default('.'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  WINDOW_SIZE: z.coerce.number().int().positive().default(5),
  PARTNER_PREFIX_POLICY: z.enum(['alwaysPrefix', 'prefixOnChange']).default('prefixOnChange'),
  LINE_JOIN_POLICY: z.enum(['newlineJoin', 'spaceJoin']).default('spaceJoin'),
  OUTPUT_FORMAT: z.enum(['json', 'jsonl']).default('jsonl'),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(1),
  TRANSCRIPTION_PROVIDER: z.enum(['openai', 'off']).default('openai'),
  OPENAI_API_KEY: optionalString,
  OPENAI_TRANSCRIBE_MODEL: z.string().min(1).default('whisper-1'),
  OPENAI_TRANSCRIBE_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  DIARIZATION_PROVIDER: z.enum(['pyannote', 'off']).default('pyannote'),
  PYANNOTE_API_KEY: optionalString,
  PYANNOTE_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
  PYANNOTE_JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(1_800_000),
  MERGE_OUTPUT: z.string().min(1).default('train.jsonl'),
  METRICS_FILE: optionalString,
});

export type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

export interface PipelineConfig {
  recordingsConfigPath: string;
  recordingsDir: string;
  outputDir: string;
  windowSize: number;
  partnerPrefix: PipelineEnv['PARTNER_PREFIX_POLICY'];
  lineJoin: PipelineEnv['LINE_JOIN_POLICY'];
  outputFormat: PipelineEnv['OUTPUT_FORMAT'];
  batchConcurrency: number;
  mergeOutput: string;
  metricsFile?: string;
  transcription: {
    provider: PipelineEnv['TRANSCRIPTION_PROVIDER'];
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  diarization: {
    provider: PipelineEnv['DIARIZATION_PROVIDER'];
    apiKey?: string;
    pollIntervalMs: number;
    jobTimeoutMs: number;
  };
}

// Blank values in .env files mean "use the default"
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function parsePipelineConfig(env: NodeJS.ProcessEnv): PipelineConfig {
  const parsed = PipelineEnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigurationError('invalid pipeline environment', formatZodIssues(parsed.error));
  }
  const e = parsed.data;
  return {
    recordingsConfigPath: e.RECORDINGS_CONFIG,
    recordingsDir: e.RECORDINGS_DIR,
    outputDir: e.OUTPUT_DIR,
    windowSize: e.WINDOW_SIZE,
    partnerPrefix: e.PARTNER_PREFIX_POLICY,
    lineJoin: e.LINE_JOIN_POLICY,
    outputFormat: e.OUTPUT_FORMAT,
    batchConcurrency: e.BATCH_CONCURRENCY,
    mergeOutput: e.MERGE_OUTPUT,
    metricsFile: e.METRICS_FILE,
    transcription: {
      provider: e.TRANSCRIPTION_PROVIDER,
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_TRANSCRIBE_MODEL,
      timeoutMs: e.OPENAI_TRANSCRIBE_TIMEOUT_MS,
    },
    diarization: {
      provider: e.DIARIZATION_PROVIDER,
      apiKey: e.PYANNOTE_API_KEY,
      pollIntervalMs: e.PYANNOTE_POLL_INTERVAL_MS,
      jobTimeoutMs: e.PYANNOTE_JOB_TIMEOUT_MS,
    },
  };
}

let cached: PipelineConfig | undefined;

/** Loads .env once and validates the process environment. */
export function getPipelineConfig(): PipelineConfig {
  if (cached) return cached;
  loadDotenv();
  cached = parsePipelineConfig(process.env);
  return cached;
}

export function resetPipelineConfigCache(): void {
  cached = undefined;
}
