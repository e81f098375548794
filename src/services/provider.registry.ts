import type { TranscriptionPort } from './ports/transcription.port';
import type { DiarizationPort } from './ports/diarization.port';
import type { PipelineConfig } from '../config/pipeline.config';
import { OpenAITranscriptionAdapter } from '../adapters/transcription.openai';
import { PyannoteDiarizationAdapter } from '../adapters/diarization.pyannote';
import { ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';

// With a provider switched off only cached transcripts can be processed
const disabledTranscription: TranscriptionPort = {
  async transcribeFile(audioPath) {
    logger.warn('transcription.provider.disabled_invoked', { audioPath });
    throw new ProviderError('transcription', 'provider is disabled (TRANSCRIPTION_PROVIDER=off)');
  },
};

const disabledDiarization: DiarizationPort = {
  async diarizeFile(audioPath) {
    logger.warn('diarization.provider.disabled_invoked', { audioPath });
    throw new ProviderError('diarization', 'provider is disabled (DIARIZATION_PROVIDER=off)');
  },
};

let transcriptionOverride: TranscriptionPort | undefined;
let diarizationOverride: DiarizationPort | undefined;

export function setTranscriptionProviderOverride(provider: TranscriptionPort): void {
  transcriptionOverride = provider;
}

export function setDiarizationProviderOverride(provider: DiarizationPort): void {
  diarizationOverride = provider;
}

export function clearProviderOverrides(): void {
  transcriptionOverride = undefined;
  diarizationOverride = undefined;
}

export function getTranscriptionProvider(config: PipelineConfig['transcription']): TranscriptionPort {
  if (transcriptionOverride) return transcriptionOverride;
  switch (config.provider) {
    case 'off':
      return disabledTranscription;
    case 'openai':
      return new OpenAITranscriptionAdapter({
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
  }
}

export function getDiarizationProvider(config: PipelineConfig['diarization']): DiarizationPort {
  if (diarizationOverride) return diarizationOverride;
  switch (config.provider) {
    case 'off':
      return disabledDiarization;
    case 'pyannote':
      return new PyannoteDiarizationAdapter({
        apiKey: config.apiKey,
        pollIntervalMs: config.pollIntervalMs,
        jobTimeoutMs: config.jobTimeoutMs,
      });
  }
}
