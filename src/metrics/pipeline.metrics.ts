import * as client from 'prom-client';

export function getRecordingsCounter() {
  const existing = client.register.getSingleMetric('pipeline_recordings_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'pipeline_recordings_total',
    help: 'Recordings handled by a batch run',
    labelNames: ['status'] as const, // status = succeeded | skipped | failed
  });
}

export function getDegenerateSegmentsCounter() {
  const existing = client.register.getSingleMetric('alignment_degenerate_segments_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'alignment_degenerate_segments_total',
    help: 'Transcript segments with end <= start routed to midpoint matching',
  });
}

export function getMidpointFallbackCounter() {
  const existing = client.register.getSingleMetric('alignment_midpoint_fallback_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'alignment_midpoint_fallback_total',
    help: 'Transcript segments labeled by nearest speaker midpoint',
  });
}

export function getUnmappedUtterancesCounter() {
  const existing = client.register.getSingleMetric('grouping_unmapped_utterances_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'grouping_unmapped_utterances_total',
    help: 'Utterances dropped because their speaker is not in the speaker profile',
  });
}

export function getWindowsEmittedCounter() {
  const existing = client.register.getSingleMetric('windows_emitted_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'windows_emitted_total',
    help: 'Conversation windows written to training artifacts',
  });
}

export function getProviderLatencyHistogram() {
  const existing = client.register.getSingleMetric('provider_latency_ms') as client.Histogram<string> | undefined;
  if (existing) return existing;
  return new client.Histogram({
    name: 'provider_latency_ms',
    help: 'Latency of transcription and diarization provider calls',
    labelNames: ['provider'] as const,
    buckets: [1000, 5000, 15000, 60000, 180000, 600000, 1800000],
  });
}

export function getProviderStatusCounter() {
  const existing = client.register.getSingleMetric('provider_status_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'provider_status_total',
    help: 'HTTP status codes returned by providers',
    labelNames: ['provider', 'status'] as const,
  });
}

export async function renderMetrics(): Promise<string> {
  return client.register.metrics();
}
