import Bottleneck from 'bottleneck';
import fs from 'fs';
import { getRecordingsCounter } from '../metrics/pipeline.metrics';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';

export interface BatchJob {
  id: string;
  /** File the job reads; a missing file marks the job as skipped. */
  inputPath: string;
}

export interface BatchFailure {
  id: string;
  error: string;
}

export interface BatchSummary<R> {
  total: number;
  succeeded: string[];
  skipped: string[];
  failed: BatchFailure[];
  results: Map<string, R>;
}

type Outcome<R> =
  | { status: 'succeeded'; result: R }
  | { status: 'skipped' }
  | { status: 'failed'; error: string };

export interface BatchRunnerOptions {
  concurrency?: number;
  logger?: Logger;
}

/**
 * Runs independent jobs with bounded concurrency. A job that throws is
 * recorded as failed and never stops the rest of the batch.
 */
export class BatchRunnerService {
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(options: BatchRunnerOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.log = options.logger ?? rootLogger;
  }

  async run<J extends BatchJob, R>(jobs: readonly J[], handler: (job: J) => Promise<R>): Promise<BatchSummary<R>> {
    const limiter = new Bottleneck({ maxConcurrent: this.concurrency, minTime: 0 });
    const counter = getRecordingsCounter();
    this.log.info('batch.started', { jobs: jobs.length, concurrency: this.concurrency });

    const outcomes = await Promise.all(
      jobs.map((job) => limiter.schedule(() => this.runOne(job, handler)))
    );

    const summary: BatchSummary<R> = { total: jobs.length, succeeded: [], skipped: [], failed: [], results: new Map() };
    outcomes.forEach((outcome, i) => {
      const id = jobs[i].id;
      counter.inc({ status: outcome.status });
      if (outcome.status === 'succeeded') {
        summary.succeeded.push(id);
        summary.results.set(id, outcome.result);
      } else if (outcome.status === 'skipped') {
        summary.skipped.push(id);
      } else {
        summary.failed.push({ id, error: outcome.error });
      }
    });

    this.log.info('batch.summary', {
      total: summary.total,
      succeeded: summary.succeeded.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
      succeededIds: summary.succeeded,
      skippedIds: summary.skipped,
      failures: summary.failed,
    });
    return summary;
  }

  private async runOne<J extends BatchJob, R>(job: J, handler: (job: J) => Promise<R>): Promise<Outcome<R>> {
    if (!fs.existsSync(job.inputPath)) {
      this.log.warn('batch.job.skipped_missing_input', { id: job.id, inputPath: job.inputPath });
      return { status: 'skipped' };
    }
    const started = Date.now();
    try {
      const result = await handler(job);
      this.log.info('batch.job.succeeded', { id: job.id, durationMs: Date.now() - started });
      return { status: 'succeeded', result };
    } catch (err) {
      // Partial output of the failed job stays on disk
      this.log.error('batch.job.failed', { id: job.id, error: errorMessage(err), durationMs: Date.now() - started });
      return { status: 'failed', error: errorMessage(err) };
    }
  }
}
