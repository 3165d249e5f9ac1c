import { CONFIG } from './config';
import logger from './logger';
import type { EnrichmentResult } from './types';

export interface SinkSummary {
  succeeded: number;
  failed: number;
}

/** One JSON document per result; failures keep the origin next to the error. */
export function serializeResult(result: EnrichmentResult): string {
  if (result.ok) return JSON.stringify(result.record);
  return JSON.stringify({ origin: result.origin, error: result.error.toJSON() });
}

/**
 * Single consumer of the result channel. Writes newline-delimited JSON to
 * `output` and honours its backpressure.
 */
export class ResultSink {
  private succeeded = 0;
  private failed = 0;

  constructor(
    private readonly output: NodeJS.WritableStream = process.stdout,
    private readonly progressEvery: number = CONFIG.PROGRESS_EVERY,
  ) {}

  async drain(results: AsyncIterable<EnrichmentResult>): Promise<SinkSummary> {
    for await (const result of results) {
      if (result.ok) {
        this.succeeded++;
      } else {
        this.failed++;
        const origin = typeof result.origin === 'string' ? result.origin : result.origin.origin;
        logger.error({ err: result.error, origin }, 'record enrichment failed');
      }
      await this.write(serializeResult(result) + '\n');

      const total = this.succeeded + this.failed;
      if (this.progressEvery > 0 && total % this.progressEvery === 0) {
        logger.info({ processed: total, succeeded: this.succeeded, failed: this.failed }, 'progress');
      }
    }
    return { succeeded: this.succeeded, failed: this.failed };
  }

  private write(line: string): Promise<void> {
    if (this.output.write(line)) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        this.output.removeListener('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        this.output.removeListener('drain', onDrain);
        reject(err);
      };
      this.output.once('drain', onDrain);
      this.output.once('error', onError);
    });
  }
}

export default ResultSink;
