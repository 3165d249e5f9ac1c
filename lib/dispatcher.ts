import { EnrichmentError } from './errors';
import logger from './logger';
import { incRecord } from './metrics';
import type { BoundedChannel } from './net/channel';
import pLimit from './net/pLimit';
import type { EnrichmentResult, InputRow, OriginRecord } from './types';

export type Enricher = (record: OriginRecord) => Promise<EnrichmentResult>;

export interface DispatchOptions {
  concurrency: number;
}

export interface DispatchSummary {
  dispatched: number;
  invalidRows: number;
}

/**
 * Fan rows out to `enrich`, at most `concurrency` at a time, and deliver
 * exactly one result per row to `channel`. Rows stop being pulled while
 * `concurrency` tasks wait for a permit. The channel is closed once every
 * started task has delivered, including when `rows` throws.
 */
export async function dispatchRecords(
  rows: AsyncIterable<InputRow> | Iterable<InputRow>,
  enrich: Enricher,
  channel: BoundedChannel<EnrichmentResult>,
  opts: DispatchOptions,
): Promise<DispatchSummary> {
  const limit = pLimit(opts.concurrency);
  const inflight = new Set<Promise<void>>();
  const failures: unknown[] = [];
  let dispatched = 0;
  let invalidRows = 0;

  const runOne = async (record: OriginRecord): Promise<void> => {
    let result: EnrichmentResult;
    try {
      result = await enrich(record);
    } catch (err) {
      result = { ok: false, origin: record, error: EnrichmentError.from(err) };
    }
    // the permit is held until the result is accepted, so a full channel slows the readers
    await channel.send(result);
  };

  try {
    for await (const row of rows) {
      if (failures.length > 0) break;

      if (!row.ok) {
        invalidRows++;
        logger.warn({ line: row.line, reason: row.reason }, 'skipping invalid input row');
        incRecord('error', 'InvalidRecord');
        await channel.send({
          ok: false,
          origin: row.raw,
          error: new EnrichmentError('InvalidRecord', `line ${row.line}: ${row.reason}`),
        });
        continue;
      }

      dispatched++;
      const task: Promise<void> = limit(() => runOne(row.record))
        .catch((err: unknown) => {
          failures.push(err);
        })
        .finally(() => {
          inflight.delete(task);
        });
      inflight.add(task);

      while (limit.pendingCount() >= opts.concurrency) {
        await Promise.race(inflight);
      }
    }
  } finally {
    await Promise.all(inflight);
    channel.close();
  }

  if (failures.length > 0) throw failures[0];
  logger.debug({ dispatched, invalidRows }, 'dispatch complete');
  return { dispatched, invalidRows };
}

export default dispatchRecords;
