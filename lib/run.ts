import { openAsnDatabase } from './asn/database';
import { CONFIG } from './config';
import { dispatchRecords, type DispatchSummary } from './dispatcher';
import { DnsLookupService, createResolver } from './dns';
import logger from './logger';
import { BoundedChannel } from './net/channel';
import { enrichRecord, type EnrichmentContext } from './pipeline';
import { ResultSink, type SinkSummary } from './sink';
import { probeCertificateIssuer } from './tls';
import type { EnrichmentResult, InputRow, TlsMode } from './types';

export interface ContextOptions {
  /** Comma-separated name server IPs. */
  dns?: string;
  timeoutMs?: number;
  tlsMode?: TlsMode;
  asnDbPath?: string;
  asnDbUrl?: string;
}

/**
 * Build the per-process collaborators. Fails when the ASN database cannot be
 * obtained or the resolver cannot be configured.
 */
export async function createEnrichmentContext(opts: ContextOptions = {}): Promise<EnrichmentContext> {
  const asnTable = await openAsnDatabase({ path: opts.asnDbPath, url: opts.asnDbUrl });
  const resolver = createResolver(opts.dns);
  return {
    dns: new DnsLookupService(resolver, asnTable),
    asnTable,
    probeTls: (hostname, ips, signal) => probeCertificateIssuer(hostname, ips, { signal }),
    tlsMode: opts.tlsMode ?? 'auto',
    timeoutMs: opts.timeoutMs ?? CONFIG.PIPELINE_TIMEOUT_MS,
  };
}

export interface RunOptions {
  rows: AsyncIterable<InputRow> | Iterable<InputRow>;
  context: EnrichmentContext;
  concurrency?: number;
  output?: NodeJS.WritableStream;
}

export type RunSummary = DispatchSummary & SinkSummary;

/** Source → dispatcher → channel → sink; resolves once every result is written. */
export async function runEnrichment(opts: RunOptions): Promise<RunSummary> {
  const concurrency = opts.concurrency ?? CONFIG.CONCURRENCY.DEFAULT;
  const channel = new BoundedChannel<EnrichmentResult>(concurrency);
  const sink = new ResultSink(opts.output);

  const [drained, dispatched] = await Promise.allSettled([
    // a dead sink closes the channel so producers stop instead of waiting forever
    sink.drain(channel).catch((err: unknown) => {
      channel.close();
      throw err;
    }),
    dispatchRecords(opts.rows, (record) => enrichRecord(record, opts.context), channel, { concurrency }),
  ]);
  if (drained.status === 'rejected') throw drained.reason;
  if (dispatched.status === 'rejected') throw dispatched.reason;

  const summary: RunSummary = { ...dispatched.value, ...drained.value };
  logger.info(summary, 'enrichment run finished');
  return summary;
}

export default runEnrichment;
