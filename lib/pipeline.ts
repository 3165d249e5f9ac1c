import { attributeAsns } from './asn/attribute';
import type { AsnLookup } from './asn/table';
import type { RecordLookups } from './dns';
import { extractDomain, extractHostname } from './domain';
import { EnrichmentError } from './errors';
import logger from './logger';
import { incRecord, incTlsProbeFailure, observePipelineDuration } from './metrics';
import { TimeoutError, withTimeout } from './net/timeout';
import type {
  AsnInfo,
  CertificateIssuerInfo,
  EnrichedRecord,
  EnrichmentResult,
  NameServerInfo,
  OriginRecord,
  TlsMode,
} from './types';

export type TlsProbe = (hostname: string, ips: string[], signal: AbortSignal) => Promise<CertificateIssuerInfo>;

/** Shared, read-only collaborators of every pipeline run. */
export interface EnrichmentContext {
  dns: RecordLookups;
  asnTable: AsnLookup;
  probeTls: TlsProbe;
  tlsMode: TlsMode;
  timeoutMs: number;
}

/** Mutable accumulator, one per run; `freeze()` produces the emitted record. */
class EnrichmentDraft {
  domain?: string;
  cname?: string[];
  nameservers?: NameServerInfo;
  ip?: string[];
  asn?: AsnInfo[];
  tls?: CertificateIssuerInfo;

  constructor(
    readonly origin: OriginRecord,
    readonly hostname: string,
  ) {}

  freeze(): EnrichedRecord {
    const record: EnrichedRecord = { origin: this.origin, hostname: this.hostname };
    if (this.domain !== undefined) record.domain = this.domain;
    if (this.cname !== undefined) record.cname = this.cname;
    if (this.nameservers !== undefined) record.nameservers = this.nameservers;
    if (this.ip !== undefined) record.ip = this.ip;
    if (this.asn !== undefined) record.asn = this.asn;
    if (this.tls !== undefined) record.tls = this.tls;
    return Object.freeze(record);
  }
}

export function shouldProbeTls(mode: TlsMode, origin: string): boolean {
  if (mode === 'never') return false;
  if (mode === 'always') return true;
  try {
    return new URL(origin.trim()).protocol === 'https:';
  } catch {
    return false;
  }
}

async function runStages(origin: OriginRecord, ctx: EnrichmentContext, signal: AbortSignal): Promise<EnrichedRecord> {
  // parse: the only stage whose failure ends the record
  const hostname = extractHostname(origin.origin);
  const draft = new EnrichmentDraft(origin, hostname);

  const domain = extractDomain(hostname);
  if (domain) {
    draft.domain = domain;
  } else {
    logger.warn({ hostname }, 'could not extract registrable domain, skipping name servers');
  }

  const [ips, cname, nameservers] = await Promise.all([
    ctx.dns.queryAddresses(hostname, signal),
    ctx.dns.queryCname(hostname, signal),
    domain ? ctx.dns.queryNameServers(domain, signal) : Promise.resolve(undefined),
  ]);
  signal.throwIfAborted();
  draft.ip = ips;
  draft.cname = cname;
  draft.nameservers = nameservers;

  if (ips) {
    draft.asn = attributeAsns(ips, ctx.asnTable);

    if (shouldProbeTls(ctx.tlsMode, origin.origin)) {
      try {
        draft.tls = await ctx.probeTls(hostname, ips, signal);
      } catch (err) {
        signal.throwIfAborted();
        const error = EnrichmentError.from(err, 'TlsHandshakeFailure');
        incTlsProbeFailure(error.kind);
        logger.warn({ err: error, hostname }, 'TLS issuer probe failed');
      }
    }
  }

  return draft.freeze();
}

/**
 * Enrich one record. Never rejects: parse failures, timeouts and unexpected
 * errors come back as `{ ok: false }`; lookup failures only leave fields out.
 */
export async function enrichRecord(origin: OriginRecord, ctx: EnrichmentContext): Promise<EnrichmentResult> {
  const started = Date.now();
  const controller = new AbortController();

  let result: EnrichmentResult;
  try {
    const record = await withTimeout(runStages(origin, ctx, controller.signal), ctx.timeoutMs, () =>
      controller.abort(new TimeoutError(ctx.timeoutMs)),
    );
    result = { ok: true, record };
  } catch (err) {
    const error =
      err instanceof TimeoutError
        ? new EnrichmentError('Timeout', `enrichment of ${origin.origin} timed out after ${ctx.timeoutMs}ms`, {
            cause: err,
          })
        : EnrichmentError.from(err);
    result = { ok: false, origin, error };
  }

  observePipelineDuration((Date.now() - started) / 1000);
  if (result.ok) incRecord('success');
  else incRecord('error', result.error.kind);
  return result;
}

export default enrichRecord;
