import { promises as dnsPromises } from 'dns';
import net from 'net';
import { attributeAsns } from './asn/attribute';
import type { AsnLookup } from './asn/table';
import { createDefaultCache, type CacheAdapter } from './cache';
import { CONFIG } from './config';
import { normalizeDomain } from './domain';
import logger from './logger';
import { abortable } from './net/timeout';
import type { NameServerInfo } from './types';

/** The subset of `dns.promises.Resolver` the lookups need. */
export interface DnsResolver {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveCname(hostname: string): Promise<string[]>;
  resolveNs(hostname: string): Promise<string[]>;
}

/** What the enrichment pipeline asks of DNS. Every query yields `undefined` instead of failing. */
export interface RecordLookups {
  queryAddresses(host: string, signal?: AbortSignal): Promise<string[] | undefined>;
  queryCname(host: string, signal?: AbortSignal): Promise<string[] | undefined>;
  queryNameServers(domain: string, signal?: AbortSignal): Promise<NameServerInfo | undefined>;
}

/** Keep the entries of a comma-separated list that parse as IPv4/IPv6 addresses. */
export function parseIpList(list: string): string[] {
  return list
    .split(',')
    .map((s) => s.trim())
    .filter((s) => net.isIP(s) !== 0);
}

/**
 * Resolver on the given comma-separated name servers (port 53), or on
 * `CONFIG.DEFAULT_DNS_SERVERS` when none is given or none parses.
 */
export function createResolver(customDns?: string): DnsResolver {
  const resolver = new dnsPromises.Resolver({ timeout: CONFIG.DNS_TIMEOUT_MS, tries: CONFIG.DNS_TRIES });
  const custom = customDns ? parseIpList(customDns) : [];
  if (customDns && custom.length === 0) {
    logger.warn({ dns: customDns }, 'no usable name server in custom DNS list, using defaults');
  }
  const servers = custom.length > 0 ? custom : CONFIG.DEFAULT_DNS_SERVERS;
  resolver.setServers(servers);
  logger.debug({ servers }, 'DNS resolver ready');
  return resolver;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

function normalizeName(name: string): string {
  try {
    return normalizeDomain(name);
  } catch {
    return name.toLowerCase();
  }
}

export interface DnsLookupOptions {
  /** NS host → addresses. Defaults to Redis when REDIS_URL is set, otherwise in-process LRU. */
  cache?: CacheAdapter<string, string[]>;
  nsHostTtlMs?: number;
}

export class DnsLookupService implements RecordLookups {
  private readonly cache: CacheAdapter<string, string[]>;
  private readonly nsHostTtlMs: number;

  constructor(
    private readonly resolver: DnsResolver,
    private readonly asnTable: AsnLookup,
    opts?: DnsLookupOptions,
  ) {
    this.nsHostTtlMs = opts?.nsHostTtlMs ?? CONFIG.TTL.NS_HOST_MS;
    this.cache = opts?.cache ?? createDefaultCache({ isValue: isStringArray, ttl: this.nsHostTtlMs });
  }

  async queryAddresses(host: string, signal?: AbortSignal): Promise<string[] | undefined> {
    const [v4, v6] = await Promise.all([
      this.query('A', host, () => this.resolver.resolve4(host), signal),
      this.query('AAAA', host, () => this.resolver.resolve6(host), signal),
    ]);
    const ips = unique([...(v4 ?? []), ...(v6 ?? [])]);
    return ips.length > 0 ? ips : undefined;
  }

  async queryCname(host: string, signal?: AbortSignal): Promise<string[] | undefined> {
    return this.query('CNAME', host, () => this.resolver.resolveCname(host), signal);
  }

  async queryNameServers(domain: string, signal?: AbortSignal): Promise<NameServerInfo | undefined> {
    const answers = await this.query('NS', domain, () => this.resolver.resolveNs(domain), signal);
    if (!answers) return undefined;

    const names = unique(answers.map(normalizeName));
    const perHost = await Promise.all(names.map((name) => this.nameServerAddresses(name, signal)));
    const info: NameServerInfo = { names };
    const ips = unique(perHost.flat());
    if (ips.length > 0) {
      info.ips = ips;
      const asn = attributeAsns(ips, this.asnTable);
      if (asn) info.asn = asn;
    }
    return info;
  }

  private async nameServerAddresses(name: string, signal?: AbortSignal): Promise<string[]> {
    const key = `nshost:${name}`;
    const cached = await this.cache.get(key);
    if (cached) return cached;

    const ips = (await this.queryAddresses(name, signal)) ?? [];
    if (ips.length > 0) await this.cache.set(key, ips, this.nsHostTtlMs);
    return ips;
  }

  private async query(
    rrtype: string,
    host: string,
    run: () => Promise<string[]>,
    signal?: AbortSignal,
  ): Promise<string[] | undefined> {
    if (signal?.aborted) return undefined;
    try {
      const answers = await abortable(run(), signal);
      return answers.length > 0 ? answers : undefined;
    } catch (err) {
      // NXDOMAIN, NODATA, timeouts and aborts all read as "no answer"
      logger.debug({ err, host, rrtype }, 'DNS query failed');
      return undefined;
    }
  }
}

export default DnsLookupService;
