export * from './types';
export * from './errors';
export { extractHostname, extractDomain, normalizeDomain, isValidHost } from './domain';
export { DnsLookupService, createResolver, parseIpList } from './dns';
export type { DnsResolver, RecordLookups, DnsLookupOptions } from './dns';
export { attributeAsns } from './asn/attribute';
export { AsnTable, AsnTableBuilder } from './asn/table';
export type { AsnLookup, AsnMatch } from './asn/table';
export { openAsnDatabase, loadAsnTable, downloadAsnDatabase } from './asn/database';
export { probeCertificateIssuer } from './tls';
export { enrichRecord, shouldProbeTls } from './pipeline';
export type { EnrichmentContext, TlsProbe } from './pipeline';
export { dispatchRecords } from './dispatcher';
export { ResultSink, serializeResult } from './sink';
export { readOriginRows } from './csv';
export { runEnrichment, createEnrichmentContext } from './run';
export type { RunOptions, RunSummary, ContextOptions } from './run';
export { BoundedChannel, ChannelClosedError } from './net/channel';
export { CONFIG } from './config';
export { logger } from './logger';
