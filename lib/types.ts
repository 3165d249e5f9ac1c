import type { EnrichmentError } from './errors';

export interface OriginRecord {
  origin: string; // URL, e.g. "https://www.example.com"
  popularity: number; // unsigned integer rank/score
  date: string;
  country: string;
}

export interface AsnInfo {
  networks: string[]; // unique CIDR blocks
  asn: number;
  organization: string;
  country_code: string;
}

export interface NameServerInfo {
  names: string[];
  ips?: string[];
  asn?: AsnInfo[];
}

export interface CertificateIssuerInfo {
  organization: string;
  country?: string;
}

export interface EnrichedRecord {
  origin: OriginRecord;
  hostname: string;
  domain?: string;
  cname?: string[];
  nameservers?: NameServerInfo;
  ip?: string[];
  asn?: AsnInfo[];
  tls?: CertificateIssuerInfo;
}

export type EnrichmentResult =
  | { ok: true; record: EnrichedRecord }
  | { ok: false; origin: OriginRecord | string; error: EnrichmentError };

/** One row coming out of a record source, already validated. */
export type InputRow =
  | { ok: true; line: number; record: OriginRecord }
  | { ok: false; line: number; raw: string; reason: string };

export type TlsMode = 'auto' | 'always' | 'never';
