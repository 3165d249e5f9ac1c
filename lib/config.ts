// Centralized runtime configuration for timeouts, concurrency and cache TTLs.
// Values are read from env with sane defaults and can be overridden in tests.
import os from 'os';
import path from 'path';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),
  DNS_TRIES: envInt('DNS_TRIES', 2),
  // Cloudflare, used when no custom resolver list parses
  DEFAULT_DNS_SERVERS: ['1.1.1.1'],

  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 30_000),

  TLS: {
    PORT: 443,
    CONNECT_TIMEOUT_MS: envInt('TLS_CONNECT_TIMEOUT_MS', 1000),
    READ_TIMEOUT_MS: envInt('TLS_READ_TIMEOUT_MS', 30_000),
    USER_AGENT: 'origin-intel/0.1',
  },

  PIPELINE_TIMEOUT_MS: envInt('PIPELINE_TIMEOUT_MS', 120_000),
  PROGRESS_EVERY: envInt('PROGRESS_EVERY', 100),

  TTL: {
    NS_HOST_MS: envInt('NS_HOST_TTL_MS', 1000 * 60 * 10), // 10m
  },

  CONCURRENCY: {
    DEFAULT: envInt('CONCURRENCY_DEFAULT', 5),
  },

  CACHE_KEY_PREFIX: process.env.CACHE_KEY_PREFIX || 'oi:v1:',

  ASN: {
    DB_URL: process.env.ASN_DB_URL || 'https://iptoasn.com/data/ip2asn-combined.tsv.gz',
    DB_PATH: process.env.ASN_DB_PATH || path.join(os.tmpdir(), 'ip2asn-combined.tsv.gz'),
  },

  LOG_LEVEL: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
};

export default CONFIG;
