#!/usr/bin/env node

/**
 * origin-intel CLI.
 *
 * Results go to stdout as JSON lines; logs go to the log file (or stderr
 * with `--logfile -`). Only the final fatal message uses console output.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import fs from 'fs';
import { CONFIG } from '../lib/config';
import { readOriginRows } from '../lib/csv';
import logger, { flushLogs, redirectLogs } from '../lib/logger';
import { register } from '../lib/metrics';
import { closeRedisClient } from '../lib/redisAdapter';
import { createEnrichmentContext, runEnrichment } from '../lib/run';
import type { TlsMode } from '../lib/types';

export const TLS_MODES: readonly TlsMode[] = ['auto', 'always', 'never'];

export type CliOptions = {
  csv: string;
  size: number;
  dns?: string;
  logfile: string;
  timeout: number;
  tls: TlsMode;
  asnDb?: string;
  metricsFile?: string;
};

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

// setTimeout treats anything above a signed 32-bit delay as 1 ms
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export function parseTimeoutMs(value: string): number {
  const n = parsePositiveInt(value);
  if (n > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMEOUT_MS} ms.`);
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('origin-intel')
    .description('Enrich website origins with DNS, ASN and TLS issuer data')
    .version('0.1.0')
    .requiredOption('-c, --csv <path>', 'CSV file with origin,popularity,date,country columns')
    .option('-s, --size <n>', 'records enriched concurrently', parsePositiveInt, CONFIG.CONCURRENCY.DEFAULT)
    .option('-d, --dns <ips>', 'comma-separated name server IPs (default 1.1.1.1)')
    .option('-l, --logfile <path>', 'log file, "-" for stderr', './origin-intel.log')
    .option('-t, --timeout <ms>', 'per-record timeout in milliseconds', parseTimeoutMs, CONFIG.PIPELINE_TIMEOUT_MS)
    .addOption(new Option('--tls <mode>', 'when to probe the TLS certificate issuer').choices(TLS_MODES).default('auto'))
    .option('--asn-db <path>', 'local ip2asn TSV, gzip allowed (downloaded when missing)')
    .option('--metrics-file <path>', 'write Prometheus metrics to this file when done');
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<CliOptions>();

  if (opts.logfile !== '-') redirectLogs(opts.logfile);
  logger.info({ csv: opts.csv, concurrency: opts.size, tls: opts.tls }, 'origin-intel starting');

  try {
    const context = await createEnrichmentContext({
      dns: opts.dns,
      timeoutMs: opts.timeout,
      tlsMode: opts.tls,
      asnDbPath: opts.asnDb,
    });
    await runEnrichment({ rows: readOriginRows(opts.csv), context, concurrency: opts.size });

    if (opts.metricsFile) {
      await fs.promises.writeFile(opts.metricsFile, await register.metrics());
    }
  } catch (err) {
    logger.fatal({ err }, 'origin-intel failed');
    throw err;
  } finally {
    await closeRedisClient();
    await flushLogs();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`origin-intel: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
