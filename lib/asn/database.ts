/**
 * ASN database acquisition: keep a local copy of the ip2asn TSV (gzip),
 * download it once when missing, then stream it into an `AsnTable`.
 */
import fs from 'fs';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import zlib from 'zlib';
import { CONFIG } from '../config';
import logger from '../logger';
import { fetchWithRetry } from '../net/fetchWithRetry';
import { AsnTable } from './table';

export interface AsnDatabaseOptions {
  path?: string;
  url?: string;
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.promises.access(file, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/** Download `url` to `dest`. The file only appears once the body is complete. */
export async function downloadAsnDatabase(url: string, dest: string): Promise<void> {
  const res = await fetchWithRetry(url, { headers: { 'User-Agent': CONFIG.TLS.USER_AGENT } }, {
    retries: 3,
    backoffMs: 1000,
    timeoutMs: CONFIG.HTTP_TIMEOUT_MS,
  });
  if (!res.ok) {
    throw new Error(`Failed to fetch ASN database from ${url}: HTTP ${res.status}`);
  }
  const body = Buffer.from(await res.arrayBuffer());
  const partial = `${dest}.part`;
  await fs.promises.writeFile(partial, body);
  await fs.promises.rename(partial, dest);
  logger.info({ url, dest, bytes: body.length }, 'downloaded ASN database');
}

/** Build the table from a local file; `.gz` files are gunzipped on the fly. */
export async function loadAsnTable(file: string): Promise<AsnTable> {
  const raw = fs.createReadStream(file);
  const input: Readable = file.endsWith('.gz') ? raw.pipe(zlib.createGunzip()) : raw;
  // readline ends quietly on a stream error, so race it against the streams
  const failed = new Promise<never>((_, reject) => {
    raw.once('error', reject);
    input.once('error', reject);
  });

  const lines = createInterface({ input, crlfDelay: Infinity });
  let table: AsnTable;
  try {
    table = await Promise.race([AsnTable.fromAsyncLines(lines), failed]);
  } finally {
    lines.close();
    raw.destroy();
  }
  logger.info({ file, ranges: table.size, skipped: table.skipped }, 'loaded ASN database');
  return table;
}

export async function openAsnDatabase(opts?: AsnDatabaseOptions): Promise<AsnTable> {
  const file = opts?.path ?? CONFIG.ASN.DB_PATH;
  const url = opts?.url ?? CONFIG.ASN.DB_URL;

  if (!(await fileExists(file))) {
    logger.info({ url, file }, 'ASN database not cached locally, downloading');
    await downloadAsnDatabase(url, file);
  }
  try {
    return await loadAsnTable(file);
  } catch (err) {
    throw new Error(`Failed to open ASN database ${file}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}
