// Origin list reader.
//
// CSV with a header row naming at least origin,popularity,date,country
// (any order, extra columns ignored):
//   origin,popularity,date,country
//   https://www.example.com,1200,2024-01-01,FR
//
// Quoted fields may contain commas and doubled quotes; a quoted field cannot
// span lines.

import fs from 'fs';
import { createInterface } from 'readline';
import type { InputRow, OriginRecord } from './types';

export const REQUIRED_COLUMNS = ['origin', 'popularity', 'date', 'country'] as const;
type Column = (typeof REQUIRED_COLUMNS)[number];
type ColumnIndex = Record<Column, number>;

export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (line[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else {
      field += ch;
    }
  }
  fields.push(field);
  return fields;
}

export function resolveColumns(header: string[]): ColumnIndex {
  const names = header.map((h) => h.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((c) => !names.includes(c));
  if (missing.length > 0) {
    throw new Error(`CSV header is missing column(s): ${missing.join(', ')}`);
  }
  return {
    origin: names.indexOf('origin'),
    popularity: names.indexOf('popularity'),
    date: names.indexOf('date'),
    country: names.indexOf('country'),
  };
}

/** A record, or the reason the row was rejected. */
export function parseOriginRow(fields: string[], columns: ColumnIndex): OriginRecord | string {
  const width = Math.max(columns.origin, columns.popularity, columns.date, columns.country) + 1;
  if (fields.length < width) {
    return `expected at least ${width} fields, found ${fields.length}`;
  }

  const popularity = fields[columns.popularity].trim();
  if (!/^\d+$/.test(popularity) || !Number.isSafeInteger(Number(popularity))) {
    return `invalid popularity "${popularity}"`;
  }

  return {
    origin: fields[columns.origin].trim(),
    popularity: Number(popularity),
    date: fields[columns.date].trim(),
    country: fields[columns.country].trim(),
  };
}

/**
 * Stream rows of an origin CSV. Blank lines are skipped; malformed rows are
 * yielded as `{ ok: false }` so the caller can report them.
 */
export async function* readOriginRows(csvPath: string): AsyncGenerator<InputRow> {
  try {
    await fs.promises.access(csvPath, fs.constants.R_OK);
  } catch (err) {
    throw new Error(`Failed to open CSV file ${csvPath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  const rl = createInterface({
    input: fs.createReadStream(csvPath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let columns: ColumnIndex | undefined;
  let lineNo = 0;
  for await (const line of rl) {
    lineNo++;
    if (!line.trim()) continue;

    const fields = splitCsvLine(line);
    if (!columns) {
      // strip a UTF-8 BOM from the first header cell
      fields[0] = fields[0].replace(/^\uFEFF/, '');
      columns = resolveColumns(fields);
      continue;
    }

    const parsed = parseOriginRow(fields, columns);
    if (typeof parsed === 'string') {
      yield { ok: false, line: lineNo, raw: line, reason: parsed };
    } else {
      yield { ok: true, line: lineNo, record: parsed };
    }
  }
}

export default readOriginRows;
