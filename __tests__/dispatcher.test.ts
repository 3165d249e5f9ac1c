import { dispatchRecords, type Enricher } from '../lib/dispatcher';
import { BoundedChannel } from '../lib/net/channel';
import type { EnrichmentResult, InputRow, OriginRecord } from '../lib/types';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function record(n: number): OriginRecord {
  return { origin: `https://site${n}.example.com`, popularity: n, date: '2024-01-01', country: 'FR' };
}

function rowsOf(count: number): InputRow[] {
  return Array.from({ length: count }, (_, i) => ({ ok: true, line: i + 2, record: record(i) }));
}

async function collect(channel: BoundedChannel<EnrichmentResult>): Promise<EnrichmentResult[]> {
  const out: EnrichmentResult[] = [];
  for await (const result of channel) out.push(result);
  return out;
}

function originOf(result: EnrichmentResult): string {
  if (result.ok) return result.record.origin.origin;
  return typeof result.origin === 'string' ? result.origin : result.origin.origin;
}

const succeed: Enricher = async (origin) => ({ ok: true, record: { origin, hostname: new URL(origin.origin).hostname } });

describe('dispatchRecords', () => {
  test.each([1, 3, 8])('delivers one result per row with at most %i in flight', async (concurrency) => {
    let active = 0;
    let peak = 0;
    const enrich: Enricher = async (origin) => {
      active++;
      peak = Math.max(peak, active);
      await delay(origin.popularity % 4);
      active--;
      return succeed(origin);
    };

    const channel = new BoundedChannel<EnrichmentResult>(concurrency);
    const [summary, results] = await Promise.all([
      dispatchRecords(rowsOf(25), enrich, channel, { concurrency }),
      collect(channel),
    ]);

    expect(summary).toEqual({ dispatched: 25, invalidRows: 0 });
    expect(results).toHaveLength(25);
    expect(new Set(results.map(originOf)).size).toBe(25);
    expect(peak).toBeLessThanOrEqual(concurrency);
    expect(channel.isClosed).toBe(true);
  });

  test('a failing record does not affect its siblings', async () => {
    const enrich: Enricher = async (origin) => {
      if (origin.popularity === 2) throw new Error('resolver exploded');
      return succeed(origin);
    };

    const channel = new BoundedChannel<EnrichmentResult>(2);
    const [, results] = await Promise.all([dispatchRecords(rowsOf(5), enrich, channel, { concurrency: 2 }), collect(channel)]);

    const failed = results.filter((r) => !r.ok);
    expect(results.filter((r) => r.ok)).toHaveLength(4);
    expect(failed).toHaveLength(1);
    const [failure] = failed;
    if (failure.ok) throw new Error('expected a failure');
    expect(failure.error.kind).toBe('Internal');
    expect(failure.error.message).toBe('resolver exploded');
    expect(originOf(failure)).toBe('https://site2.example.com');
  });

  test('turns invalid rows into InvalidRecord results', async () => {
    const rows: InputRow[] = [
      { ok: true, line: 2, record: record(1) },
      { ok: false, line: 3, raw: 'https://bad.example.com,abc,2024-01-01,FR', reason: 'invalid popularity "abc"' },
    ];

    const channel = new BoundedChannel<EnrichmentResult>(1);
    const [summary, results] = await Promise.all([dispatchRecords(rows, succeed, channel, { concurrency: 1 }), collect(channel)]);

    expect(summary).toEqual({ dispatched: 1, invalidRows: 1 });
    const invalid = results.find((r) => !r.ok);
    if (!invalid || invalid.ok) throw new Error('expected an invalid row result');
    expect(invalid.origin).toBe('https://bad.example.com,abc,2024-01-01,FR');
    expect(invalid.error.kind).toBe('InvalidRecord');
    expect(invalid.error.message).toBe('line 3: invalid popularity "abc"');
  });

  test('closes the channel and rethrows when the row source fails', async () => {
    async function* rows(): AsyncGenerator<InputRow> {
      yield { ok: true, line: 2, record: record(1) };
      yield { ok: true, line: 3, record: record(2) };
      throw new Error('disk went away');
    }

    const channel = new BoundedChannel<EnrichmentResult>(4);
    const collecting = collect(channel);
    await expect(dispatchRecords(rows(), succeed, channel, { concurrency: 4 })).rejects.toThrow('disk went away');
    expect(channel.isClosed).toBe(true);
    expect((await collecting).map(originOf)).toEqual(['https://site1.example.com', 'https://site2.example.com']);
  });

  test('stops when the consumer closes the channel', async () => {
    const channel = new BoundedChannel<EnrichmentResult>(1);
    channel.close();
    await expect(dispatchRecords(rowsOf(3), succeed, channel, { concurrency: 1 })).rejects.toThrow('send on closed channel');
  });
});
