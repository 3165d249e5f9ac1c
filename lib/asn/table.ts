import { cidrContaining, parseIp, type IpFamily } from '../net/ip';

/** Covering entry for one IP, as exposed to the attribution engine. */
export interface AsnMatch {
  network: string;
  asn: number;
  organization: string;
  country_code: string;
}

export interface AsnLookup {
  lookup(ip: string): AsnMatch | undefined;
}

interface AsnRange {
  start: bigint;
  end: bigint;
  asn: number;
  countryCode: string;
  organization: string;
}

const MAX_ASN = 0xffffffff;

/**
 * Accumulates rows of an ip2asn style TSV
 * (`range_start  range_end  AS_number  country_code  AS_description`).
 */
export class AsnTableBuilder {
  private readonly ranges: Record<IpFamily, AsnRange[]> = { 4: [], 6: [] };
  private skipped = 0;

  /** Returns false when the line was rejected (malformed or not routed). */
  addLine(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return false;

    const fields = trimmed.split('\t');
    if (fields.length < 5) return this.reject();

    const [rawStart, rawEnd, rawAsn, countryCode] = fields;
    const organization = fields.slice(4).join('\t').trim();
    const start = parseIp(rawStart);
    const end = parseIp(rawEnd);
    const asn = Number(rawAsn);

    if (!start || !end || start.family !== end.family || start.value > end.value) return this.reject();
    if (!Number.isInteger(asn) || asn < 0 || asn > MAX_ASN) return this.reject();
    // AS 0 marks unrouted space
    if (asn === 0) return this.reject();

    this.ranges[start.family].push({
      start: start.value,
      end: end.value,
      asn,
      countryCode: countryCode.trim(),
      organization,
    });
    return true;
  }

  get skippedCount(): number {
    return this.skipped;
  }

  build(): AsnTable {
    const byStart = (a: AsnRange, b: AsnRange) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0);
    return new AsnTable(
      { 4: [...this.ranges[4]].sort(byStart), 6: [...this.ranges[6]].sort(byStart) },
      this.skipped,
    );
  }

  private reject(): false {
    this.skipped++;
    return false;
  }
}

/**
 * Immutable IP-range → AS lookup table. Safe to share between concurrent
 * pipelines: nothing mutates it after `build()`.
 */
export class AsnTable implements AsnLookup {
  constructor(
    private readonly ranges: Readonly<Record<IpFamily, readonly AsnRange[]>>,
    readonly skipped = 0,
  ) {}

  static fromLines(lines: Iterable<string>): AsnTable {
    const builder = new AsnTableBuilder();
    for (const line of lines) builder.addLine(line);
    return builder.build();
  }

  static async fromAsyncLines(lines: AsyncIterable<string>): Promise<AsnTable> {
    const builder = new AsnTableBuilder();
    for await (const line of lines) builder.addLine(line);
    return builder.build();
  }

  get size(): number {
    return this.ranges[4].length + this.ranges[6].length;
  }

  lookup(ip: string): AsnMatch | undefined {
    const parsed = parseIp(ip);
    if (!parsed) return undefined;
    const ranges = this.ranges[parsed.family];

    // last range whose start <= ip
    let lo = 0;
    let hi = ranges.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (ranges[mid].start <= parsed.value) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    if (found === -1) return undefined;

    const range = ranges[found];
    const network = cidrContaining(range.start, range.end, parsed.value, parsed.family);
    if (!network) return undefined;
    return {
      network,
      asn: range.asn,
      organization: range.organization,
      country_code: range.countryCode,
    };
  }
}
