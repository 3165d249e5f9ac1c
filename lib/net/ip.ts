import net from 'net';

// ── IP address helpers ──
// Addresses are handled as bigint so IPv4 and IPv6 share the same range code.

export type IpFamily = 4 | 6;

export interface ParsedIp {
  family: IpFamily;
  value: bigint;
}

const FAMILY_BITS: Record<IpFamily, number> = { 4: 32, 6: 128 };

function ipv4ToBigInt(ip: string): bigint {
  return ip.split('.').reduce((acc, octet) => (acc << 8n) + BigInt(parseInt(octet, 10) & 0xff), 0n);
}

function ipv6ToBigInt(ip: string): bigint {
  let addr = ip;
  const zone = addr.indexOf('%');
  if (zone !== -1) addr = addr.slice(0, zone);

  // dotted IPv4 tail (e.g. ::ffff:192.0.2.1) → two hex groups
  const lastColon = addr.lastIndexOf(':');
  const last = addr.slice(lastColon + 1);
  if (last.includes('.')) {
    const v4 = ipv4ToBigInt(last);
    addr = `${addr.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const parts = addr.split('::');
  const head = parts[0] ? parts[0].split(':') : [];
  let groups = head;
  if (parts.length > 1) {
    const tail = parts[1] ? parts[1].split(':') : [];
    const missing = 8 - head.length - tail.length;
    groups = [...head, ...new Array<string>(missing).fill('0'), ...tail];
  }
  return groups.reduce((acc, group) => (acc << 16n) + BigInt(parseInt(group, 16)), 0n);
}

/** Parse an IPv4/IPv6 literal, or `null` when it is not one. */
export function parseIp(ip: string): ParsedIp | null {
  const trimmed = ip.trim();
  const family = net.isIP(trimmed);
  if (family === 4) return { family: 4, value: ipv4ToBigInt(trimmed) };
  if (family === 6) return { family: 6, value: ipv6ToBigInt(trimmed) };
  return null;
}

/** Canonical text form: dotted quad, or RFC 5952 compressed lowercase IPv6. */
export function formatIp(value: bigint, family: IpFamily): string {
  if (family === 4) {
    return [24n, 16n, 8n, 0n].map((shift) => ((value >> shift) & 0xffn).toString()).join('.');
  }

  const groups = Array.from({ length: 8 }, (_, i) => Number((value >> BigInt((7 - i) * 16)) & 0xffffn));
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(':');
  return `${hex.slice(0, bestStart).join(':')}::${hex.slice(bestStart + bestLen).join(':')}`;
}

/**
 * Split the inclusive range [start, end] into its minimal set of aligned CIDR
 * blocks and return the one holding `ip`, as "base/prefix".
 * Returns `null` when `ip` is outside the range.
 */
export function cidrContaining(start: bigint, end: bigint, ip: bigint, family: IpFamily): string | null {
  if (ip < start || ip > end) return null;
  const bits = FAMILY_BITS[family];

  let cur = start;
  while (cur <= end) {
    let size = 1n;
    let prefix = bits;
    while (prefix > 0) {
      const next = size << 1n;
      if (cur % next !== 0n || cur + next - 1n > end) break;
      size = next;
      prefix--;
    }
    if (ip < cur + size) return `${formatIp(cur, family)}/${prefix}`;
    cur += size;
  }
  return null;
}
