import type { AsnInfo } from '../types';
import type { AsnLookup } from './table';

/**
 * Map IPs to their autonomous systems, one entry per AS number.
 * - new AS number: insert with a single network
 * - known AS number: add the network only if not already listed
 *
 * Pure: no I/O, the table is only read. Returns `undefined` when the input is
 * empty or nothing matched.
 */
export function attributeAsns(ips: Iterable<string>, table: AsnLookup): AsnInfo[] | undefined {
  const byAsn = new Map<number, AsnInfo>();

  for (const ip of ips) {
    const match = table.lookup(ip);
    if (!match) continue;

    const existing = byAsn.get(match.asn);
    if (!existing) {
      byAsn.set(match.asn, {
        networks: [match.network],
        asn: match.asn,
        organization: match.organization,
        country_code: match.country_code,
      });
    } else if (!existing.networks.includes(match.network)) {
      existing.networks.push(match.network);
    }
  }

  return byAsn.size > 0 ? Array.from(byAsn.values()) : undefined;
}

export default attributeAsns;
