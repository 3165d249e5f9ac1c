import { promises as dnsPromises } from 'dns';
import { AsnTable } from '../lib/asn/table';
import { InMemoryLRUAdapter } from '../lib/cache';
import { DnsLookupService, createResolver, parseIpList, type DnsResolver } from '../lib/dns';

const asnTable = AsnTable.fromLines(['192.0.2.0\t192.0.2.255\t64500\tZZ\tEXAMPLE-NET']);

const nxdomain = () => Promise.reject(Object.assign(new Error('queryA ENOTFOUND'), { code: 'ENOTFOUND' }));

function fakeResolver(answers: { a?: Record<string, string[]>; aaaa?: Record<string, string[]>; ns?: Record<string, string[]> }) {
  const lookup = (table: Record<string, string[]> | undefined) =>
    jest.fn<Promise<string[]>, [string]>((host) => {
      const found = table?.[host];
      return found ? Promise.resolve(found) : nxdomain();
    });
  return {
    resolve4: lookup(answers.a),
    resolve6: lookup(answers.aaaa),
    resolveCname: jest.fn<Promise<string[]>, [string]>(async () => []),
    resolveNs: lookup(answers.ns),
  } satisfies DnsResolver;
}

function service(resolver: DnsResolver) {
  return new DnsLookupService(resolver, asnTable, { cache: new InMemoryLRUAdapter<string[]>({ max: 100, ttl: 60_000 }) });
}

describe('parseIpList', () => {
  test('keeps only entries that parse as addresses', () => {
    expect(parseIpList('1.1.1.1, bogus, 2606:4700:4700::1111,')).toEqual(['1.1.1.1', '2606:4700:4700::1111']);
    expect(parseIpList('')).toEqual([]);
  });
});

describe('createResolver', () => {
  afterEach(() => jest.restoreAllMocks());

  test('uses the parsed custom servers', () => {
    const setServers = jest.spyOn(dnsPromises.Resolver.prototype, 'setServers');
    createResolver('9.9.9.9, not-an-ip');
    expect(setServers).toHaveBeenCalledWith(['9.9.9.9']);
  });

  test('falls back to 1.1.1.1 when nothing parses', () => {
    const setServers = jest.spyOn(dnsPromises.Resolver.prototype, 'setServers');
    createResolver('not-an-ip');
    createResolver();
    expect(setServers.mock.calls).toEqual([[['1.1.1.1']], [['1.1.1.1']]]);
  });
});

describe('DnsLookupService', () => {
  test('queryAddresses unions A and AAAA answers', async () => {
    const resolver = fakeResolver({
      a: { 'www.example.com': ['192.0.2.10', '192.0.2.10', '192.0.2.11'] },
      aaaa: { 'www.example.com': ['2001:db8::10'] },
    });
    await expect(service(resolver).queryAddresses('www.example.com')).resolves.toEqual([
      '192.0.2.10',
      '192.0.2.11',
      '2001:db8::10',
    ]);
  });

  test('queryAddresses keeps the family that answered', async () => {
    const resolver = fakeResolver({ aaaa: { 'v6.example.com': ['2001:db8::1'] } });
    await expect(service(resolver).queryAddresses('v6.example.com')).resolves.toEqual(['2001:db8::1']);
  });

  test('queries yield undefined on failure or empty answers', async () => {
    const svc = service(fakeResolver({}));
    await expect(svc.queryAddresses('missing.example.com')).resolves.toBeUndefined();
    await expect(svc.queryCname('missing.example.com')).resolves.toBeUndefined();
    await expect(svc.queryNameServers('missing.example.com')).resolves.toBeUndefined();
  });

  test('queryCname returns targets in answer order', async () => {
    const resolver = fakeResolver({});
    resolver.resolveCname.mockResolvedValueOnce(['edge.example.net', 'origin.example.net']);
    await expect(service(resolver).queryCname('www.example.com')).resolves.toEqual([
      'edge.example.net',
      'origin.example.net',
    ]);
  });

  test('queryNameServers resolves each name server and attributes its addresses', async () => {
    const resolver = fakeResolver({
      ns: { 'example.com': ['NS1.example.com', 'ns2.example.com'] },
      a: { 'ns1.example.com': ['192.0.2.53'], 'ns2.example.com': ['192.0.2.54'] },
    });

    await expect(service(resolver).queryNameServers('example.com')).resolves.toEqual({
      names: ['ns1.example.com', 'ns2.example.com'],
      ips: ['192.0.2.53', '192.0.2.54'],
      asn: [{ networks: ['192.0.2.0/24'], asn: 64500, organization: 'EXAMPLE-NET', country_code: 'ZZ' }],
    });
  });

  test('queryNameServers caches name server addresses', async () => {
    const resolver = fakeResolver({
      ns: { 'example.com': ['ns1.example.com'], 'example.org': ['ns1.example.com'] },
      a: { 'ns1.example.com': ['192.0.2.53'] },
    });
    const svc = service(resolver);

    await svc.queryNameServers('example.com');
    const second = await svc.queryNameServers('example.org');

    expect(second?.ips).toEqual(['192.0.2.53']);
    expect(resolver.resolve4).toHaveBeenCalledTimes(1);
  });

  test('name servers without addresses leave ips and asn out', async () => {
    const resolver = fakeResolver({ ns: { 'example.com': ['ns.unresolvable.example'] } });
    await expect(service(resolver).queryNameServers('example.com')).resolves.toEqual({
      names: ['ns.unresolvable.example'],
    });
  });

  test('an aborted signal stops queries before they start', async () => {
    const resolver = fakeResolver({ a: { 'www.example.com': ['192.0.2.10'] } });
    const controller = new AbortController();
    controller.abort();

    await expect(service(resolver).queryAddresses('www.example.com', controller.signal)).resolves.toBeUndefined();
    expect(resolver.resolve4).not.toHaveBeenCalled();
  });

  test('aborting stops waiting for a slow answer', async () => {
    const resolver = fakeResolver({});
    resolver.resolve4.mockReturnValueOnce(new Promise<string[]>(() => undefined));
    const controller = new AbortController();

    const pending = service(resolver).queryAddresses('slow.example.com', controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});
