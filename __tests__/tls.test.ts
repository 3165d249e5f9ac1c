import { EventEmitter } from 'events';

class FakeSocket extends EventEmitter {
  destroy = jest.fn();
  end = jest.fn();
  resume = jest.fn();
  setTimeout = jest.fn();
  getPeerCertificate = jest.fn<PeerCertificateLike, [boolean]>(() => ({}));
}

const mockConnect = jest.fn<FakeSocket, [unknown]>();

jest.mock('tls', () => ({
  __esModule: true,
  default: {
    connect: (options: unknown) => mockConnect(options),
  },
}));

import {
  buildProbeRequest,
  collectPeerChain,
  issuerFromChain,
  pickConnectTarget,
  probeCertificateIssuer,
  type PeerCertificateLike,
} from '../lib/tls';

function chain(rootIssuer: PeerCertificateLike['issuer']): PeerCertificateLike {
  const root: PeerCertificateLike = { raw: Buffer.from('root'), fingerprint256: 'AA:03', issuer: rootIssuer };
  root.issuerCertificate = root;
  const intermediate: PeerCertificateLike = {
    raw: Buffer.from('intermediate'),
    fingerprint256: 'AA:02',
    issuer: { O: 'Example Intermediate Org', C: 'GB' },
    issuerCertificate: root,
  };
  return {
    raw: Buffer.from('leaf'),
    fingerprint256: 'AA:01',
    issuer: { O: 'Example Leaf Issuer', C: 'FR' },
    issuerCertificate: intermediate,
  };
}

function connectSocket(): FakeSocket {
  const socket = new FakeSocket();
  mockConnect.mockReturnValueOnce(socket);
  return socket;
}

describe('probe helpers', () => {
  test('pickConnectTarget prefers IPv4', () => {
    expect(pickConnectTarget(['2001:db8::1', '192.0.2.1', '192.0.2.2'])).toBe('192.0.2.1');
    expect(pickConnectTarget(['2001:db8::1'])).toBe('2001:db8::1');
    expect(pickConnectTarget([])).toBeUndefined();
  });

  test('buildProbeRequest writes a minimal GET', () => {
    expect(buildProbeRequest('www.example.com', 'test-agent')).toBe(
      'GET / HTTP/1.1\r\nHost: www.example.com\r\nUser-Agent: test-agent\r\nConnection: close\r\nAccept: */*\r\n\r\n',
    );
  });

  test('collectPeerChain walks to the self-signed root', () => {
    expect(collectPeerChain(chain({ O: 'Example Root Org' })).map((c) => c.fingerprint256)).toEqual([
      'AA:01',
      'AA:02',
      'AA:03',
    ]);
    expect(collectPeerChain({})).toEqual([]);
    expect(collectPeerChain(undefined)).toEqual([]);
  });

  test('issuerFromChain reads the root-most issuer', () => {
    const certs = collectPeerChain(chain({ O: 'Example Root Org', C: 'US' }));
    expect(issuerFromChain(certs)).toEqual({ organization: 'Example Root Org', country: 'US' });
  });

  test('issuerFromChain takes the last value of repeated attributes', () => {
    const certs = collectPeerChain(chain({ O: ['First Org', 'Second Org'], C: ['BE', 'NL'] }));
    expect(issuerFromChain(certs)).toEqual({ organization: 'Second Org', country: 'NL' });
  });

  test('issuerFromChain leaves country out when absent', () => {
    const certs = collectPeerChain(chain({ O: 'Example Root Org' }));
    expect(issuerFromChain(certs)).toEqual({ organization: 'Example Root Org' });
  });

  test('issuerFromChain rejects empty chains and missing organizations', () => {
    expect(() => issuerFromChain([])).toThrow(expect.objectContaining({ kind: 'MissingPeerCertificates' }));
    expect(() => issuerFromChain(collectPeerChain(chain({ C: 'US' })))).toThrow(
      expect.objectContaining({ kind: 'MissingIssuerOrganization' }),
    );
  });
});

describe('probeCertificateIssuer', () => {
  beforeEach(() => mockConnect.mockReset());

  test('connects with SNI, reports the issuer and sends the request', async () => {
    const socket = connectSocket();
    socket.getPeerCertificate.mockReturnValue(chain({ O: 'Example Root Org', C: 'US' }));

    const probe = probeCertificateIssuer('www.example.com', ['2001:db8::1', '192.0.2.1'], { readTimeoutMs: 500 });
    socket.emit('connect');
    socket.emit('secureConnect');

    await expect(probe).resolves.toEqual({ organization: 'Example Root Org', country: 'US' });
    expect(mockConnect).toHaveBeenCalledWith({
      host: '192.0.2.1',
      port: 443,
      servername: 'www.example.com',
      rejectUnauthorized: false,
    });
    expect(socket.setTimeout).toHaveBeenCalledWith(500);
    expect(socket.getPeerCertificate).toHaveBeenCalledWith(true);
    expect(socket.end).toHaveBeenCalledWith(buildProbeRequest('www.example.com'));
    expect(socket.resume).toHaveBeenCalled();
  });

  test('fails without an address', async () => {
    await expect(probeCertificateIssuer('www.example.com', [])).rejects.toMatchObject({ kind: 'NoAddressAvailable' });
    expect(mockConnect).not.toHaveBeenCalled();
  });

  test('times out the TCP connect', async () => {
    const socket = connectSocket();
    await expect(
      probeCertificateIssuer('www.example.com', ['192.0.2.1'], { connectTimeoutMs: 10 }),
    ).rejects.toMatchObject({ kind: 'TlsConnectFailure' });
    expect(socket.destroy).toHaveBeenCalled();
  });

  test('classifies socket errors by stage', async () => {
    const refused = connectSocket();
    const beforeConnect = probeCertificateIssuer('www.example.com', ['192.0.2.1']);
    refused.emit('error', new Error('connect ECONNREFUSED'));
    await expect(beforeConnect).rejects.toMatchObject({ kind: 'TlsConnectFailure' });

    const reset = connectSocket();
    const afterConnect = probeCertificateIssuer('www.example.com', ['192.0.2.1']);
    reset.emit('connect');
    reset.emit('error', new Error('socket hang up'));
    await expect(afterConnect).rejects.toMatchObject({
      kind: 'TlsHandshakeFailure',
      message: 'www.example.com (192.0.2.1:443): socket hang up',
    });
  });

  test('times out a stalled handshake', async () => {
    const socket = connectSocket();
    const probe = probeCertificateIssuer('www.example.com', ['192.0.2.1']);
    socket.emit('connect');
    socket.emit('timeout');
    await expect(probe).rejects.toMatchObject({ kind: 'TlsHandshakeFailure' });
    expect(socket.destroy).toHaveBeenCalled();
  });

  test('fails when the peer sends no certificate', async () => {
    const socket = connectSocket();
    const probe = probeCertificateIssuer('www.example.com', ['192.0.2.1']);
    socket.emit('connect');
    socket.emit('secureConnect');
    await expect(probe).rejects.toMatchObject({ kind: 'MissingPeerCertificates' });
    expect(socket.end).not.toHaveBeenCalled();
  });

  test('aborting destroys the socket', async () => {
    const socket = connectSocket();
    const controller = new AbortController();
    const probe = probeCertificateIssuer('www.example.com', ['192.0.2.1'], { signal: controller.signal });
    socket.emit('connect');
    controller.abort();
    await expect(probe).rejects.toMatchObject({ kind: 'Timeout' });
    expect(socket.destroy).toHaveBeenCalled();
  });
});
