/**
 * TLS certificate issuer probe.
 *
 * Connects to one of the resolved addresses with SNI set to the hostname,
 * reads the peer chain the TLS stack hands back and reports the issuer of
 * its root-most certificate. The chain is never validated.
 */
import net from 'net';
import tls from 'tls';
import { CONFIG } from './config';
import { EnrichmentError } from './errors';
import type { CertificateIssuerInfo } from './types';

/** The parts of `tls.DetailedPeerCertificate` the probe reads. */
export interface PeerCertificateLike {
  raw?: Buffer;
  fingerprint256?: string;
  issuer?: { O?: string | string[]; C?: string | string[] };
  issuerCertificate?: PeerCertificateLike;
}

export interface TlsProbeOptions {
  port?: number;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  userAgent?: string;
  signal?: AbortSignal;
}

/** First IPv4 address, else the first address. */
export function pickConnectTarget(ips: readonly string[]): string | undefined {
  return ips.find((ip) => net.isIPv4(ip)) ?? ips[0];
}

export function buildProbeRequest(host: string, userAgent: string = CONFIG.TLS.USER_AGENT): string {
  return [
    'GET / HTTP/1.1',
    `Host: ${host}`,
    `User-Agent: ${userAgent}`,
    'Connection: close',
    'Accept: */*',
    '',
    '',
  ].join('\r\n');
}

/** Leaf first, following `issuerCertificate` until a self-signed root or a repeat. */
export function collectPeerChain(leaf: PeerCertificateLike | undefined): PeerCertificateLike[] {
  const chain: PeerCertificateLike[] = [];
  const seen = new Set<string>();
  let current = leaf;
  // getPeerCertificate() returns {} when the peer sent nothing
  while (current?.raw && current.fingerprint256 && !seen.has(current.fingerprint256)) {
    seen.add(current.fingerprint256);
    chain.push(current);
    current = current.issuerCertificate;
  }
  return chain;
}

// subject/issuer fields are arrays when an attribute repeats
function lastValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' && last ? last : undefined;
  }
  return typeof value === 'string' && value ? value : undefined;
}

export function issuerFromChain(chain: readonly PeerCertificateLike[]): CertificateIssuerInfo {
  const top = chain[chain.length - 1];
  if (!top) {
    throw new EnrichmentError('MissingPeerCertificates', 'peer presented no certificates');
  }
  const organization = lastValue(top.issuer?.O);
  if (!organization) {
    throw new EnrichmentError('MissingIssuerOrganization', 'certificate issuer has no organization');
  }
  const country = lastValue(top.issuer?.C);
  return country ? { organization, country } : { organization };
}

export function probeCertificateIssuer(
  hostname: string,
  ips: readonly string[],
  opts: TlsProbeOptions = {},
): Promise<CertificateIssuerInfo> {
  const port = opts.port ?? CONFIG.TLS.PORT;
  const connectTimeoutMs = opts.connectTimeoutMs ?? CONFIG.TLS.CONNECT_TIMEOUT_MS;
  const readTimeoutMs = opts.readTimeoutMs ?? CONFIG.TLS.READ_TIMEOUT_MS;
  const { signal } = opts;

  const target = pickConnectTarget(ips);
  if (!target) {
    return Promise.reject(new EnrichmentError('NoAddressAvailable', `no address to probe for ${hostname}`));
  }
  if (signal?.aborted) {
    return Promise.reject(new EnrichmentError('Timeout', `TLS probe of ${hostname} aborted`));
  }

  return new Promise<CertificateIssuerInfo>((resolve, reject) => {
    let settled = false;
    let connected = false;

    const socket = tls.connect({
      host: target,
      port,
      servername: hostname,
      rejectUnauthorized: false,
    });

    const connectTimer = setTimeout(() => {
      fail(new EnrichmentError('TlsConnectFailure', `connect to ${target}:${port} timed out after ${connectTimeoutMs}ms`));
    }, connectTimeoutMs);

    const onAbort = () => fail(new EnrichmentError('Timeout', `TLS probe of ${hostname} aborted`));
    signal?.addEventListener('abort', onAbort, { once: true });

    function settle() {
      settled = true;
      clearTimeout(connectTimer);
      signal?.removeEventListener('abort', onAbort);
    }

    function fail(err: EnrichmentError) {
      if (settled) return;
      settle();
      socket.destroy();
      reject(err);
    }

    socket.once('connect', () => {
      connected = true;
      clearTimeout(connectTimer);
      socket.setTimeout(readTimeoutMs);
    });

    socket.on('timeout', () => {
      if (settled) socket.destroy();
      else fail(new EnrichmentError('TlsHandshakeFailure', `no TLS handshake from ${target} within ${readTimeoutMs}ms`));
    });

    // stays attached after settling: a late reset must not become an uncaught 'error'
    socket.on('error', (err) => {
      const kind = connected ? 'TlsHandshakeFailure' : 'TlsConnectFailure';
      fail(new EnrichmentError(kind, `${hostname} (${target}:${port}): ${err.message}`, { cause: err }));
    });

    socket.once('secureConnect', () => {
      let issuer: CertificateIssuerInfo;
      try {
        issuer = issuerFromChain(collectPeerChain(socket.getPeerCertificate(true)));
      } catch (err) {
        fail(EnrichmentError.from(err));
        return;
      }
      settle();
      resolve(issuer);
      // the response is not needed; read it off until the server closes
      socket.end(buildProbeRequest(hostname, opts.userAgent));
      socket.resume();
    });
  });
}

export default probeCertificateIssuer;
