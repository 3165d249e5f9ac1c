export type EnrichmentErrorKind =
  | 'InvalidURL'
  | 'InvalidHostname'
  | 'InvalidRecord'
  | 'DomainExtractionFailure'
  | 'DnsLookupFailure'
  | 'NoAddressAvailable'
  | 'TlsConnectFailure'
  | 'TlsHandshakeFailure'
  | 'MissingPeerCertificates'
  | 'MissingIssuerOrganization'
  | 'Timeout'
  | 'Internal';

/**
 * Record-level failure. Carries a `kind` so the sink and the metrics can
 * tag it without parsing messages.
 */
export class EnrichmentError extends Error {
  readonly kind: EnrichmentErrorKind;

  constructor(kind: EnrichmentErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnrichmentError';
    this.kind = kind;
  }

  /** Wrap an arbitrary throwable, keeping the kind of an existing EnrichmentError. */
  static from(err: unknown, kind: EnrichmentErrorKind = 'Internal'): EnrichmentError {
    if (err instanceof EnrichmentError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new EnrichmentError(kind, message, { cause: err });
  }

  toJSON(): { kind: EnrichmentErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}
