/**
 * Abstraction for the byte provider feeding a transfer (usually an HTTP
 * response body). Allows testing the pump without network requests.
 */
export interface TransferSource {
  /**
   * Issue the request and wait for the response to start.
   * Transport decisions met on the way are handed to `hooks`.
   */
  start(hooks: TransportHooks): Promise<void>;
  /** Copy up to `buffer.length` bytes into `buffer`; resolves 0 at end of stream */
  read(buffer: Uint8Array): Promise<number>;
  /** Ask any in-flight request or read to abort */
  cancel(): void;
}

export interface RedirectInfo {
  from: string;
  to: string;
  status: number;
}

export type RedirectDecision = "follow" | "cancel";

export interface AuthChallenge {
  url: string;
  /** Raw WWW-Authenticate header, empty when the server sent none */
  header: string;
}

export interface CertificateProblem {
  url: string;
  code: string;
  message: string;
}

/** The server asked for a client certificate during the TLS handshake */
export interface CertificateRequest {
  url: string;
  host: string;
}

export interface ClientCertificate {
  /** PEM certificate chain */
  cert: string | Buffer;
  /** PEM private key */
  key: string | Buffer;
  passphrase?: string;
}

/**
 * Transport-level questions the source cannot answer itself.
 * The transfer core relays these to its owner untouched.
 */
export interface TransportHooks {
  onRedirect(info: RedirectInfo): Promise<RedirectDecision>;
  /** Resolve an Authorization header value, or undefined to give up */
  onAuthRequired(challenge: AuthChallenge): Promise<string | undefined>;
  onCertificateError(problem: CertificateProblem): void;
  /** Resolve a client certificate to retry with, or undefined to give up */
  onCertificateRequested(request: CertificateRequest): Promise<ClientCertificate | undefined>;
}
