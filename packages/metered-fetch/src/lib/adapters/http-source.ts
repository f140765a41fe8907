import { Agent } from "https";
import fetch, { FetchError, type RequestInit, type Response } from "node-fetch";
import type { TimerService } from "../ports/timer.js";
import type { TransferSource, TransportHooks } from "../ports/transfer-source.js";
import { fromHttpStatus, networkOffline, networkTimeout } from "../errors/catalog.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { realTimerService } from "./real-timers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpSourceOptions {
  url: string;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Deadline for the response headers to arrive */
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  timers?: TimerService;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 30_000;

/** Requests issued for one start, redirects and auth retries included */
const MAX_REQUESTS = 20;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const CERTIFICATE_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_REVOKED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

/** TLS alert sent by a server that wants a client certificate */
const CERTIFICATE_REQUIRED_CODE = "ERR_SSL_TLSV13_ALERT_CERTIFICATE_REQUIRED";

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * HTTP(S) byte source over node-fetch.
 *
 * Redirects are not followed automatically: each one is put to the owner
 * through `onRedirect`. A 401 is put to `onAuthRequired` once, and a demand
 * for a client certificate to `onCertificateRequested` once. Certificate
 * failures are reported through `onCertificateError` and end the start.
 */
export function createHttpSource(options: HttpSourceOptions): TransferSource {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const timers = options.timers ?? realTimerService;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger ?? createNoopLogger();
  const abort = new AbortController();

  let body: AsyncIterator<string | Buffer> | null = null;
  let pending: Uint8Array = new Uint8Array(0);
  let ended = false;

  function discard(response: Response): void {
    response.body?.resume();
  }

  async function start(hooks: TransportHooks): Promise<void> {
    if (body) throw new Error("HTTP source already started");

    let url = options.url;
    let authorization: string | undefined;
    let authOffered = false;
    let certificateOffered = false;
    let clientAgent: Agent | undefined;
    let timedOut = false;

    const timer = timers.setTimeout(() => {
      timedOut = true;
      abort.abort();
    }, timeoutMs);

    try {
      for (let attempt = 1; attempt <= MAX_REQUESTS; attempt++) {
        const headers: Record<string, string> = { ...options.headers };
        if (authorization) headers.authorization = authorization;

        const init: RequestInit = { redirect: "manual", signal: abort.signal, headers };
        if (clientAgent) {
          const agent = clientAgent;
          init.agent = (parsed: URL) => (parsed.protocol === "https:" ? agent : undefined);
        }

        let response: Response;
        try {
          logger.debug("Requesting source", { url, attempt });
          response = await fetchImpl(url, init);
        } catch (error) {
          if (timedOut) throw networkTimeout(url, timeoutMs);
          if (error instanceof FetchError) {
            if (error.code === CERTIFICATE_REQUIRED_CODE && !certificateOffered) {
              certificateOffered = true;
              const certificate = await hooks.onCertificateRequested({
                url,
                host: new URL(url).host,
              });
              if (certificate) {
                clientAgent = new Agent({
                  cert: certificate.cert,
                  key: certificate.key,
                  passphrase: certificate.passphrase,
                });
                continue;
              }
            }
            if (error.code !== undefined && CERTIFICATE_ERROR_CODES.has(error.code)) {
              hooks.onCertificateError({ url, code: error.code, message: error.message });
            }
            throw networkOffline(url, error.message);
          }
          throw error;
        }

        if (REDIRECT_STATUSES.has(response.status)) {
          const location = response.headers.get("location");
          discard(response);
          if (!location) throw fromHttpStatus(response.status, response.statusText, url);

          const next = new URL(location, url).toString();
          const decision = await hooks.onRedirect({ from: url, to: next, status: response.status });
          if (decision !== "follow") {
            throw fromHttpStatus(response.status, response.statusText, url);
          }
          // Credentials given for one origin are not replayed to another
          if (new URL(next).origin !== new URL(url).origin) authorization = undefined;
          url = next;
          continue;
        }

        if (response.status === 401 && !authOffered) {
          authOffered = true;
          discard(response);
          authorization = await hooks.onAuthRequired({
            url,
            header: response.headers.get("www-authenticate") ?? "",
          });
          if (authorization) continue;
          throw fromHttpStatus(response.status, response.statusText, url);
        }

        if (!response.ok) {
          discard(response);
          throw fromHttpStatus(response.status, response.statusText, url);
        }
        if (!response.body) {
          throw new Error(`Response from ${url} has no body`);
        }

        logger.debug("Source response started", {
          url,
          status: response.status,
          contentLength: response.headers.get("content-length"),
        });
        body = response.body[Symbol.asyncIterator]();
        return;
      }
      throw new Error(`Gave up on ${options.url} after ${MAX_REQUESTS} requests`);
    } finally {
      timers.clearTimeout(timer);
    }
  }

  async function read(buffer: Uint8Array): Promise<number> {
    if (!body) throw new Error("HTTP source read before start");

    while (pending.length === 0) {
      if (ended) return 0;
      const next = await body.next();
      if (next.done) {
        ended = true;
        return 0;
      }
      pending = typeof next.value === "string" ? Buffer.from(next.value) : next.value;
    }

    const count = Math.min(buffer.length, pending.length);
    buffer.set(pending.subarray(0, count));
    pending = pending.subarray(count);
    return count;
  }

  function cancel(): void {
    if (abort.signal.aborted) return;
    logger.debug("Aborting source request", { url: options.url });
    abort.abort();
  }

  return { start, read, cancel };
}
