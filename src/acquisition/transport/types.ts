import type { Readable } from "node:stream";

/**
 * An outbound request. Built once by `buildRequest` and never mutated.
 */
export interface TransportRequest {
  readonly method: "GET";
  readonly url: URL;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Per-call settings for {@link Transport.execute}.
 */
export interface TransportOptions {
  /** Timeout in milliseconds for connecting and receiving the response headers */
  timeout: number;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

/**
 * A received response. The body stream is owned by whoever holds the handle
 * and must be destroyed by it.
 */
export interface ResponseHandle {
  /** URL the request was sent to */
  url: URL;
  /** HTTP status; not filtered by the transport */
  status: number;
  /** Raw, still encoded response body */
  body: Readable;
  /** Value of the Content-Encoding header */
  contentEncoding?: string;
  /** Value of the Content-Type header */
  contentType?: string;
}

/**
 * Sends exactly one request per call.
 */
export interface Transport {
  /**
   * Executes the request. Resolves on any HTTP response, whatever its status.
   * @throws {FetchError} On connection, DNS, TLS or timeout failures
   * @throws {CancelledError} If the signal aborts the request
   */
  execute(request: TransportRequest, options: TransportOptions): Promise<ResponseHandle>;
}
