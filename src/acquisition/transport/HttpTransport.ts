import type { Readable } from "node:stream";
import axios, { AxiosError } from "axios";
import { MAX_REDIRECTS } from "../../config";
import { CancelledError, FetchError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ResponseHandle, Transport, TransportOptions, TransportRequest } from "./types";

const TIMEOUT_CODES = new Set<string>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT]);

function headerValue(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  return String(value);
}

/**
 * Converts whatever axios rejected with into the acquisition error taxonomy.
 */
function toTransportError(url: URL, error: unknown): FetchError | CancelledError {
  if (error instanceof AxiosError) {
    if (error.code === AxiosError.ERR_CANCELED) {
      return new CancelledError(error);
    }
    return new FetchError(url.href, error.message, {
      code: error.code,
      timedOut: error.code !== undefined && TIMEOUT_CODES.has(error.code),
      cause: error,
    });
  }
  return new FetchError(url.href, error instanceof Error ? error.message : String(error), {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Fetches pages over HTTP/HTTPS with axios. Each call gets its own client
 * configured with that call's timeout.
 *
 * The body is requested as a raw stream with axios' own decompression turned
 * off, so that the Content-Encoding header still describes the bytes handed
 * back.
 */
export class HttpTransport implements Transport {
  async execute(
    request: TransportRequest,
    options: TransportOptions,
  ): Promise<ResponseHandle> {
    const client = axios.create({
      timeout: options.timeout,
      maxRedirects: MAX_REDIRECTS,
    });

    logger.debug(`GET ${request.url.href} (timeout: ${options.timeout}ms)`);

    try {
      const response = await client.request<Readable>({
        method: request.method,
        url: request.url.href,
        // axios would add its own Accept and User-Agent; only the request's headers go out
        headers: { ...request.headers, Accept: false, "User-Agent": false },
        responseType: "stream",
        decompress: false,
        // Status codes are left to the caller
        validateStatus: () => true,
        signal: options.signal,
      });

      return {
        url: request.url,
        status: response.status,
        body: response.data,
        contentEncoding: headerValue(response.headers["content-encoding"]),
        contentType: headerValue(response.headers["content-type"]),
      };
    } catch (error: unknown) {
      throw toTransportError(request.url, error);
    }
  }
}
