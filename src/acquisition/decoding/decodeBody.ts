import { PassThrough, type Readable } from "node:stream";
import { createGunzip } from "node:zlib";
import { GZIP_ENCODING } from "../../config";
import { DecodeError, FetchError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ResponseHandle } from "../transport/types";

/**
 * A response body after transfer-encoding normalization.
 *
 * `stages` lists every stream the body is made of, outermost first. Closing
 * destroys them in that order, so a decompression stage is always released
 * before the response body underneath it.
 */
export class DecodedBody {
  private closed = false;

  constructor(
    public readonly stream: Readable,
    public readonly stages: readonly Readable[],
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Destroys every stage once. Later calls do nothing.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const stage of this.stages) {
      stage.destroy();
    }
  }
}

function gunzip(response: ResponseHandle): DecodedBody {
  const inflater = createGunzip();
  const decoded = new PassThrough();

  // Errors are re-raised on the stream consumers read from, classified by origin
  response.body.on("error", (error: Error) => {
    decoded.destroy(new FetchError(response.url.href, error.message, { cause: error }));
  });
  inflater.on("error", (error: Error) => {
    decoded.destroy(new DecodeError(error.message, error));
  });

  response.body.pipe(inflater).pipe(decoded);
  return new DecodedBody(decoded, [decoded, inflater, response.body]);
}

/**
 * Wraps the response body in a gzip decompression stage when the response
 * declares `Content-Encoding: gzip`. Any other value, absent included, is
 * treated as identity and the body is passed through untouched.
 *
 * Invalid gzip data is reported as a {@link DecodeError} by the first read
 * that reaches it.
 */
export function decodeBody(response: ResponseHandle): DecodedBody {
  if (response.contentEncoding !== GZIP_ENCODING) {
    if (response.contentEncoding !== undefined) {
      logger.debug(
        `Treating content-encoding "${response.contentEncoding}" of ${response.url.href} as identity`,
      );
    }
    return new DecodedBody(response.body, [response.body]);
  }

  try {
    return gunzip(response);
  } catch (error) {
    response.body.destroy();
    throw new DecodeError(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  }
}
