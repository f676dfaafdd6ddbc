import { GZIP_ENCODING } from "../../config";
import { RequestBuildError } from "../../utils/errors";
import type { TransportRequest } from "./types";

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Builds the GET request for a validated URL. The only header set is
 * `Accept-Encoding: gzip`.
 * @throws {RequestBuildError} If the URL's scheme cannot be requested over HTTP
 */
export function buildRequest(url: URL): TransportRequest {
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new RequestBuildError(`unsupported protocol ${url.protocol} in ${url.href}`);
  }

  const request: TransportRequest = {
    method: "GET",
    url: new URL(url.href),
    headers: Object.freeze({ "Accept-Encoding": GZIP_ENCODING }),
  };
  return Object.freeze(request);
}
