import type { Readable } from "node:stream";
import { DEFAULT_TIMEOUT_MS } from "../config";
import { AcquisitionError, FetchError, ParseError } from "../utils/errors";
import { logger } from "../utils/logger";
import { destroyOnAbort, throwIfCancelled } from "../utils/stream";
import { resolvePageUrl, validateUrl } from "../utils/url";
import { decodeBody } from "./decoding/decodeBody";
import { assertHtmlContentType } from "./gate/assertHtmlContentType";
import { HttpTransport } from "./transport/HttpTransport";
import { buildRequest } from "./transport/request";
import type { ResponseHandle, Transport } from "./transport/types";
import type {
  AcquisitionPipelineOptions,
  EngineProvider,
  ExtractionEngine,
  SourceDescriptor,
  StreamAcquisitionOptions,
  UrlAcquisitionOptions,
} from "./types";

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function classifyTransportFailure(error: unknown, url: string): AcquisitionError {
  if (error instanceof AcquisitionError) {
    return error;
  }
  if (error instanceof Error) {
    return new FetchError(url, error.message, { code: errorCode(error), cause: error });
  }
  return new FetchError(url, String(error));
}

/**
 * Maps an engine failure onto the error taxonomy. Errors raised by the
 * pipeline's own streams (decode, transport, cancellation) are already typed
 * and pass through. A stream that failed underneath the engine is a
 * transport failure; everything else is the engine's own ParseError.
 */
function classifyEngineFailure(
  error: unknown,
  source: string,
  stream?: Readable,
): AcquisitionError {
  if (error instanceof AcquisitionError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new ParseError(String(error));
  }
  if (stream?.errored === error) {
    return new FetchError(source, error.message, { code: errorCode(error), cause: error });
  }
  return new ParseError(error.message, error);
}

/**
 * Acquires a page and hands it to an extraction engine:
 * URL validation, transport, transfer-encoding normalization, media-type
 * gate, then dispatch. Every stage fails fast with a typed error and nothing
 * is retried.
 *
 * Streams handed to the pipeline belong to it from then on; they are
 * destroyed on every return path, decompression stages before the body they
 * wrap.
 */
export class AcquisitionPipeline<TArticle, TDocument> {
  private readonly engine: EngineProvider<TArticle, TDocument>;
  private readonly transport: Transport;
  private readonly timeout: number;

  constructor(options: AcquisitionPipelineOptions<TArticle, TDocument>) {
    this.engine = options.engine;
    this.transport = options.transport ?? new HttpTransport();
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Acquires from any of the three source forms.
   */
  async acquire(source: SourceDescriptor<TDocument>): Promise<TArticle> {
    switch (source.kind) {
      case "url":
        return this.acquireFromUrl(source.url, {
          timeout: source.timeout,
          signal: source.signal,
        });
      case "stream":
        return this.acquireFromStream(source.stream, source.resolvedUrl, {
          signal: source.signal,
        });
      case "document":
        return this.acquireFromDocument(source.document, source.resolvedUrl);
    }
  }

  /**
   * Fetches the page and extracts its article.
   * @throws {InvalidUrlError} Before any network activity, if the URL is malformed
   * @throws {RequestBuildError} If no HTTP request can be built for the URL
   * @throws {FetchError} On transport failures, timeouts included
   * @throws {DecodeError} If a gzip body is corrupt
   * @throws {UnsupportedContentTypeError} If the response is not HTML
   * @throws {ParseError} If the engine fails
   * @throws {CancelledError} If the signal aborts
   */
  async acquireFromUrl(url: string, options: UrlAcquisitionOptions = {}): Promise<TArticle> {
    const pageUrl = validateUrl(url);
    const request = buildRequest(pageUrl);
    const timeout = options.timeout ?? this.timeout;
    throwIfCancelled(options.signal);

    logger.info(`📡 Fetching ${pageUrl.href}...`);
    let response: ResponseHandle;
    try {
      response = await this.transport.execute(request, { timeout, signal: options.signal });
    } catch (error) {
      throw classifyTransportFailure(error, pageUrl.href);
    }

    if (response.status < 200 || response.status >= 300) {
      logger.warn(`${pageUrl.href} answered with HTTP ${response.status}`);
    }

    const body = decodeBody(response);
    try {
      assertHtmlContentType(response.contentType);
      logger.debug(`Extracting ${pageUrl.href} (${response.contentType})`);
      return await this.parse(body.stream, pageUrl, options.signal);
    } finally {
      body.close();
    }
  }

  /**
   * Extracts the article from an HTML byte stream. The URL is provenance
   * only and is not fetched.
   */
  async acquireFromStream(
    stream: Readable,
    resolvedUrl: URL | string,
    options: StreamAcquisitionOptions = {},
  ): Promise<TArticle> {
    try {
      const pageUrl = resolvePageUrl(resolvedUrl);
      throwIfCancelled(options.signal);
      return await this.parse(stream, pageUrl, options.signal);
    } finally {
      stream.destroy();
    }
  }

  /**
   * Extracts the article from an already built document.
   */
  async acquireFromDocument(document: TDocument, resolvedUrl: URL | string): Promise<TArticle> {
    const pageUrl = resolvePageUrl(resolvedUrl);
    const engine = this.createEngine();
    try {
      return await engine.parseDocument(document, pageUrl);
    } catch (error) {
      throw classifyEngineFailure(error, pageUrl.href);
    }
  }

  /**
   * Reports whether the stream looks readable. No article is built.
   */
  async checkStream(stream: Readable, options: StreamAcquisitionOptions = {}): Promise<boolean> {
    try {
      throwIfCancelled(options.signal);
      const engine = this.createEngine();
      const detach = destroyOnAbort(stream, options.signal);
      try {
        return await engine.check(stream, { signal: options.signal });
      } catch (error) {
        throw classifyEngineFailure(error, "input stream", stream);
      } finally {
        detach();
      }
    } finally {
      stream.destroy();
    }
  }

  /**
   * Reports whether the document looks readable. No article is built.
   */
  async checkDocument(document: TDocument): Promise<boolean> {
    const engine = this.createEngine();
    try {
      return await engine.checkDocument(document);
    } catch (error) {
      throw classifyEngineFailure(error, "document");
    }
  }

  private async parse(stream: Readable, pageUrl: URL, signal?: AbortSignal): Promise<TArticle> {
    const engine = this.createEngine();
    const detach = destroyOnAbort(stream, signal);
    try {
      return await engine.parse(stream, pageUrl, { signal });
    } catch (error) {
      throw classifyEngineFailure(error, pageUrl.href, stream);
    } finally {
      detach();
    }
  }

  private createEngine(): ExtractionEngine<TArticle, TDocument> {
    return typeof this.engine === "function" ? this.engine() : this.engine;
  }
}
