import type { Readable } from "node:stream";
import type { Transport } from "./transport/types";

/**
 * Per-call options an engine receives alongside a stream.
 */
export interface EngineCallOptions {
  /** AbortSignal for cancellation while the stream is read */
  signal?: AbortSignal;
}

/**
 * Content-extraction engine the pipeline dispatches to. It decides what part
 * of a page is readable; the pipeline only delivers the page.
 */
export interface ExtractionEngine<TArticle, TDocument> {
  /** Extracts the article from an HTML byte stream. */
  parse(input: Readable, pageUrl: URL, options?: EngineCallOptions): Promise<TArticle>;
  /** Extracts the article from an already built document. */
  parseDocument(document: TDocument, pageUrl: URL): Promise<TArticle>;
  /** Reports whether the stream looks readable, without extracting anything. */
  check(input: Readable, options?: EngineCallOptions): Promise<boolean>;
  /** Reports whether the document looks readable, without extracting anything. */
  checkDocument(document: TDocument): Promise<boolean>;
}

/**
 * Either one engine reused by every call, or a factory invoked once per call.
 */
export type EngineProvider<TArticle, TDocument> =
  | ExtractionEngine<TArticle, TDocument>
  | (() => ExtractionEngine<TArticle, TDocument>);

/**
 * What a single acquisition starts from.
 */
export type SourceDescriptor<TDocument> =
  | { kind: "url"; url: string; timeout?: number; signal?: AbortSignal }
  | { kind: "stream"; stream: Readable; resolvedUrl: URL | string; signal?: AbortSignal }
  | { kind: "document"; document: TDocument; resolvedUrl: URL | string };

export interface AcquisitionPipelineOptions<TArticle, TDocument> {
  engine: EngineProvider<TArticle, TDocument>;
  /** Defaults to an axios-backed {@link HttpTransport} */
  transport?: Transport;
  /** Default timeout in milliseconds for URL acquisitions */
  timeout?: number;
}

export interface UrlAcquisitionOptions {
  /** Overrides the pipeline's timeout for this call */
  timeout?: number;
  signal?: AbortSignal;
}

export interface StreamAcquisitionOptions {
  signal?: AbortSignal;
}
