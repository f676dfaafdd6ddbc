import type { Readable } from "node:stream";
import { Readability, isProbablyReaderable } from "@mozilla/readability";
import { loadDocument, serializeDocument } from "../../utils/dom";
import { ParseError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { readStream } from "../../utils/stream";
import type { EngineCallOptions, ExtractionEngine } from "../types";

/**
 * Article produced by Mozilla Readability: title, byline, excerpt, cleaned
 * HTML content, plain text content and so on.
 */
export type ReadableArticle = NonNullable<ReturnType<Readability["parse"]>>;

export interface ReadabilityEngineOptions {
  /** Minimum number of characters an article must have to be returned */
  charThreshold?: number;
  /** Number of top candidates considered when scoring */
  nbTopCandidates?: number;
  /** Keep class attributes on the extracted content */
  keepClasses?: boolean;
  /** Minimum text length of a node for the readability check */
  minContentLength?: number;
  /** Minimum cumulated score for the readability check */
  minScore?: number;
}

interface ExtractionOptions {
  charThreshold?: number;
  nbTopCandidates?: number;
  keepClasses?: boolean;
}

interface ReaderableOptions {
  minContentLength?: number;
  minScore?: number;
}

/**
 * Extraction engine backed by `@mozilla/readability` on top of jsdom.
 * Streams are read completely and decoded as UTF-8.
 */
export class ReadabilityEngine implements ExtractionEngine<ReadableArticle, Document> {
  private readonly extraction: ExtractionOptions = {};
  private readonly readerable: ReaderableOptions = {};

  constructor(options: ReadabilityEngineOptions = {}) {
    // Readability merges options over its defaults, so unset keys stay absent
    if (options.charThreshold !== undefined) {
      this.extraction.charThreshold = options.charThreshold;
    }
    if (options.nbTopCandidates !== undefined) {
      this.extraction.nbTopCandidates = options.nbTopCandidates;
    }
    if (options.keepClasses !== undefined) {
      this.extraction.keepClasses = options.keepClasses;
    }
    if (options.minContentLength !== undefined) {
      this.readerable.minContentLength = options.minContentLength;
    }
    if (options.minScore !== undefined) {
      this.readerable.minScore = options.minScore;
    }
  }

  async parse(
    input: Readable,
    pageUrl: URL,
    options?: EngineCallOptions,
  ): Promise<ReadableArticle> {
    const html = (await readStream(input, options?.signal)).toString("utf-8");
    return this.extract(html, pageUrl);
  }

  /**
   * Readability rewrites the tree it works on, so extraction runs on a copy
   * and the caller's document stays as it was.
   */
  async parseDocument(document: Document, pageUrl: URL): Promise<ReadableArticle> {
    return this.extract(serializeDocument(document), pageUrl);
  }

  async check(input: Readable, options?: EngineCallOptions): Promise<boolean> {
    const html = (await readStream(input, options?.signal)).toString("utf-8");
    const dom = loadDocument(html, new URL("about:blank"));
    try {
      return this.isReaderable(dom.window.document);
    } finally {
      dom.window.close();
    }
  }

  async checkDocument(document: Document): Promise<boolean> {
    return this.isReaderable(document);
  }

  private extract(html: string, pageUrl: URL): ReadableArticle {
    const dom = loadDocument(html, pageUrl);
    try {
      const article = new Readability(dom.window.document, this.extraction).parse();
      if (!article) {
        throw new ParseError(`no readable content found in ${pageUrl.href}`);
      }
      logger.debug(`Extracted "${article.title}" from ${pageUrl.href}`);
      return article;
    } finally {
      dom.window.close();
    }
  }

  private isReaderable(document: Document): boolean {
    return isProbablyReaderable(document, this.readerable);
  }
}
