import { Readable } from "node:stream";
import type { ExtractionEngine, EngineCallOptions } from "../acquisition/types";
import type {
  ResponseHandle,
  Transport,
  TransportOptions,
  TransportRequest,
} from "../acquisition/transport/types";
import { readStream } from "../utils/stream";

/**
 * Readable over fixed chunks that counts how often it is destroyed. Auto
 * destroy is off so that only explicit releases are counted.
 */
export class CountingReadable extends Readable {
  destroyCalls = 0;
  private readonly pending: Buffer[];

  constructor(chunks: Array<Buffer | string>, private readonly failWith?: Error) {
    super({ autoDestroy: false });
    this.pending = chunks.map((chunk) => (typeof chunk === "string" ? Buffer.from(chunk) : chunk));
  }

  _read(): void {
    const next = this.pending.shift();
    if (next) {
      this.push(next);
    } else if (this.failWith) {
      this.destroy(this.failWith);
    } else {
      this.push(null);
    }
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.destroyCalls += 1;
    callback(error);
  }
}

export interface FakeResponse {
  status?: number;
  body: Readable;
  contentEncoding?: string;
  contentType?: string;
}

/**
 * Transport that records its requests and answers every one with the same
 * canned response or failure.
 */
export class FakeTransport implements Transport {
  readonly requests: Array<{ request: TransportRequest; options: TransportOptions }> = [];

  constructor(private readonly outcome: FakeResponse | Error) {}

  get calls(): number {
    return this.requests.length;
  }

  async execute(request: TransportRequest, options: TransportOptions): Promise<ResponseHandle> {
    this.requests.push({ request, options });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return {
      url: request.url,
      status: this.outcome.status ?? 200,
      body: this.outcome.body,
      contentEncoding: this.outcome.contentEncoding,
      contentType: this.outcome.contentType,
    };
  }
}

export interface FakeArticle {
  html: string;
  url: string;
}

/**
 * Engine that returns the bytes it was handed. Documents are plain strings.
 */
export class FakeEngine implements ExtractionEngine<FakeArticle, string> {
  parseCalls = 0;
  checkCalls = 0;
  received: Buffer | undefined;

  constructor(private readonly failWith?: Error) {}

  async parse(input: Readable, pageUrl: URL, options?: EngineCallOptions): Promise<FakeArticle> {
    this.parseCalls += 1;
    this.received = await readStream(input, options?.signal);
    if (this.failWith) {
      throw this.failWith;
    }
    return { html: this.received.toString("utf-8"), url: pageUrl.href };
  }

  async parseDocument(document: string, pageUrl: URL): Promise<FakeArticle> {
    this.parseCalls += 1;
    if (this.failWith) {
      throw this.failWith;
    }
    return { html: document, url: pageUrl.href };
  }

  async check(input: Readable, options?: EngineCallOptions): Promise<boolean> {
    this.checkCalls += 1;
    this.received = await readStream(input, options?.signal);
    return this.received.includes("<article");
  }

  async checkDocument(document: string): Promise<boolean> {
    this.checkCalls += 1;
    return document.includes("<article");
  }
}
