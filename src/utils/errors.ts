/**
 * Pipeline stage that produced an {@link AcquisitionError}.
 */
type AcquisitionStage =
  | "validate"
  | "request"
  | "transport"
  | "decode"
  | "gate"
  | "extract"
  | "cancel";

class AcquisitionError extends Error {
  constructor(
    message: string,
    public readonly stage: AcquisitionStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

class InvalidUrlError extends AcquisitionError {
  constructor(
    public readonly url: string,
    cause?: Error,
  ) {
    super(`Invalid URL: ${url}`, "validate", cause);
  }
}

class RequestBuildError extends AcquisitionError {
  constructor(message: string, cause?: Error) {
    super(`Failed to create request: ${message}`, "request", cause);
  }
}

interface FetchErrorDetails {
  /** Transport error code, e.g. ECONNREFUSED or ECONNABORTED */
  code?: string;
  timedOut?: boolean;
  cause?: Error;
}

class FetchError extends AcquisitionError {
  public readonly code?: string;
  public readonly timedOut: boolean;

  constructor(
    public readonly url: string,
    message: string,
    details: FetchErrorDetails = {},
  ) {
    super(`Failed to fetch ${url}: ${message}`, "transport", details.cause);
    this.code = details.code;
    this.timedOut = details.timedOut ?? false;
  }
}

class DecodeError extends AcquisitionError {
  constructor(message: string, cause?: Error) {
    super(`Failed to decode gzip body: ${message}`, "decode", cause);
  }
}

class UnsupportedContentTypeError extends AcquisitionError {
  constructor(public readonly contentType: string | undefined) {
    super(
      `URL is not a HTML document (content-type: ${contentType ?? "none"})`,
      "gate",
    );
  }
}

class ParseError extends AcquisitionError {
  constructor(message: string, cause?: Error) {
    super(`Failed to parse content: ${message}`, "extract", cause);
  }
}

class CancelledError extends AcquisitionError {
  constructor(cause?: Error) {
    super("Acquisition was cancelled", "cancel", cause);
  }
}

export {
  AcquisitionError,
  InvalidUrlError,
  RequestBuildError,
  FetchError,
  DecodeError,
  UnsupportedContentTypeError,
  ParseError,
  CancelledError,
};

export type { AcquisitionStage, FetchErrorDetails };
