export * from "./acquisition";
export { DEFAULT_TIMEOUT_MS } from "./config";
export {
  AcquisitionError,
  CancelledError,
  DecodeError,
  FetchError,
  InvalidUrlError,
  ParseError,
  RequestBuildError,
  UnsupportedContentTypeError,
} from "./utils/errors";
export type { AcquisitionStage } from "./utils/errors";
export { LogLevel, setLogLevel } from "./utils/logger";
export { validateUrl } from "./utils/url";
