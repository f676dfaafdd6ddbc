export { AcquisitionPipeline } from "./AcquisitionPipeline";
export { createReadabilityPipeline } from "./createReadabilityPipeline";
export type { ReadabilityPipelineOptions } from "./createReadabilityPipeline";
export { DecodedBody, decodeBody } from "./decoding/decodeBody";
export { ReadabilityEngine } from "./engines/ReadabilityEngine";
export type { ReadableArticle, ReadabilityEngineOptions } from "./engines/ReadabilityEngine";
export { assertHtmlContentType, isHtmlContentType } from "./gate/assertHtmlContentType";
export { HttpTransport } from "./transport/HttpTransport";
export { buildRequest } from "./transport/request";
export type {
  ResponseHandle,
  Transport,
  TransportOptions,
  TransportRequest,
} from "./transport/types";
export type {
  AcquisitionPipelineOptions,
  EngineCallOptions,
  EngineProvider,
  ExtractionEngine,
  SourceDescriptor,
  StreamAcquisitionOptions,
  UrlAcquisitionOptions,
} from "./types";
