import { AcquisitionPipeline } from "./AcquisitionPipeline";
import {
  type ReadableArticle,
  ReadabilityEngine,
  type ReadabilityEngineOptions,
} from "./engines/ReadabilityEngine";
import type { Transport } from "./transport/types";

export interface ReadabilityPipelineOptions extends ReadabilityEngineOptions {
  transport?: Transport;
  /** Default timeout in milliseconds for URL acquisitions */
  timeout?: number;
}

/**
 * Builds a pipeline that extracts with Mozilla Readability. Every call gets
 * a fresh {@link ReadabilityEngine}, so pipelines can be shared freely.
 */
export function createReadabilityPipeline(
  options: ReadabilityPipelineOptions = {},
): AcquisitionPipeline<ReadableArticle, Document> {
  const { transport, timeout, ...engineOptions } = options;
  return new AcquisitionPipeline({
    engine: () => new ReadabilityEngine(engineOptions),
    transport,
    timeout,
  });
}
