export { createSourceCascade } from "./cascade";
export { extractSourceVersion, formatSourceUrl } from "./extractor";
export {
  DuplicateSourceError,
  SourceRequestError,
  SourceSystemError,
  toSourceRequestError,
} from "./errors";
export type {
  ExtractionResult,
  FetchOutcome,
  FetchSourcePageOptions,
  SourceAdapter,
  SourceDescriptor,
  SourceId,
  SourcePageFetcher,
} from "./types";
