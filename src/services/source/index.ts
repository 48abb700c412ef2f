export * from "./core";
export {
  classifyFetchError,
  createSourcePageFetcher,
  fetchSourcePage,
  NETWORK_ERROR_MESSAGE,
  NOT_FOUND_MESSAGE,
  PAGE_READ_CHUNK_BYTES,
  readStreamText,
} from "./http/request";
export { createSourceHttpClient, getSourceHttpClient } from "./http/client";
export { getCascadeSources } from "./cascade";
export {
  APPBRAIN_SOURCE_ID,
  appBrainAdapter,
  builtInSourceAdapters,
  PLAY_STORE_SOURCE_ID,
  playStoreAdapter,
  XPOSED_STABLE_SOURCE_ID,
  xposedAdapter,
} from "./sources";
