import type { SourceAdapter } from "../core";
import { appBrainAdapter } from "./appbrain";
import { playStoreAdapter } from "./playstore";
import { xposedAdapter } from "./xposed";

// Cascade order: storefront first, then the mirrors.
export const builtInSourceAdapters: SourceAdapter[] = [
  playStoreAdapter,
  appBrainAdapter,
  xposedAdapter,
];

export { APPBRAIN_SOURCE_ID, appBrainAdapter } from "./appbrain";
export { PLAY_STORE_SOURCE_ID, playStoreAdapter } from "./playstore";
export { XPOSED_STABLE_SOURCE_ID, xposedAdapter } from "./xposed";
