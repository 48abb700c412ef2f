import { createSourceCascade } from "./core";
import type { SourceAdapter } from "./core";
import { builtInSourceAdapters } from "./sources";

let builtInCascade: readonly SourceAdapter[] | null = null;

export const getCascadeSources = (): SourceAdapter[] => {
  if (!builtInCascade) {
    builtInCascade = createSourceCascade(builtInSourceAdapters);
  }
  return [...builtInCascade];
};
