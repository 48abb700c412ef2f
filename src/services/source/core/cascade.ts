import { DuplicateSourceError } from "./errors";
import type { SourceAdapter } from "./types";

/**
 * Freezes adapters into the order they are tried in. Each source id may appear
 * once.
 */
export const createSourceCascade = (adapters: readonly SourceAdapter[]): readonly SourceAdapter[] => {
  const seenIds = new Set<string>();

  adapters.forEach((adapter) => {
    if (seenIds.has(adapter.descriptor.id)) {
      throw new DuplicateSourceError(adapter.descriptor.id);
    }
    seenIds.add(adapter.descriptor.id);
  });

  return Object.freeze([...adapters]);
};
