import type { ExtractionResult, SourceAdapter } from "./types";

const PACKAGE_ID_SLOT = "%s";

export const formatSourceUrl = (urlTemplate: string, packageId: string): string =>
  urlTemplate.replace(PACKAGE_ID_SLOT, encodeURIComponent(packageId));

export const extractSourceVersion = (
  adapter: SourceAdapter,
  pageText: string
): ExtractionResult => {
  const match = adapter.versionPattern.exec(pageText);
  const captured = match?.[1];
  if (captured !== undefined) {
    return { kind: "found", candidate: captured.trim() };
  }

  if (adapter.unavailablePattern?.test(pageText)) {
    return { kind: "unavailable" };
  }

  return { kind: "not_found" };
};
