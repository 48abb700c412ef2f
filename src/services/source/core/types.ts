export type SourceId = string;

export interface SourceDescriptor {
  id: SourceId;
  name: string;
  /** Page URL with a single `%s` slot for the package identifier. */
  urlTemplate: string;
  headers?: Record<string, string>;
}

export interface SourceAdapter {
  descriptor: SourceDescriptor;
  /** Group 1 of the first match is the candidate version. */
  versionPattern: RegExp;
  /** Only consulted when `versionPattern` finds nothing. */
  unavailablePattern?: RegExp;
}

export type FetchOutcome =
  | { kind: "success"; body: string }
  | { kind: "not_found"; message: string; fatal: true }
  | { kind: "network_error"; message: string; fatal: false }
  | { kind: "other_error"; message: string; fatal: false };

export type ExtractionResult =
  | { kind: "found"; candidate: string }
  | { kind: "unavailable" }
  | { kind: "not_found" };

export interface FetchSourcePageOptions {
  signal?: AbortSignal;
}

export type SourcePageFetcher = (
  adapter: SourceAdapter,
  packageId: string,
  options?: FetchSourcePageOptions
) => Promise<FetchOutcome>;
