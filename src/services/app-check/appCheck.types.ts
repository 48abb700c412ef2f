import type { ApplicationStore, InstalledApp } from "@/services/apps";
import type { SourceAdapter, SourceId, SourcePageFetcher } from "@/services/source";

export type FatalCheckErrorReason = "not_found" | "unavailable" | "malformed_page" | "non_version";

export type TransientCheckErrorReason = "network" | "transport";

export type CheckOutcome =
  | { status: "success"; sourceId: SourceId; version: string }
  | { status: "updated"; sourceId: SourceId; version: string }
  | { status: "error"; sourceId: SourceId; reason: FatalCheckErrorReason; message: string }
  | {
      status: "network_error";
      sourceId: SourceId | null;
      reason: TransientCheckErrorReason;
      message: string;
    };

export type CheckOutcomeStatus = CheckOutcome["status"];

export type VersionClassification =
  | { kind: "valid"; version: string; isUpdate: boolean }
  | { kind: "not_a_version"; candidate: string };

/**
 * What a single source attempt wants written onto the record if it turns out to
 * be the terminal attempt of the cascade.
 */
export type AttemptCommit =
  | { kind: "none" }
  | { kind: "commit"; latestVersion: string | null | undefined; hasFatalError: boolean };

export interface SourceAttempt {
  outcome: CheckOutcome;
  commit: AttemptCommit;
}

export interface AppCheckDependencies {
  store: Pick<ApplicationStore, "updateApp">;
  fetchPage: SourcePageFetcher;
  sources: SourceAdapter[];
  now: () => number;
  signal?: AbortSignal;
}

export interface AppCheckReport {
  app: InstalledApp;
  outcome: CheckOutcome;
}

export interface AppCheckResultMessage extends AppCheckReport {
  packageId: string;
  checkedAt: number;
}

export type AppCheckSkipReason = "not_tracked" | "fatal_error";

export type AppCheckAttempt =
  | { kind: "checked"; report: AppCheckReport }
  | { kind: "skipped"; packageId: string; reason: AppCheckSkipReason };

export type AppCheckRunStatus = "idle" | "running" | "completed" | "cancelled" | "failed";

export interface AppCheckRunCurrentItem {
  packageId: string;
  displayName: string;
}

export interface AppCheckRunSnapshot {
  runId: number | null;
  status: AppCheckRunStatus;
  total: number;
  processed: number;
  updated: number;
  upToDate: number;
  errors: number;
  networkErrors: number;
  skipped: number;
  startedAt: number | null;
  endedAt: number | null;
  current: AppCheckRunCurrentItem | null;
  errorMessage: string | null;
}
