import { applicationStore, type InstalledApp } from "@/services/apps";
import { createLogger } from "@/services/logging";
import {
  extractSourceVersion,
  fetchSourcePage,
  getCascadeSources,
  type FetchOutcome,
  type SourceAdapter,
} from "@/services/source";
import { classifyCandidate } from "./appCheck.classifier";
import type {
  AppCheckDependencies,
  AppCheckReport,
  AttemptCommit,
  CheckOutcome,
  SourceAttempt,
} from "./appCheck.types";

const NO_SOURCES_MESSAGE = "No update sources are registered.";

const logger = createLogger("AppCheck");

const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return "Unknown update check failure.";
};

const noCommit: AttemptCommit = { kind: "none" };

const evaluatePage = (
  adapter: SourceAdapter,
  pageText: string,
  installedVersion: string | null
): SourceAttempt => {
  const sourceId = adapter.descriptor.id;
  const extraction = extractSourceVersion(adapter, pageText);

  if (extraction.kind === "unavailable") {
    return {
      outcome: {
        status: "error",
        sourceId,
        reason: "unavailable",
        message: `${adapter.descriptor.name} reports this application is no longer available.`,
      },
      commit: { kind: "commit", latestVersion: undefined, hasFatalError: true },
    };
  }

  if (extraction.kind === "not_found") {
    return {
      outcome: {
        status: "error",
        sourceId,
        reason: "malformed_page",
        message: `No version found on ${adapter.descriptor.name}. The page format may have changed.`,
      },
      commit: { kind: "commit", latestVersion: undefined, hasFatalError: true },
    };
  }

  const classification = classifyCandidate(extraction.candidate, installedVersion);
  if (classification.kind === "not_a_version") {
    return {
      outcome: {
        status: "error",
        sourceId,
        reason: "non_version",
        message: classification.candidate,
      },
      commit: { kind: "commit", latestVersion: classification.candidate, hasFatalError: true },
    };
  }

  return {
    outcome: {
      status: classification.isUpdate ? "updated" : "success",
      sourceId,
      version: classification.version,
    },
    commit: { kind: "commit", latestVersion: classification.version, hasFatalError: false },
  };
};

export const evaluateSourceAttempt = (
  adapter: SourceAdapter,
  fetchOutcome: FetchOutcome,
  installedVersion: string | null
): SourceAttempt => {
  const sourceId = adapter.descriptor.id;

  switch (fetchOutcome.kind) {
    case "success":
      return evaluatePage(adapter, fetchOutcome.body, installedVersion);
    case "not_found":
      return {
        outcome: { status: "error", sourceId, reason: "not_found", message: fetchOutcome.message },
        commit: { kind: "commit", latestVersion: fetchOutcome.message, hasFatalError: true },
      };
    case "network_error":
      return {
        outcome: {
          status: "network_error",
          sourceId,
          reason: "network",
          message: fetchOutcome.message,
        },
        commit: noCommit,
      };
    case "other_error":
      return {
        outcome: {
          status: "network_error",
          sourceId,
          reason: "transport",
          message: fetchOutcome.message,
        },
        commit: noCommit,
      };
  }
};

const commitAttempt = (
  app: InstalledApp,
  commit: AttemptCommit,
  dependencies: AppCheckDependencies
): void => {
  if (commit.kind === "none") {
    return;
  }

  const changes: Pick<InstalledApp, "latestVersion" | "hasFatalError" | "lastCheckedAt"> = {
    latestVersion: commit.latestVersion === undefined ? app.latestVersion : commit.latestVersion,
    hasFatalError: commit.hasFatalError,
    lastCheckedAt: dependencies.now(),
  };

  // The record only changes once the store has accepted the new state.
  dependencies.store.updateApp({ ...app, ...changes, isChecking: false });
  Object.assign(app, changes);
};

/**
 * Walks the source cascade for one app. A fatal error moves on to the next
 * source, a version stops the cascade, and a transient failure stops it without
 * touching the record so the next scheduled check starts over.
 */
export const resolveAppUpdate = async (
  app: InstalledApp,
  dependencies: AppCheckDependencies
): Promise<AppCheckReport> => {
  let attempt: SourceAttempt | null = null;

  try {
    for (const adapter of dependencies.sources) {
      app.isChecking = true;
      const fetchOutcome = await dependencies.fetchPage(adapter, app.packageId, {
        signal: dependencies.signal,
      });
      attempt = evaluateSourceAttempt(adapter, fetchOutcome, app.installedVersion);

      logger.debug("attempt:complete", {
        packageId: app.packageId,
        sourceId: adapter.descriptor.id,
        status: attempt.outcome.status,
      });

      if (attempt.outcome.status !== "error") {
        break;
      }
    }

    if (!attempt) {
      return {
        app,
        outcome: {
          status: "network_error",
          sourceId: null,
          reason: "transport",
          message: NO_SOURCES_MESSAGE,
        },
      };
    }

    commitAttempt(app, attempt.commit, dependencies);
    return { app, outcome: attempt.outcome };
  } catch (error) {
    logger.error("check:failed", {
      packageId: app.packageId,
      message: toErrorMessage(error),
    });
    const outcome: CheckOutcome = {
      status: "network_error",
      sourceId: attempt?.outcome.sourceId ?? null,
      reason: "transport",
      message: toErrorMessage(error),
    };
    return { app, outcome };
  } finally {
    app.isChecking = false;
  }
};

export const createDefaultAppCheckDependencies = (
  overrides: Partial<AppCheckDependencies> = {}
): AppCheckDependencies => ({
  store: applicationStore,
  fetchPage: fetchSourcePage,
  sources: getCascadeSources(),
  now: Date.now,
  ...overrides,
});
