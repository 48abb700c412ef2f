import { applicationStore, type ApplicationStore } from "@/services/apps";
import { getAppWatchConfig } from "@/services/config";
import { createLogger } from "@/services/logging";
import { PackageCheckLock } from "./appCheck.lock";
import { createDefaultAppCheckDependencies, resolveAppUpdate } from "./appCheck.resolver";
import { appCheckStore, getAppCheckRunSnapshot } from "./appCheck.store";
import { CheckThrottle } from "./appCheck.throttle";
import type {
  AppCheckAttempt,
  AppCheckDependencies,
  AppCheckRunSnapshot,
} from "./appCheck.types";

export interface CheckAppInput {
  /** Manual checks also run for apps whose last check failed for good. */
  manual?: boolean;
  signal?: AbortSignal;
}

export interface StartAppCheckRunInput {
  packageIds?: string[];
  manual?: boolean;
}

export interface AppCheckRunnerOptions {
  store?: ApplicationStore;
  throttle?: CheckThrottle;
  lock?: PackageCheckLock;
  createDependencies?: (input: {
    store: ApplicationStore;
    signal?: AbortSignal;
  }) => AppCheckDependencies;
  now?: () => number;
}

export interface AppCheckRunner {
  checkApp: (packageId: string, input?: CheckAppInput) => Promise<AppCheckAttempt>;
  startRun: (input?: StartAppCheckRunInput) => AppCheckRunSnapshot;
  cancelRun: () => AppCheckRunSnapshot;
  waitForIdle: () => Promise<void>;
}

interface RunContext {
  runId: number;
  packageIds: string[];
  currentIndex: number;
  manual: boolean;
  abortController: AbortController | null;
}

const logger = createLogger("AppCheckRunner");

const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return "Unknown update run failure.";
};

const countAttempt = (
  snapshot: AppCheckRunSnapshot,
  attempt: AppCheckAttempt
): Partial<AppCheckRunSnapshot> => {
  const processed = snapshot.processed + 1;
  if (attempt.kind === "skipped") {
    return { processed, skipped: snapshot.skipped + 1 };
  }

  const outcome = attempt.report.outcome;
  switch (outcome.status) {
    case "updated":
      return { processed, updated: snapshot.updated + 1 };
    case "success":
      return { processed, upToDate: snapshot.upToDate + 1 };
    case "error":
      return { processed, errors: snapshot.errors + 1, errorMessage: outcome.message };
    case "network_error":
      return {
        processed,
        networkErrors: snapshot.networkErrors + 1,
        errorMessage: outcome.message,
      };
  }
};

export const createAppCheckRunner = (options: AppCheckRunnerOptions = {}): AppCheckRunner => {
  const store = options.store ?? applicationStore;
  const throttle =
    options.throttle ?? new CheckThrottle({ minIntervalMs: getAppWatchConfig().requestDelayMs });
  const lock = options.lock ?? new PackageCheckLock();
  const createDependencies =
    options.createDependencies ??
    ((input) => createDefaultAppCheckDependencies({ store: input.store, signal: input.signal }));
  const now = options.now ?? Date.now;
  const { setRunSnapshot, publishResult } = appCheckStore.getState();

  let activeRunContext: RunContext | null = null;
  let processingPromise: Promise<void> | null = null;

  const performCheck = async (
    packageId: string,
    input: CheckAppInput
  ): Promise<AppCheckAttempt> => {
    const app = store.get(packageId);
    if (!app) {
      return { kind: "skipped", packageId, reason: "not_tracked" };
    }
    if (app.hasFatalError && !input.manual) {
      return { kind: "skipped", packageId, reason: "fatal_error" };
    }

    return throttle.schedule(async (): Promise<AppCheckAttempt> => {
      app.isChecking = true;
      const report = await resolveAppUpdate(
        app,
        createDependencies({ store, signal: input.signal })
      );

      publishResult({
        packageId,
        app: { ...report.app },
        outcome: report.outcome,
        checkedAt: now(),
      });

      logger.debug("check:reported", {
        packageId,
        status: report.outcome.status,
        sourceId: report.outcome.sourceId,
      });
      return { kind: "checked", report };
    });
  };

  const checkApp = (packageId: string, input: CheckAppInput = {}): Promise<AppCheckAttempt> =>
    lock.run(packageId, Boolean(input.manual), () => performCheck(packageId, input));

  const finalizeRun = (
    status: AppCheckRunSnapshot["status"],
    input?: { errorMessage?: string }
  ) => {
    setRunSnapshot({
      status,
      endedAt: now(),
      current: null,
      errorMessage: input?.errorMessage ?? getAppCheckRunSnapshot().errorMessage,
    });
    activeRunContext = null;
  };

  const runCheckLoop = (): Promise<void> => {
    if (processingPromise) {
      return processingPromise;
    }

    processingPromise = (async () => {
      try {
        while (activeRunContext) {
          const context = activeRunContext;
          const snapshot = getAppCheckRunSnapshot();
          if (snapshot.status !== "running" || snapshot.runId !== context.runId) {
            break;
          }

          const packageId = context.packageIds[context.currentIndex];
          if (packageId === undefined) {
            finalizeRun("completed");
            break;
          }

          setRunSnapshot({
            current: {
              packageId,
              displayName: store.get(packageId)?.displayName ?? packageId,
            },
          });

          const abortController = new AbortController();
          context.abortController = abortController;

          try {
            const attempt = await checkApp(packageId, {
              manual: context.manual,
              signal: abortController.signal,
            });

            const nextSnapshot = getAppCheckRunSnapshot();
            if (nextSnapshot.status !== "running" || nextSnapshot.runId !== context.runId) {
              // Cancelled or superseded while the check was in flight.
              continue;
            }

            setRunSnapshot({
              ...countAttempt(nextSnapshot, attempt),
              current: null,
            });
          } finally {
            context.abortController = null;
            context.currentIndex += 1;
          }
        }
      } catch (error) {
        logger.error("run:failed", { message: toErrorMessage(error) });
        finalizeRun("failed", { errorMessage: toErrorMessage(error) });
      } finally {
        processingPromise = null;
      }
    })();

    return processingPromise;
  };

  const startRun = (input: StartAppCheckRunInput = {}): AppCheckRunSnapshot => {
    const snapshot = getAppCheckRunSnapshot();
    if (snapshot.status === "running") {
      return snapshot;
    }

    const packageIds = input.packageIds ?? store.list().map((app) => app.packageId);
    const startedAt = now();
    const runId = Math.max(startedAt, (snapshot.runId ?? 0) + 1);

    activeRunContext = {
      runId,
      packageIds,
      currentIndex: 0,
      manual: Boolean(input.manual),
      abortController: null,
    };

    setRunSnapshot({
      runId,
      status: packageIds.length > 0 ? "running" : "completed",
      total: packageIds.length,
      processed: 0,
      updated: 0,
      upToDate: 0,
      errors: 0,
      networkErrors: 0,
      skipped: 0,
      startedAt,
      endedAt: packageIds.length > 0 ? null : startedAt,
      current: null,
      errorMessage: null,
    });

    if (packageIds.length === 0) {
      activeRunContext = null;
      return getAppCheckRunSnapshot();
    }

    void runCheckLoop();
    return getAppCheckRunSnapshot();
  };

  const cancelRun = (): AppCheckRunSnapshot => {
    const snapshot = getAppCheckRunSnapshot();
    if (snapshot.status !== "running") {
      return snapshot;
    }

    activeRunContext?.abortController?.abort();
    activeRunContext = null;

    setRunSnapshot({
      status: "cancelled",
      endedAt: now(),
      current: null,
      errorMessage: null,
    });

    return getAppCheckRunSnapshot();
  };

  const waitForIdle = async (): Promise<void> => {
    while (processingPromise) {
      await processingPromise;
    }
  };

  return {
    checkApp,
    startRun,
    cancelRun,
    waitForIdle,
  };
};

let defaultRunner: AppCheckRunner | null = null;

const getDefaultRunner = (): AppCheckRunner => {
  if (!defaultRunner) {
    defaultRunner = createAppCheckRunner();
  }
  return defaultRunner;
};

export const checkInstalledApp = (
  packageId: string,
  input?: CheckAppInput
): Promise<AppCheckAttempt> => getDefaultRunner().checkApp(packageId, input);

export const startAppCheckRun = (input?: StartAppCheckRunInput): AppCheckRunSnapshot =>
  getDefaultRunner().startRun(input);

export const cancelAppCheckRun = (): AppCheckRunSnapshot => getDefaultRunner().cancelRun();

export const waitForAppCheckRun = (): Promise<void> => getDefaultRunner().waitForIdle();
