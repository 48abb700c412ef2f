export { classifyCandidate, isVersionToken } from "./appCheck.classifier";
export { PackageCheckLock } from "./appCheck.lock";
export {
  createDefaultAppCheckDependencies,
  evaluateSourceAttempt,
  resolveAppUpdate,
} from "./appCheck.resolver";
export {
  cancelAppCheckRun,
  checkInstalledApp,
  createAppCheckRunner,
  startAppCheckRun,
  waitForAppCheckRun,
} from "./appCheck.runner";
export type {
  AppCheckRunner,
  AppCheckRunnerOptions,
  CheckAppInput,
  StartAppCheckRunInput,
} from "./appCheck.runner";
export {
  appCheckStore,
  getAppCheckRunSnapshot,
  getLastAppCheckResult,
  subscribeToAppCheckResults,
} from "./appCheck.store";
export { CheckThrottle } from "./appCheck.throttle";
export type { CheckThrottleOptions } from "./appCheck.throttle";
export type {
  AppCheckAttempt,
  AppCheckDependencies,
  AppCheckReport,
  AppCheckResultMessage,
  AppCheckRunCurrentItem,
  AppCheckRunSnapshot,
  AppCheckRunStatus,
  AppCheckSkipReason,
  AttemptCommit,
  CheckOutcome,
  CheckOutcomeStatus,
  FatalCheckErrorReason,
  SourceAttempt,
  TransientCheckErrorReason,
  VersionClassification,
} from "./appCheck.types";
