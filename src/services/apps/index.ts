export {
  compareByDisplayName,
  compareBySystem,
  compareBySystemThenUpdateState,
  compareByUpdateState,
  sortInstalledApps,
} from "./apps.comparators";
export {
  createInstalledApp,
  deserializeInstalledApp,
  InstalledAppParseError,
  isSameApp,
  isUpdateAvailable,
  serializeInstalledApp,
  toPersistedInstalledApp,
} from "./apps.model";
export type { PersistedInstalledApp } from "./apps.model";
export {
  applicationStore,
  getInstalledApp,
  listInstalledApps,
  removeInstalledApp,
  updateInstalledApp,
  upsertDiscoveredApps,
} from "./apps.repository";
export type {
  ApplicationStore,
  DiscoveredApp,
  InstalledApp,
  InstalledAppComparator,
} from "./apps.types";
