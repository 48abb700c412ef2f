import { isUpdateAvailable } from "./apps.model";
import type { InstalledApp, InstalledAppComparator } from "./apps.types";

const compareStrings = (first: string, second: string): number => {
  if (first < second) {
    return -1;
  }
  return first > second ? 1 : 0;
};

/**
 * Alphabetical by display name. Display names are not unique, so the package
 * identifier breaks ties.
 */
export const compareByDisplayName: InstalledAppComparator = (first, second) =>
  compareStrings(first.displayName, second.displayName) ||
  compareStrings(first.packageId, second.packageId);

/** User apps before system apps, alphabetical inside each group. */
export const compareBySystem: InstalledAppComparator = (first, second) => {
  if (first.isSystemApp !== second.isSystemApp) {
    return first.isSystemApp ? 1 : -1;
  }
  return compareByDisplayName(first, second);
};

const getUpdateRank = (app: InstalledApp): number => {
  if (app.latestVersion === null) {
    return 0;
  }
  if (app.hasFatalError) {
    return 3;
  }
  return isUpdateAvailable(app) ? 1 : 2;
};

/**
 * Apps never checked first, then available updates, then up-to-date apps, then
 * apps whose last check failed for good.
 */
export const compareByUpdateState: InstalledAppComparator = (first, second) =>
  getUpdateRank(first) - getUpdateRank(second) || compareByDisplayName(first, second);

export const compareBySystemThenUpdateState: InstalledAppComparator = (first, second) => {
  if (first.isSystemApp !== second.isSystemApp) {
    return first.isSystemApp ? 1 : -1;
  }
  return compareByUpdateState(first, second);
};

export const sortInstalledApps = (
  apps: readonly InstalledApp[],
  comparator: InstalledAppComparator = compareBySystemThenUpdateState
): InstalledApp[] => [...apps].sort(comparator);
