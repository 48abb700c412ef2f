export interface InstalledApp {
  packageId: string;
  displayName: string;
  installedVersion: string | null;
  /** `null` until a check has completed. */
  latestVersion: string | null;
  /** Set when the last check failed in a way that retrying will not fix. */
  hasFatalError: boolean;
  lastCheckedAt: number | null;
  isSystemApp: boolean;
  /** Transient, never persisted. */
  isChecking: boolean;
}

export interface DiscoveredApp {
  packageId: string;
  displayName: string;
  installedVersion: string | null;
  isSystemApp: boolean;
}

export interface ApplicationStore {
  get: (packageId: string) => InstalledApp | undefined;
  updateApp: (app: InstalledApp) => void;
  list: () => InstalledApp[];
}

export type InstalledAppComparator = (first: InstalledApp, second: InstalledApp) => number;
