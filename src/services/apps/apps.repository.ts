import { asc, eq, inArray } from "drizzle-orm";
import { getDatabase, installedApps, persistDatabase, type InstalledAppRow } from "@/services/db";
import { createInstalledApp } from "./apps.model";
import type { ApplicationStore, DiscoveredApp, InstalledApp } from "./apps.types";

const mapInstalledApp = (row: InstalledAppRow): InstalledApp => ({
  packageId: row.packageId,
  displayName: row.displayName,
  installedVersion: row.installedVersion,
  latestVersion: row.latestVersion,
  hasFatalError: row.hasFatalError,
  lastCheckedAt: row.lastCheckedAt,
  isSystemApp: row.isSystemApp,
  isChecking: false,
});

export const getInstalledApp = (packageId: string): InstalledApp | undefined => {
  const row = getDatabase()
    .select()
    .from(installedApps)
    .where(eq(installedApps.packageId, packageId))
    .limit(1)
    .get();

  return row ? mapInstalledApp(row) : undefined;
};

export const listInstalledApps = (): InstalledApp[] =>
  getDatabase()
    .select()
    .from(installedApps)
    .orderBy(asc(installedApps.displayName), asc(installedApps.packageId))
    .all()
    .map(mapInstalledApp);

export const updateInstalledApp = (app: InstalledApp): void => {
  const now = Date.now();

  getDatabase()
    .insert(installedApps)
    .values({
      packageId: app.packageId,
      displayName: app.displayName,
      installedVersion: app.installedVersion,
      latestVersion: app.latestVersion,
      hasFatalError: app.hasFatalError,
      lastCheckedAt: app.lastCheckedAt,
      isSystemApp: app.isSystemApp,
      createdAt: now,
      updatedAt: now,
    })
    .onConflictDoUpdate({
      target: installedApps.packageId,
      set: {
        displayName: app.displayName,
        installedVersion: app.installedVersion,
        latestVersion: app.latestVersion,
        hasFatalError: app.hasFatalError,
        lastCheckedAt: app.lastCheckedAt,
        updatedAt: now,
      },
    })
    .run();
  persistDatabase();
};

/**
 * Inserts apps seen for the first time and refreshes the name and installed
 * version of known ones. Check state of known apps is kept as is.
 */
export const upsertDiscoveredApps = (apps: DiscoveredApp[]): InstalledApp[] => {
  if (apps.length === 0) {
    return [];
  }

  const db = getDatabase();
  const now = Date.now();

  db.transaction((tx) => {
    apps.forEach((app) => {
      const initial = createInstalledApp(app);
      tx.insert(installedApps)
        .values({
          packageId: initial.packageId,
          displayName: initial.displayName,
          installedVersion: initial.installedVersion,
          latestVersion: initial.latestVersion,
          hasFatalError: initial.hasFatalError,
          lastCheckedAt: initial.lastCheckedAt,
          isSystemApp: initial.isSystemApp,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: installedApps.packageId,
          set: {
            displayName: app.displayName,
            installedVersion: app.installedVersion,
            updatedAt: now,
          },
        })
        .run();
    });
  });
  persistDatabase();

  const packageIds = apps.map((app) => app.packageId);
  return db
    .select()
    .from(installedApps)
    .where(inArray(installedApps.packageId, packageIds))
    .orderBy(asc(installedApps.displayName), asc(installedApps.packageId))
    .all()
    .map(mapInstalledApp);
};

export const removeInstalledApp = (packageId: string): void => {
  getDatabase().delete(installedApps).where(eq(installedApps.packageId, packageId)).run();
  persistDatabase();
};

export const applicationStore: ApplicationStore = {
  get: getInstalledApp,
  updateApp: updateInstalledApp,
  list: listInstalledApps,
};
