import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetAppWatchConfig } from "@/services/config";
import {
  closeDatabase,
  DatabaseNotInitializedError,
  getDatabase,
  initializeDatabase,
} from "@/services/db";
import {
  applicationStore,
  getInstalledApp,
  listInstalledApps,
  removeInstalledApp,
  updateInstalledApp,
  upsertDiscoveredApps,
} from "../apps.repository";
import type { DiscoveredApp } from "../apps.types";

const notes: DiscoveredApp = {
  packageId: "com.example.notes",
  displayName: "Notes",
  installedVersion: "2.0",
  isSystemApp: false,
};

const clock: DiscoveredApp = {
  packageId: "com.android.clock",
  displayName: "Clock",
  installedVersion: "14",
  isSystemApp: true,
};

describe("apps repository", () => {
  beforeEach(async () => {
    await initializeDatabase();
  });

  afterEach(() => {
    closeDatabase();
  });

  it("returns undefined for packages it does not track", () => {
    expect(getInstalledApp("com.example.missing")).toBeUndefined();
  });

  it("inserts discovered apps as never checked", () => {
    const inserted = upsertDiscoveredApps([notes, clock]);

    expect(inserted.map((app) => app.packageId)).toEqual(["com.android.clock", "com.example.notes"]);
    expect(getInstalledApp("com.example.notes")).toEqual({
      packageId: "com.example.notes",
      displayName: "Notes",
      installedVersion: "2.0",
      latestVersion: null,
      hasFatalError: false,
      lastCheckedAt: null,
      isSystemApp: false,
      isChecking: false,
    });
  });

  it("keeps check state when a known app is discovered again", () => {
    upsertDiscoveredApps([notes]);
    updateInstalledApp({
      ...notes,
      latestVersion: "2.1",
      hasFatalError: false,
      lastCheckedAt: 1_700_000_000_000,
      isChecking: true,
    });

    upsertDiscoveredApps([{ ...notes, displayName: "Notes+", installedVersion: "2.1" }]);

    expect(getInstalledApp("com.example.notes")).toEqual({
      packageId: "com.example.notes",
      displayName: "Notes+",
      installedVersion: "2.1",
      latestVersion: "2.1",
      hasFatalError: false,
      lastCheckedAt: 1_700_000_000_000,
      isSystemApp: false,
      isChecking: false,
    });
  });

  it("returns an empty list when nothing was discovered", () => {
    expect(upsertDiscoveredApps([])).toEqual([]);
  });

  it("stores check results through the application store", () => {
    upsertDiscoveredApps([notes]);
    const app = applicationStore.get("com.example.notes");
    expect(app).toBeDefined();
    if (!app) {
      return;
    }

    applicationStore.updateApp({
      ...app,
      latestVersion: "Varies with device",
      hasFatalError: true,
      lastCheckedAt: 1_700_000_000_500,
    });

    const stored = applicationStore.get("com.example.notes");
    expect(stored?.latestVersion).toBe("Varies with device");
    expect(stored?.hasFatalError).toBe(true);
    expect(stored?.lastCheckedAt).toBe(1_700_000_000_500);
  });

  it("lists apps by display name and removes them", () => {
    upsertDiscoveredApps([notes, clock]);

    expect(listInstalledApps().map((app) => app.displayName)).toEqual(["Clock", "Notes"]);

    removeInstalledApp("com.android.clock");

    expect(applicationStore.list().map((app) => app.packageId)).toEqual(["com.example.notes"]);
  });
});

describe("database lifecycle", () => {
  let directory: string | null = null;

  afterEach(() => {
    closeDatabase();
    vi.unstubAllEnvs();
    resetAppWatchConfig();
    if (directory) {
      rmSync(directory, { recursive: true, force: true });
      directory = null;
    }
  });

  it("refuses queries before the database is opened", () => {
    expect(() => getDatabase()).toThrow(DatabaseNotInitializedError);
  });

  it("writes changes back to a file-backed database", async () => {
    directory = mkdtempSync(join(tmpdir(), "app-watch-"));
    vi.stubEnv("APP_WATCH_DB_PATH", join(directory, "apps.db"));
    resetAppWatchConfig();

    await initializeDatabase();
    upsertDiscoveredApps([notes]);
    updateInstalledApp({
      ...notes,
      latestVersion: "2.1",
      hasFatalError: false,
      lastCheckedAt: 1_700_000_000_000,
      isChecking: false,
    });
    closeDatabase();

    await initializeDatabase();

    expect(getInstalledApp("com.example.notes")?.latestVersion).toBe("2.1");
    expect(getInstalledApp("com.example.notes")?.lastCheckedAt).toBe(1_700_000_000_000);
  });
});
