import { z } from "zod";
import type { DiscoveredApp, InstalledApp } from "./apps.types";

export class InstalledAppParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InstalledAppParseError";
  }
}

const persistedInstalledAppSchema = z.object({
  packageId: z.string().min(1),
  displayName: z.string(),
  installedVersion: z.string().nullable(),
  latestVersion: z.string().nullable(),
  hasFatalError: z.boolean(),
  lastCheckedAt: z.number().int().nullable(),
  isSystemApp: z.boolean(),
});

export type PersistedInstalledApp = z.infer<typeof persistedInstalledAppSchema>;

export const createInstalledApp = (input: DiscoveredApp): InstalledApp => ({
  packageId: input.packageId,
  displayName: input.displayName,
  installedVersion: input.installedVersion,
  latestVersion: null,
  hasFatalError: false,
  lastCheckedAt: null,
  isSystemApp: input.isSystemApp,
  isChecking: false,
});

export const isUpdateAvailable = (app: InstalledApp): boolean => {
  if (app.installedVersion === null || app.latestVersion === null) {
    return false;
  }
  if (app.hasFatalError) {
    return false;
  }
  return app.installedVersion !== app.latestVersion;
};

/**
 * Two records describe the same application when their package identifiers match,
 * whatever the rest of their state.
 */
export const isSameApp = (first: InstalledApp, second: InstalledApp): boolean =>
  first.packageId === second.packageId;

export const toPersistedInstalledApp = (app: InstalledApp): PersistedInstalledApp => ({
  packageId: app.packageId,
  displayName: app.displayName,
  installedVersion: app.installedVersion,
  latestVersion: app.latestVersion,
  hasFatalError: app.hasFatalError,
  lastCheckedAt: app.lastCheckedAt,
  isSystemApp: app.isSystemApp,
});

export const serializeInstalledApp = (app: InstalledApp): string =>
  JSON.stringify(toPersistedInstalledApp(app));

export const deserializeInstalledApp = (raw: string): InstalledApp => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InstalledAppParseError(`Installed app payload is not valid JSON: ${reason}`);
  }

  const parsed = persistedInstalledAppSchema.safeParse(value);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    throw new InstalledAppParseError(
      `Installed app payload is missing or has invalid fields: ${fields.join(", ")}`
    );
  }

  return {
    ...parsed.data,
    isChecking: false,
  };
};
