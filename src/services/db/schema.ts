import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const installedApps = sqliteTable(
  "installed_apps",
  {
    packageId: text("package_id").primaryKey(),
    displayName: text("display_name").notNull(),
    installedVersion: text("installed_version"),
    latestVersion: text("latest_version"),
    hasFatalError: integer("has_fatal_error", { mode: "boolean" }).notNull().default(false),
    lastCheckedAt: integer("last_checked_at"),
    isSystemApp: integer("is_system_app", { mode: "boolean" }).notNull().default(false),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => [
    index("installed_apps_display_name_idx").on(table.displayName),
    index("installed_apps_last_checked_at_idx").on(table.lastCheckedAt),
  ]
);

export type InstalledAppRow = typeof installedApps.$inferSelect;
