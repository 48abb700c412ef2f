export const DATABASE_BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS installed_apps (
  package_id TEXT PRIMARY KEY NOT NULL,
  display_name TEXT NOT NULL,
  installed_version TEXT,
  latest_version TEXT,
  has_fatal_error INTEGER NOT NULL DEFAULT 0,
  last_checked_at INTEGER,
  is_system_app INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS installed_apps_display_name_idx
  ON installed_apps (display_name);

CREATE INDEX IF NOT EXISTS installed_apps_last_checked_at_idx
  ON installed_apps (last_checked_at);
`;
