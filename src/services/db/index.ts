export {
  closeDatabase,
  DatabaseNotInitializedError,
  getDatabase,
  initializeDatabase,
  persistDatabase,
} from "./client";
export type { AppDatabase } from "./client";
export { installedApps } from "./schema";
export type { InstalledAppRow } from "./schema";
