import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import initSqlJs, { type Database } from "sql.js";
import { getAppWatchConfig } from "@/services/config";
import { DATABASE_BOOTSTRAP_SQL } from "./migrations";
import * as schema from "./schema";

export type AppDatabase = SQLJsDatabase<typeof schema>;

const IN_MEMORY_DATABASE = ":memory:";

export class DatabaseNotInitializedError extends Error {
  constructor() {
    super("Database is not initialized. Await initializeDatabase() before using the store.");
    this.name = "DatabaseNotInitializedError";
  }
}

interface DatabaseHandle {
  filename: string;
  sqlite: Database;
  db: AppDatabase;
}

let handle: DatabaseHandle | null = null;
let openPromise: Promise<DatabaseHandle> | null = null;

const openDatabase = async (filename: string): Promise<DatabaseHandle> => {
  const SQL = await initSqlJs();
  const isFileBacked = filename !== IN_MEMORY_DATABASE && existsSync(filename);
  const sqlite = isFileBacked ? new SQL.Database(readFileSync(filename)) : new SQL.Database();
  sqlite.exec(DATABASE_BOOTSTRAP_SQL);

  return {
    filename,
    sqlite,
    db: drizzle(sqlite, { schema }),
  };
};

export const initializeDatabase = async (): Promise<AppDatabase> => {
  if (handle) {
    return handle.db;
  }

  if (!openPromise) {
    openPromise = openDatabase(getAppWatchConfig().databasePath)
      .then((opened) => {
        handle = opened;
        return opened;
      })
      .finally(() => {
        openPromise = null;
      });
  }

  const opened = await openPromise;
  return opened.db;
};

export const getDatabase = (): AppDatabase => {
  if (!handle) {
    throw new DatabaseNotInitializedError();
  }
  return handle.db;
};

/**
 * sql.js keeps the whole database in memory; file-backed databases are written
 * back after every mutation.
 */
export const persistDatabase = (): void => {
  if (!handle || handle.filename === IN_MEMORY_DATABASE) {
    return;
  }

  writeFileSync(handle.filename, Buffer.from(handle.sqlite.export()));
};

export const closeDatabase = (): void => {
  if (!handle) {
    return;
  }

  persistDatabase();
  handle.sqlite.close();
  handle = null;
};
