export * from "@/services/app-check";
export * from "@/services/apps";
export * from "@/services/config";
export * from "@/services/source";
export { closeDatabase, DatabaseNotInitializedError, initializeDatabase } from "@/services/db";
export { createLogger } from "@/services/logging";
export type { LogPayload, ScopedLogger } from "@/services/logging";
