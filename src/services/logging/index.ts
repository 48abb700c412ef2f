export { createLogger } from "./logger";
export type { LogPayload, ScopedLogger } from "./logger";
