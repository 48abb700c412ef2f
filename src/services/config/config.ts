import { z } from "zod";
import type { AppWatchConfig } from "./config.types";

export const DEFAULT_REQUEST_DELAY_MS = 2000;
export const DEFAULT_HTTP_TIMEOUT_MS = 15000;

// Some mirrors reject anything that does not look like a desktop browser.
export const DEFAULT_BROWSER_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value === "1" || value === "true" || value === "yes");

const configSchema = z.object({
  databasePath: z.string().trim().min(1).default("app-watch.db"),
  requestDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_REQUEST_DELAY_MS),
  httpTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  userAgent: z.string().trim().min(1).default(DEFAULT_BROWSER_USER_AGENT),
  debug: booleanFlag.default("false"),
});

export class AppWatchConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "AppWatchConfigError";
  }
}

let cachedConfig: AppWatchConfig | null = null;

const readEnvironment = (env: NodeJS.ProcessEnv) => ({
  databasePath: env.APP_WATCH_DB_PATH,
  requestDelayMs: env.APP_WATCH_REQUEST_DELAY_MS,
  httpTimeoutMs: env.APP_WATCH_HTTP_TIMEOUT_MS,
  userAgent: env.APP_WATCH_USER_AGENT,
  debug: env.APP_WATCH_DEBUG,
});

export const parseAppWatchConfig = (env: NodeJS.ProcessEnv): AppWatchConfig => {
  const parsed = configSchema.safeParse(readEnvironment(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new AppWatchConfigError(`Invalid app-watch configuration: ${issues.join("; ")}`, issues);
  }

  return parsed.data;
};

export const getAppWatchConfig = (): AppWatchConfig => {
  if (!cachedConfig) {
    cachedConfig = parseAppWatchConfig(process.env);
  }
  return cachedConfig;
};

export const resetAppWatchConfig = (): void => {
  cachedConfig = null;
};
