export {
  AppWatchConfigError,
  DEFAULT_BROWSER_USER_AGENT,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_REQUEST_DELAY_MS,
  getAppWatchConfig,
  parseAppWatchConfig,
  resetAppWatchConfig,
} from "./config";
export type { AppWatchConfig } from "./config.types";
