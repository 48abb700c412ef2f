export interface AppWatchConfig {
  databasePath: string;
  requestDelayMs: number;
  httpTimeoutMs: number;
  userAgent: string;
  debug: boolean;
}
