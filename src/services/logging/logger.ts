import { getAppWatchConfig } from "@/services/config";

export type LogPayload = Record<string, unknown>;

export interface ScopedLogger {
  debug: (message: string, payload?: LogPayload) => void;
  warn: (message: string, payload?: LogPayload) => void;
  error: (message: string, payload?: LogPayload) => void;
}

const isDebugEnabled = (): boolean => getAppWatchConfig().debug;

export const createLogger = (scope: string): ScopedLogger => {
  const tag = `[${scope}]`;

  return {
    debug: (message, payload) => {
      if (!isDebugEnabled()) {
        return;
      }
      if (payload) {
        console.log(tag, message, payload);
        return;
      }
      console.log(tag, message);
    },
    warn: (message, payload) => {
      console.warn(tag, message, payload ?? {});
    },
    error: (message, payload) => {
      console.error(tag, message, payload ?? {});
    },
  };
};
