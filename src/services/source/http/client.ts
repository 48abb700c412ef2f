import axios from "axios";
import type { AxiosInstance, CreateAxiosDefaults } from "axios";
import { getAppWatchConfig } from "@/services/config";

const DEFAULT_SOURCE_HEADERS = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.8",
} as const;

export const createSourceHttpClient = (
  overrides: CreateAxiosDefaults = {}
): AxiosInstance => {
  const config = getAppWatchConfig();

  return axios.create({
    timeout: config.httpTimeoutMs,
    responseType: "stream",
    maxRedirects: 5,
    ...overrides,
    headers: {
      ...DEFAULT_SOURCE_HEADERS,
      "User-Agent": config.userAgent,
      ...overrides.headers,
    },
  });
};

let sharedClient: AxiosInstance | null = null;

export const getSourceHttpClient = (): AxiosInstance => {
  if (!sharedClient) {
    sharedClient = createSourceHttpClient();
  }
  return sharedClient;
};
