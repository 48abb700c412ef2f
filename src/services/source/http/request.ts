import { Readable } from "node:stream";
import { isAxiosError } from "axios";
import type { AxiosInstance } from "axios";
import { createLogger } from "@/services/logging";
import { toSourceRequestError } from "../core/errors";
import { formatSourceUrl } from "../core/extractor";
import type {
  FetchOutcome,
  FetchSourcePageOptions,
  SourceAdapter,
  SourcePageFetcher,
} from "../core/types";
import { getSourceHttpClient } from "./client";

export const PAGE_READ_CHUNK_BYTES = 2048;

export const NOT_FOUND_MESSAGE = "No data found for this application.";
export const NETWORK_ERROR_MESSAGE = "Network error. Check your connection and try again.";

const NOT_FOUND_STATUSES = new Set([404, 410]);
const HOST_RESOLUTION_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

const logger = createLogger("SourceHttpDebug");

const toBuffer = (chunk: unknown): Buffer => {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  return Buffer.from(String(chunk), "utf8");
};

export const readStreamText = (stream: Readable, chunkBytes: number): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    stream.on("readable", () => {
      let chunk: unknown = stream.read(chunkBytes);
      while (chunk !== null) {
        chunks.push(toBuffer(chunk));
        chunk = stream.read(chunkBytes);
      }
    });
    stream.once("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    stream.once("error", reject);
  });

const toReadable = (data: unknown): Readable => {
  if (data instanceof Readable) {
    return data;
  }
  if (typeof data === "string" || Buffer.isBuffer(data)) {
    return Readable.from([toBuffer(data)]);
  }
  return Readable.from([]);
};

const releaseErrorBody = (error: unknown): void => {
  if (isAxiosError(error) && error.response?.data instanceof Readable) {
    error.response.data.destroy();
  }
};

export const classifyFetchError = (error: unknown): FetchOutcome => {
  const requestError = toSourceRequestError(error);

  if (requestError.status !== null && NOT_FOUND_STATUSES.has(requestError.status)) {
    return { kind: "not_found", message: NOT_FOUND_MESSAGE, fatal: true };
  }

  if (requestError.systemCode !== null && HOST_RESOLUTION_CODES.has(requestError.systemCode)) {
    return { kind: "network_error", message: NETWORK_ERROR_MESSAGE, fatal: false };
  }

  return {
    kind: "other_error",
    message: `Could not retrieve the page (${requestError.message}).`,
    fatal: false,
  };
};

export const createSourcePageFetcher =
  (client: AxiosInstance = getSourceHttpClient()): SourcePageFetcher =>
  async (
    adapter: SourceAdapter,
    packageId: string,
    options: FetchSourcePageOptions = {}
  ): Promise<FetchOutcome> => {
    const url = formatSourceUrl(adapter.descriptor.urlTemplate, packageId);
    logger.debug("request:start", { sourceId: adapter.descriptor.id, url });

    let body: Readable | null = null;
    try {
      const response = await client.get<unknown>(url, {
        headers: adapter.descriptor.headers,
        responseType: "stream",
        signal: options.signal,
      });
      body = toReadable(response.data);
      const text = await readStreamText(body, PAGE_READ_CHUNK_BYTES);

      logger.debug("request:success", {
        sourceId: adapter.descriptor.id,
        url,
        status: response.status,
        length: text.length,
      });
      return { kind: "success", body: text };
    } catch (error) {
      releaseErrorBody(error);
      const outcome = classifyFetchError(error);
      logger.debug("request:error", {
        sourceId: adapter.descriptor.id,
        url,
        kind: outcome.kind,
        message: error instanceof Error ? error.message : String(error),
      });
      return outcome;
    } finally {
      if (body && !body.destroyed) {
        body.destroy();
      }
    }
  };

export const fetchSourcePage: SourcePageFetcher = (adapter, packageId, options) =>
  createSourcePageFetcher()(adapter, packageId, options);
