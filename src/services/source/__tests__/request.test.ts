import { PassThrough, Readable } from "node:stream";
import { AxiosError, AxiosHeaders, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { DEFAULT_BROWSER_USER_AGENT } from "@/services/config";
import { createSourceHttpClient } from "../http/client";
import {
  classifyFetchError,
  createSourcePageFetcher,
  NETWORK_ERROR_MESSAGE,
  NOT_FOUND_MESSAGE,
  PAGE_READ_CHUNK_BYTES,
  readStreamText,
} from "../http/request";
import { appBrainAdapter, playStoreAdapter } from "../sources";

const respondWith = (body: string) =>
  vi.fn<AxiosAdapter>(async (config) => ({
    data: Readable.from([Buffer.from(body, "utf8")]),
    status: 200,
    statusText: "OK",
    headers: {},
    config,
  }));

const failWith = (createError: (config: InternalAxiosRequestConfig) => AxiosError) =>
  vi.fn<AxiosAdapter>(async (config) => {
    throw createError(config);
  });

const createFetcher = (adapter: AxiosAdapter) =>
  createSourcePageFetcher(createSourceHttpClient({ adapter }));

describe("createSourcePageFetcher", () => {
  it("returns the page body", async () => {
    const adapter = respondWith('<div itemprop="softwareVersion">1.1</div>');

    const outcome = await createFetcher(adapter)(playStoreAdapter, "com.example.app");

    expect(outcome).toEqual({
      kind: "success",
      body: '<div itemprop="softwareVersion">1.1</div>',
    });
    const [config] = adapter.mock.calls[0];
    expect(config.url).toBe("https://play.google.com/store/apps/details?id=com.example.app");
    expect(config.headers.get("User-Agent")).toBe(DEFAULT_BROWSER_USER_AGENT);
    expect(config.headers.get("Cookie")).toBeUndefined();
  });

  it("sends the mirror cookie", async () => {
    const adapter = respondWith("<html></html>");

    await createFetcher(adapter)(appBrainAdapter, "com.example.app");

    const [config] = adapter.mock.calls[0];
    expect(config.url).toBe("https://www.appbrain.com/app/google/com.example.app");
    expect(config.headers.get("Cookie")).toBe("agentok=1");
  });

  it("forwards the abort signal", async () => {
    const adapter = respondWith("<html></html>");
    const controller = new AbortController();

    await createFetcher(adapter)(playStoreAdapter, "com.example.app", {
      signal: controller.signal,
    });

    const [config] = adapter.mock.calls[0];
    expect(config.signal).toBe(controller.signal);
  });

  it("maps a missing page to a fatal not-found outcome and releases its body", async () => {
    const errorBody = Readable.from([Buffer.from("<h1>Not Found</h1>")]);
    const adapter = failWith(
      (config) =>
        new AxiosError("Request failed with status code 404", AxiosError.ERR_BAD_REQUEST, config, null, {
          data: errorBody,
          status: 404,
          statusText: "Not Found",
          headers: {},
          config,
        })
    );

    const outcome = await createFetcher(adapter)(playStoreAdapter, "com.example.gone");

    expect(outcome).toEqual({ kind: "not_found", message: NOT_FOUND_MESSAGE, fatal: true });
    expect(errorBody.destroyed).toBe(true);
  });

  it("maps an unresolvable host to a network error", async () => {
    const adapter = failWith(
      (config) => new AxiosError("getaddrinfo ENOTFOUND play.google.com", "ENOTFOUND", config)
    );

    const outcome = await createFetcher(adapter)(playStoreAdapter, "com.example.app");

    expect(outcome).toEqual({ kind: "network_error", message: NETWORK_ERROR_MESSAGE, fatal: false });
  });

  it("maps other failures to a transient error", async () => {
    const adapter = failWith(
      (config) =>
        new AxiosError("timeout of 15000ms exceeded", AxiosError.ECONNABORTED, config)
    );

    const outcome = await createFetcher(adapter)(playStoreAdapter, "com.example.app");

    expect(outcome).toEqual({
      kind: "other_error",
      message: "Could not retrieve the page (timeout of 15000ms exceeded).",
      fatal: false,
    });
  });
});

describe("classifyFetchError", () => {
  it("treats a gone page like a missing one", () => {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    const error = new AxiosError("Request failed with status code 410", "ERR_BAD_REQUEST", config, null, {
      data: null,
      status: 410,
      statusText: "Gone",
      headers: {},
      config,
    });

    expect(classifyFetchError(error)).toEqual({
      kind: "not_found",
      message: NOT_FOUND_MESSAGE,
      fatal: true,
    });
  });

  it("reads the code of plain system errors", () => {
    const error = Object.assign(new Error("getaddrinfo EAI_AGAIN www.appbrain.com"), {
      code: "EAI_AGAIN",
    });

    expect(classifyFetchError(error)).toEqual({
      kind: "network_error",
      message: NETWORK_ERROR_MESSAGE,
      fatal: false,
    });
  });

  it("treats other failures as transient", () => {
    expect(classifyFetchError(new Error("socket hang up"))).toEqual({
      kind: "other_error",
      message: "Could not retrieve the page (socket hang up).",
      fatal: false,
    });
  });
});

describe("readStreamText", () => {
  it("reads the whole stream in fixed-size chunks", async () => {
    const stream = new PassThrough();
    const read = vi.spyOn(stream, "read");
    const text = "a".repeat(PAGE_READ_CHUNK_BYTES * 2 + 17);

    const pending = readStreamText(stream, PAGE_READ_CHUNK_BYTES);
    stream.end(text);

    await expect(pending).resolves.toBe(text);
    expect(read).toHaveBeenCalledWith(PAGE_READ_CHUNK_BYTES);
  });

  it("rejects when the stream fails", async () => {
    const stream = new PassThrough();

    const pending = readStreamText(stream, PAGE_READ_CHUNK_BYTES);
    stream.destroy(new Error("connection reset"));

    await expect(pending).rejects.toThrow("connection reset");
  });
});
