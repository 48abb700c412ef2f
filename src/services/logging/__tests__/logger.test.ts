import { afterEach, describe, expect, it, vi } from "vitest";
import { resetAppWatchConfig } from "@/services/config";
import { createLogger } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetAppWatchConfig();
  });

  it("drops debug output unless debugging is enabled", () => {
    vi.stubEnv("APP_WATCH_DEBUG", "false");
    resetAppWatchConfig();
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("AppCheck").debug("attempt:complete", { packageId: "com.example.app" });

    expect(log).not.toHaveBeenCalled();
  });

  it("tags debug output with the scope", () => {
    vi.stubEnv("APP_WATCH_DEBUG", "1");
    resetAppWatchConfig();
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("AppCheck").debug("attempt:complete", { packageId: "com.example.app" });
    createLogger("AppCheck").debug("run:idle");

    expect(log.mock.calls).toEqual([
      ["[AppCheck]", "attempt:complete", { packageId: "com.example.app" }],
      ["[AppCheck]", "run:idle"],
    ]);
  });

  it("always writes errors", () => {
    vi.stubEnv("APP_WATCH_DEBUG", "false");
    resetAppWatchConfig();
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("SourceHttpDebug").error("request:error");

    expect(error).toHaveBeenCalledWith("[SourceHttpDebug]", "request:error", {});
  });
});
