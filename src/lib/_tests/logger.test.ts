import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("tags lines with level and namespace", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("vectorStore").info("Upserted 3 vectors", { index: "test" });

    expect(log).toHaveBeenCalledTimes(1);
    const [prefix, message, details] = log.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[vectorStore\]$/);
    expect(message).toBe("Upserted 3 vectors");
    expect(details).toEqual({ index: "test" });
  });

  it("drops messages below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createLogger("pdf");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
