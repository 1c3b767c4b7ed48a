import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "../logger";
import { TimeoutError } from "../errors";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new Logger({ component: "test" }, "WARNING");

    logger.info("hidden");
    logger.warn("shown", { clipId: "AbCdEf123" });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry).toMatchObject({ severity: "WARNING", message: "shown", component: "test", clipId: "AbCdEf123" });
  });

  it("serialises error details and child context", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ service: "clipcast" }).child({ component: "resolver" });

    logger.error("lookup failed", new TimeoutError("getClip", 100));

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({
      severity: "ERROR",
      service: "clipcast",
      component: "resolver",
      errorCode: "TIMEOUT_ERROR",
      isRetryable: true,
      errorMessage: "Operation timed out after 100ms: getClip",
    });
  });
});
