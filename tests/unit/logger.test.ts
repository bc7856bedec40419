import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, errorFields } from "../../src/logger";
import { InvalidJsonError } from "../../src/errors";
import { lastLogLine as lastLine, silenceConsole, type ConsoleSpies } from "./helpers";

describe("createLogger", () => {
  let spies: ConsoleSpies;

  beforeEach(() => {
    spies = silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line per entry with service and request id", () => {
    const logger = createLogger({ service: "api", requestId: "req-1" });

    logger.info("Received HTTP request", { method: "GET" });

    expect(spies.log).toHaveBeenCalledTimes(1);
    expect(lastLine(spies.log)).toMatchObject({
      level: "INFO",
      message: "Received HTTP request",
      service: "api",
      requestId: "req-1",
      method: "GET",
    });
  });

  it("drops entries below the configured level", () => {
    const logger = createLogger({ service: "api", level: "WARN" });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");
    logger.error("broken");

    expect(spies.log).not.toHaveBeenCalled();
    expect(spies.warn).toHaveBeenCalledTimes(1);
    expect(spies.error).toHaveBeenCalledTimes(1);
  });

  it("carries bound fields into child loggers", () => {
    const logger = createLogger({ service: "fulfillment-hook" }).child({ intent: "BookRoom" });

    logger.info("Booking created");

    expect(lastLine(spies.log)).toMatchObject({ intent: "BookRoom", message: "Booking created" });
  });
});

describe("errorFields", () => {
  it("describes errors and other thrown values", () => {
    expect(errorFields(new TypeError("bad"))).toMatchObject({ error: "bad", errorName: "TypeError" });
    expect(errorFields("plain")).toEqual({ error: "plain" });
  });

  it("adds the code of application errors", () => {
    expect(errorFields(new InvalidJsonError(new SyntaxError("Unexpected token")))).toMatchObject({
      error: "Unexpected token",
      errorName: "InvalidJsonError",
      errorCode: "INVALID_JSON",
    });
  });
});
