import { describe, it, expect, vi } from "vitest";

import { NOOP_LOGGER, createConsoleLogger } from "../index.js";

function createSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("createConsoleLogger", () => {
  it("prefixes messages", () => {
    const sink = createSink();
    const logger = createConsoleLogger("niqqud", sink);

    logger.info("Model loaded");

    expect(sink.info).toHaveBeenCalledWith("[niqqud] Model loaded");
  });

  it("passes context through as a second argument", () => {
    const sink = createSink();
    const logger = createConsoleLogger("niqqud", sink);

    logger.warn("Generation failed", { requestId: 3 });

    expect(sink.warn).toHaveBeenCalledWith("[niqqud] Generation failed", { requestId: 3 });
  });

  it("routes each level to the matching sink method", () => {
    const sink = createSink();
    const logger = createConsoleLogger("x", sink);

    logger.debug("d");
    logger.error("e");

    expect(sink.debug).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledWith("[x] e");
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).not.toHaveBeenCalled();
  });
});

describe("NOOP_LOGGER", () => {
  it("accepts every level without output", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    NOOP_LOGGER.debug("a");
    NOOP_LOGGER.info("b", { c: 1 });
    NOOP_LOGGER.warn("d");
    NOOP_LOGGER.error("e");
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(NOOP_LOGGER)).toBe(true);
  });
});
