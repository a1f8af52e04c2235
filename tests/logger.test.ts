import { describe, it, expect, vi, afterEach } from "vitest";
import { createHandoffLogger } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

/** Spy on every console method. Must run before the logger is created. */
function captureConsole(): () => string[] {
  const spies = [
    vi.spyOn(console, "log").mockImplementation(() => {}),
    vi.spyOn(console, "warn").mockImplementation(() => {}),
    vi.spyOn(console, "error").mockImplementation(() => {}),
    vi.spyOn(console, "debug").mockImplementation(() => {}),
  ];
  return () => spies.flatMap((spy) => spy.mock.calls.map((args) => args.map(String).join(" ")));
}

describe("createHandoffLogger", () => {
  it("returns a Logger-compatible object", () => {
    const logger = createHandoffLogger();
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
  });

  it("warn level suppresses debug and info", () => {
    const lines = captureConsole();
    const logger = createHandoffLogger({ level: "warn", prefix: "test" });

    logger.debug?.("dbg-suppressed");
    logger.info("info-suppressed");
    logger.warn("warn-visible");
    logger.error("error-visible");

    const output = lines();
    expect(output.some((l) => l.includes("dbg-suppressed"))).toBe(false);
    expect(output.some((l) => l.includes("info-suppressed"))).toBe(false);
    expect(output.some((l) => l.includes("warn-visible"))).toBe(true);
    expect(output.some((l) => l.includes("error-visible"))).toBe(true);
  });

  it("debug level shows everything", () => {
    const lines = captureConsole();
    const logger = createHandoffLogger({ level: "debug", prefix: "test" });

    logger.debug?.("dbg-msg");
    logger.info("inf-msg");

    const output = lines();
    expect(output.some((l) => l.includes("dbg-msg"))).toBe(true);
    expect(output.some((l) => l.includes("inf-msg"))).toBe(true);
  });

  it("tags lines with prefix and level", () => {
    const lines = captureConsole();
    const logger = createHandoffLogger({ prefix: "hub1" });
    logger.warn("tagged");

    expect(lines().some((l) => l.includes("[hub1:warn] tagged"))).toBe(true);
  });

  it("uses default prefix 'handoff'", () => {
    const lines = captureConsole();
    createHandoffLogger().info("msg");

    expect(lines().some((l) => l.includes("[handoff:info] msg"))).toBe(true);
  });

  it("includes timestamp in output", () => {
    const lines = captureConsole();
    createHandoffLogger().info("msg");

    expect(lines().some((l) => /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/.test(l))).toBe(true);
  });
});
