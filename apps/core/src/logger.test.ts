import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger.js";

const FIXED = new Date("2026-02-03T04:05:06.000Z");

let logDir: string;

beforeEach(() => {
  logDir = fs.mkdtempSync(path.join(os.tmpdir(), "clockwork-logger-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(logDir, { recursive: true, force: true });
});

describe("Logger", () => {
  it("writes every level to the run log, debug included", () => {
    const logger = new Logger(false, "run-1", { logDir, silent: true, now: () => FIXED });

    logger.info("Stage 1 started");
    logger.debug("tool call");
    logger.warn("Stage 0 is not completed");
    logger.error("Subtask failed", new Error("timeout"));

    expect(logger.logFilePath).toBe(path.join(logDir, "clockwork-run-1.log"));
    expect(fs.readFileSync(path.join(logDir, "clockwork-run-1.log"), "utf-8")).toBe(
      [
        "# clockwork run run-1, started 2026-02-03T04:05:06.000Z",
        "2026-02-03T04:05:06.000Z INFO  Stage 1 started",
        "2026-02-03T04:05:06.000Z DEBUG tool call",
        "2026-02-03T04:05:06.000Z WARN  Stage 0 is not completed",
        "2026-02-03T04:05:06.000Z ERROR Subtask failed: timeout",
        "",
      ].join("\n"),
    );
  });

  it("prints debug lines only in verbose mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger(false, "quiet", { logDir: null }).debug("hidden");
    new Logger(true, "loud", { logDir: null }).debug("shown");

    expect(log.mock.calls).toEqual([["shown"]]);
  });

  it("routes warnings and errors to their console streams", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger(false, "run-2", { logDir: null });

    logger.warn("careful");
    logger.error("broken", "bad input");

    expect(warn).toHaveBeenCalledWith("careful");
    expect(error).toHaveBeenCalledWith("broken: bad input");
  });

  it("ends a streamed reply with one line break", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = new Logger(true, "run-3", { logDir: null });

    logger.endStream();
    logger.stream("Split ");
    logger.stream("done");
    logger.endStream();
    logger.endStream();

    expect(write.mock.calls).toEqual([["Split "], ["done"], ["\n"]]);
  });

  it("does not echo streamed replies outside verbose mode", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = new Logger(false, "run-4", { logDir: null });

    logger.stream("hidden");
    logger.endStream();

    expect(write).not.toHaveBeenCalled();
  });
});
