import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const DEFAULT_LOG_DIR = path.join(os.tmpdir(), "clockwork");

/** One clock face per tick while a role is thinking. */
const CLOCK_FACES = ["🕛", "🕐", "🕑", "🕒", "🕓", "🕔", "🕕", "🕖", "🕗", "🕘", "🕙", "🕚"];
const TICK_MS = 250;

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
  /** Directory for the run log. `null` disables the log file. */
  logDir?: string | null;
  /** Keep the console quiet; the run log is still written. */
  silent?: boolean;
  now?: () => Date;
}

/**
 * Console output plus a per-run log file. Every line reaches the file;
 * `debug` lines and streamed replies reach the console only in verbose mode.
 */
export class Logger {
  private logFile: string | null;
  private readonly silent: boolean;
  private readonly now: () => Date;
  private clock: ReturnType<typeof setInterval> | null = null;
  private streaming = false;

  constructor(
    private readonly verbose: boolean,
    runId: string,
    options: LoggerOptions = {},
  ) {
    this.silent = options.silent ?? false;
    this.now = options.now ?? (() => new Date());
    const logDir = options.logDir === undefined ? DEFAULT_LOG_DIR : options.logDir;
    this.logFile = logDir === null ? null : this.openRunLog(logDir, runId);
  }

  /** Path to this run's log file, or null when there is none. */
  get logFilePath(): string | null {
    return this.logFile;
  }

  info(message: string): void {
    this.emit("INFO", message);
  }

  warn(message: string): void {
    this.emit("WARN", message);
  }

  error(message: string, err?: unknown): void {
    const detail = err === undefined ? "" : err instanceof Error ? err.message : String(err);
    this.emit("ERROR", detail ? `${message}: ${detail}` : message);
  }

  debug(message: string): void {
    this.emit("DEBUG", message);
  }

  /** Echo a fragment of a reply as it arrives (verbose mode only). */
  stream(delta: string): void {
    if (!this.verbose || this.silent || delta === "") return;
    process.stdout.write(delta);
    this.streaming = true;
  }

  /** Finish a streamed reply with a line break, if anything was echoed. */
  endStream(): void {
    if (!this.streaming) return;
    this.streaming = false;
    process.stdout.write("\n");
  }

  /** Tick a clock beside `label` until `stopWaiting`. Skipped in verbose mode, where replies stream instead. */
  startWaiting(label: string): void {
    this.record("INFO", `[waiting] ${label}`);
    if (this.verbose || this.silent || !process.stdout.isTTY) return;
    this.stopWaiting();
    let tick = 0;
    process.stdout.write(`${CLOCK_FACES[0]} ${label}`);
    this.clock = setInterval(() => {
      tick = (tick + 1) % CLOCK_FACES.length;
      process.stdout.write(`\r${CLOCK_FACES[tick]} ${label}`);
    }, TICK_MS);
  }

  stopWaiting(): void {
    if (this.clock === null) return;
    clearInterval(this.clock);
    this.clock = null;
    process.stdout.write("\r\x1b[K");
  }

  private emit(level: LogLevel, message: string): void {
    this.record(level, message);
    if (this.silent) return;
    if (level === "ERROR") console.error(message);
    else if (level === "WARN") console.warn(message);
    else if (level === "INFO" || this.verbose) console.log(message);
  }

  private record(level: LogLevel, message: string): void {
    if (!this.logFile) return;
    try {
      fs.appendFileSync(this.logFile, `${this.now().toISOString()} ${level.padEnd(5)} ${message}\n`);
    } catch (err) {
      // Stop writing to a file that has gone away; the console still carries the run.
      const file = this.logFile;
      this.logFile = null;
      this.warn(`Run log ${file} is no longer writable: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private openRunLog(logDir: string, runId: string): string | null {
    const filePath = path.join(logDir, `clockwork-${runId}.log`);
    try {
      fs.mkdirSync(logDir, { recursive: true });
      fs.writeFileSync(filePath, `# clockwork run ${runId}, started ${this.now().toISOString()}\n`);
      return filePath;
    } catch (err) {
      if (!this.silent) {
        console.warn(`Could not create run log ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return null;
    }
  }
}
