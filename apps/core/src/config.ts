import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { ConfigError } from "./errors.js";
import type { StageMode } from "./stage-driver.js";
import { isRecord } from "./yaml-validate.js";

type Env = Readonly<Record<string, string | undefined>>;

function readEnvString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  return value;
}

function readEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ConfigError(`Invalid value for ${key}: "${value}". Must be "true" or "false".`);
}

function readEnvInt(env: Env, key: string, fallback: number, min: number): number {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    const kind = min > 0 ? "a positive integer" : "a non-negative integer";
    throw new ConfigError(`Invalid value for ${key}: "${value}". Must be ${kind}.`);
  }
  return parsed;
}

const readEnvPositiveInt = (env: Env, key: string, fallback: number) => readEnvInt(env, key, fallback, 1);
const readEnvNonNegativeInt = (env: Env, key: string, fallback: number) => readEnvInt(env, key, fallback, 0);

export type ClockworkCommand = "run" | "status" | "restore" | "help" | "version";

const COMMANDS: readonly string[] = ["run", "status", "restore", "help"];

interface CliArgs {
  command: ClockworkCommand;
  stage: number | undefined;
  checkpointId: string | undefined;
  mode: StageMode;
  verbose: boolean;
  configFile: string | undefined;
}

export function readVersion(): string {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(dir, "..", "package.json"), "utf-8"));
  return isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "0.0.0";
}

export const HELP_TEXT = `Usage: clockwork <command> [options]

Commands:
  run <stage>          Run one stage of the research workflow
  status               Show the current position, completed stages and checkpoints
  restore <id>         Write a checkpoint's snapshot back as the workflow state

Options:
  --restart            Clear the stage's memory and work directory, then run it from the start
  --resume             Continue the stage after its last saved subtask
  -c, --config <file>  Society config file (default: society.config.yaml in the work root)
  -v, --verbose        Enable verbose streaming output
  -V, --version        Show version number
  -h, --help           Show this help message

Examples:
  clockwork run 1
  clockwork run 2 --resume
  clockwork run 3 --restart -v
  clockwork status
  clockwork restore stage1_subtask2_iteration1_20260101T000000000Z

Environment variables override defaults; CLI args override env vars.`;

function parseStage(raw: string | undefined): number {
  if (raw === undefined) throw new ConfigError(`"run" needs a stage number.\n\n${HELP_TEXT}`);
  const stage = Number(raw);
  if (!Number.isInteger(stage) || stage <= 0) {
    throw new ConfigError(`Invalid stage "${raw}". Must be a positive integer.`);
  }
  return stage;
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "V", default: false },
        restart: { type: "boolean", default: false },
        resume: { type: "boolean", default: false },
        config: { type: "string", short: "c" },
      },
    });
  } catch (err) {
    throw new ConfigError(`${err instanceof Error ? err.message : String(err)}\n\n${HELP_TEXT}`);
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseRawArgs(argv);

  const base = {
    stage: undefined,
    checkpointId: undefined,
    mode: "fresh" as const,
    verbose: values.verbose ?? false,
    configFile: values.config,
  };
  if (values.version) return { ...base, command: "version" };
  if (values.help || positionals.length === 0) return { ...base, command: "help" };

  const [name, stageArg] = positionals;
  if (!COMMANDS.includes(name)) throw new ConfigError(`Unknown command "${name}".\n\n${HELP_TEXT}`);
  if (name === "status") return { ...base, command: "status" };
  if (name === "restore") {
    if (stageArg === undefined) throw new ConfigError(`"restore" needs a checkpoint id.\n\n${HELP_TEXT}`);
    return { ...base, command: "restore", checkpointId: stageArg };
  }
  if (name !== "run") return { ...base, command: "help" };

  if (values.restart && values.resume) {
    throw new ConfigError("--restart and --resume cannot be used together.");
  }
  return {
    ...base,
    command: "run",
    stage: parseStage(stageArg),
    mode: values.restart ? "restart" : values.resume ? "resume" : "fresh",
  };
}

/**
 * Core config loaded from environment variables and CLI arguments.
 * CLI args take precedence over env vars.
 * Roles, stages and control tokens are in `society.config.yaml` (SocietyConfig).
 */
export interface ClockworkConfig {
  readonly command: ClockworkCommand;
  readonly stage: number | undefined;
  readonly checkpointId: string | undefined;
  readonly mode: StageMode;
  readonly verbose: boolean;
  readonly configFile: string | undefined;
  readonly workRoot: string;
  readonly clockworkDir: string;
  readonly memoryDir: string;
  readonly agentsDir: string;
  readonly runId: string;
  readonly sessionTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly phaseDelayMs: number;
  readonly codeTimeoutMs: number;
  readonly codeInterpreter: string;
  readonly primaryModel: string | undefined;
}

export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: Env = process.env,
  cwd: string = process.cwd(),
): ClockworkConfig {
  const cli = parseCliArgs(argv);
  const workRoot = path.resolve(cwd, readEnvString(env, "WORK_ROOT", "."));
  const clockworkDir = readEnvString(env, "CLOCKWORK_DIR", ".clockwork");

  return {
    ...cli,
    verbose: cli.verbose || readEnvBoolean(env, "VERBOSE", false),
    workRoot,
    clockworkDir,
    memoryDir: path.resolve(workRoot, readEnvString(env, "MEMORY_DIR", path.join(clockworkDir, "memory"))),
    agentsDir: readEnvString(env, "AGENTS_DIR", path.join(clockworkDir, "agents")),
    runId: new Date().toISOString().replace(/[:.]/g, "-"),
    sessionTimeoutMs: readEnvPositiveInt(env, "SESSION_TIMEOUT_MS", 1_800_000),
    maxRetries: readEnvPositiveInt(env, "MAX_RETRIES", 3),
    retryDelayMs: readEnvNonNegativeInt(env, "RETRY_DELAY_MS", 5000),
    phaseDelayMs: readEnvNonNegativeInt(env, "PHASE_DELAY_MS", 2000),
    codeTimeoutMs: readEnvPositiveInt(env, "CODE_TIMEOUT_MS", 600_000),
    codeInterpreter: readEnvString(env, "CODE_INTERPRETER", "python3"),
    primaryModel: env.PRIMARY_MODEL || undefined,
  };
}
