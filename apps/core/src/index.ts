#!/usr/bin/env node
import { AgentInstructions } from "./agent-instructions.js";
import { LocalCodeRunner } from "./code-runner.js";
import { type ClockworkConfig, HELP_TEXT, loadConfig, readVersion } from "./config.js";
import { RESERVED_TOKENS } from "./constants.js";
import { CopilotBackend } from "./copilot-role.js";
import { Logger } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import { msg } from "./messages.js";
import { ProgressTracker } from "./progress-tracker.js";
import { PromptBlocks } from "./prompt-blocks.js";
import { loadSocietyConfig, validateBlockReferences } from "./society-config.js";
import { StageDriver } from "./stage-driver.js";

let config: ClockworkConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

if (config.command === "help") {
  console.log(HELP_TEXT);
  process.exit(0);
}

if (config.command === "version") {
  console.log(readVersion());
  process.exit(0);
}

if (config.command === "status") {
  const store = new MemoryStore(config.memoryDir);
  const state = await store.getWorkflowState();
  const { stage, subtask, iteration } = state.current_position;
  console.log(msg.positionLine(stage, subtask, iteration));
  console.log(msg.stagesCompletedLine(state.stages_completed));

  const checkpoints = await store.listCheckpoints();
  if (checkpoints.length === 0) {
    console.log(msg.noCheckpoints);
  } else {
    for (const c of checkpoints) console.log(msg.checkpointLine(c.id, c.label, c.timestamp));
  }
  process.exit(0);
}

if (config.command === "restore" && config.checkpointId !== undefined) {
  try {
    const state = await new MemoryStore(config.memoryDir).restoreCheckpoint(config.checkpointId);
    const { stage, subtask, iteration } = state.current_position;
    console.log(msg.checkpointRestored(config.checkpointId));
    console.log(msg.positionLine(stage, subtask, iteration));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
  process.exit(0);
}

const logger = new Logger(config.verbose, config.runId);
const abort = new AbortController();

const showLogOnError = (err: unknown) => {
  if (abort.signal.aborted) return;
  logger.error(err instanceof Error ? err.message : String(err));
  if (logger.logFilePath) {
    console.error(msg.logFileHint(logger.logFilePath));
  }
  process.exit(1);
};

// Graceful shutdown: abort the running stage and stop the backend on Ctrl+C or kill
let activeShutdown: ((signal: string) => Promise<void>) | null = null;

function handleSignal(signal: string) {
  const code = signal === "SIGINT" ? 130 : 143;
  if (activeShutdown) {
    const fn = activeShutdown;
    activeShutdown = null;
    fn(signal).finally(() => process.exit(code));
  } else {
    process.exit(code);
  }
}

process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("SIGTERM", () => handleSignal("SIGTERM"));

async function runStage(cfg: ClockworkConfig, stage: number): Promise<void> {
  logger.info(msg.starting);
  const { config: society, source } = loadSocietyConfig(cfg.workRoot, cfg.configFile, cfg.primaryModel);
  logger.info(msg.societySource(source));
  logger.info(msg.configLoaded(society.primaryModel, cfg.memoryDir, cfg.verbose));

  const blocks = PromptBlocks.load(cfg.workRoot);
  validateBlockReferences(society, blocks);

  const store = new MemoryStore(cfg.memoryDir, {
    reservedTokens: [...new Set([...RESERVED_TOKENS, ...Object.values(society.tokens)])],
  });
  const backend = new CopilotBackend(
    { verbose: cfg.verbose, sessionTimeoutMs: cfg.sessionTimeoutMs, primaryModel: society.primaryModel },
    new AgentInstructions(society.agents, cfg.workRoot, cfg.agentsDir),
    logger,
  );
  const tracker = new ProgressTracker(logger);
  const driver = new StageDriver({
    society,
    store,
    blocks,
    roles: backend,
    codeRunner: new LocalCodeRunner({ interpreter: cfg.codeInterpreter }),
    logger,
    workRoot: cfg.workRoot,
    tracker,
    maxRetries: cfg.maxRetries,
    retryDelayMs: cfg.retryDelayMs,
    phaseDelayMs: cfg.phaseDelayMs,
    codeTimeoutMs: cfg.codeTimeoutMs,
  });

  activeShutdown = async (signal) => {
    logger.warn(msg.shuttingDown(signal));
    abort.abort();
    await backend.stop();
  };

  await backend.start();
  try {
    await driver.runStage(stage, cfg.mode, abort.signal);
  } finally {
    activeShutdown = null;
    if (!abort.signal.aborted) await backend.stop();
  }

  console.log("");
  for (const line of tracker.summaryLines()) console.log(line);
  if (logger.logFilePath) console.log(msg.logFileHint(logger.logFilePath));
}

if (config.command === "run" && config.stage !== undefined) {
  await runStage(config, config.stage).catch(showLogOnError);
}
