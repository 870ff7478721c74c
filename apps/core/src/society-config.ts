import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { ControlToken, ToolName } from "./constants.js";
import { ConfigError } from "./errors.js";
import { DEFAULTS_DIR } from "./paths.js";
import type { PromptBlocks } from "./prompt-blocks.js";
import { type Validators, validatorsFor } from "./yaml-validate.js";

const CONFIG_FILE_NAME = "society.config.yaml";
const DEFAULT_PRIMARY_MODEL = "claude-sonnet-4.5";
const VALID_TOOLS: ReadonlySet<string> = new Set(Object.values(ToolName));

export interface SocietyTokens {
  implementerDone: string;
  criticDone: string;
  approve: string;
  revise: string;
  planningDone: string;
  workflowDone: string;
  stageAccepted: string;
}

export interface DiscussionConfig {
  roles: string[];
  maxTurns: number;
  reminders: string[];
  tools: string[];
  task: string;
}

export interface CriticEvidenceConfig {
  required: boolean;
  maxReprompts: number;
}

export interface ImplementationConfig {
  implementer: string;
  critic: string;
  consolidator?: string;
  implementerMaxTurns: number;
  criticMaxTurns: number;
  maxRevisions: number;
  numLastMessages: number;
  maxMessagesToReturn: number;
  implementerTools: string[];
  criticTools: string[];
  criticEvidence: CriticEvidenceConfig;
  task: string;
  /** Task for iterations after the first; falls back to `task`. */
  revisionTask?: string;
}

export interface StageConfig {
  stage: number;
  name: string;
  maxIterations: number;
  planning: DiscussionConfig;
  implementation: ImplementationConfig;
  review?: DiscussionConfig;
}

export interface SocietyConfig {
  primaryModel: string;
  agents: Record<string, string>;
  tokens: SocietyTokens;
  stages: StageConfig[];
}

const v: Validators = validatorsFor("Society config");

function fail(message: string): never {
  return v.fail(message);
}

function validateTools(obj: Record<string, unknown>, key: string, context: string): string[] {
  const tools = v.optionalStringList(obj, key, context);
  for (const tool of tools) {
    if (!VALID_TOOLS.has(tool)) {
      fail(`Unknown tool "${tool}" in ${context}. Valid: ${[...VALID_TOOLS].join(", ")}`);
    }
  }
  return tools;
}

function validateDiscussion(raw: unknown, context: string): DiscussionConfig {
  const obj = v.requireRecord(raw, context);
  return {
    roles: v.requireStringList(obj, "roles", context),
    maxTurns: v.optionalPositiveInt(obj, "maxTurns", context, 10),
    reminders: v.optionalStringList(obj, "reminders", context),
    tools: validateTools(obj, "tools", context),
    task: v.requireString(obj, "task", context),
  };
}

function validateImplementation(raw: unknown, context: string): ImplementationConfig {
  const obj = v.requireRecord(raw, context);
  const evidence = obj.criticEvidence === undefined ? {} : v.requireRecord(obj.criticEvidence, `${context}.criticEvidence`);
  return {
    implementer: v.requireString(obj, "implementer", context),
    critic: v.requireString(obj, "critic", context),
    consolidator: v.optionalString(obj, "consolidator"),
    implementerMaxTurns: v.optionalPositiveInt(obj, "implementerMaxTurns", context, 30),
    criticMaxTurns: v.optionalPositiveInt(obj, "criticMaxTurns", context, 10),
    maxRevisions: v.optionalNonNegativeInt(obj, "maxRevisions", context, 3),
    numLastMessages: v.optionalPositiveInt(obj, "numLastMessages", context, 25),
    maxMessagesToReturn: v.optionalPositiveInt(obj, "maxMessagesToReturn", context, 25),
    implementerTools: validateTools(obj, "implementerTools", context),
    criticTools: validateTools(obj, "criticTools", context),
    criticEvidence: {
      required: v.optionalBoolean(evidence, "required", `${context}.criticEvidence`, false),
      maxReprompts: v.optionalNonNegativeInt(evidence, "maxReprompts", `${context}.criticEvidence`, 1),
    },
    task: v.requireString(obj, "task", context),
    revisionTask: v.optionalString(obj, "revisionTask"),
  };
}

function validateStage(raw: unknown, index: number): StageConfig {
  const obj = v.requireRecord(raw, `stages[${index}]`);
  const stage = v.requirePositiveInt(obj, "stage", `stages[${index}]`);
  const ctx = `stages[${index}] (stage ${stage})`;
  return {
    stage,
    name: v.requireString(obj, "name", ctx),
    maxIterations: v.optionalPositiveInt(obj, "maxIterations", ctx, 3),
    planning: validateDiscussion(obj.planning, `${ctx}.planning`),
    implementation: validateImplementation(obj.implementation, `${ctx}.implementation`),
    review: obj.review === undefined || obj.review === null ? undefined : validateDiscussion(obj.review, `${ctx}.review`),
  } satisfies StageConfig;
}

function validateStages(raw: unknown): StageConfig[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    fail('"stages" must be a non-empty array of stage definitions');
  }
  const stages = raw.map((item, i) => validateStage(item, i));
  const seen = new Set<number>();
  for (const s of stages) {
    if (seen.has(s.stage)) fail(`Stage ${s.stage} is defined more than once`);
    seen.add(s.stage);
  }
  return stages.sort((a, b) => a.stage - b.stage);
}

function validateAgents(raw: unknown): Record<string, string> {
  const obj = v.requireRecord(raw, '"agents"');
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (typeof value !== "string" || value === "") {
      fail(`Agent "${key}" must have a non-empty string source (e.g. "builtin:engineer" or a file path)`);
    }
    result[key] = value;
  }
  return result;
}

function validateTokens(raw: unknown): SocietyTokens {
  const obj = raw === undefined || raw === null ? {} : v.requireRecord(raw, '"tokens"');
  const token = (key: string, fallback: string) => v.optionalString(obj, key) || fallback;
  const tokens: SocietyTokens = {
    implementerDone: token("implementerDone", ControlToken.IMPLEMENTER_DONE),
    criticDone: token("criticDone", ControlToken.CRITIC_DONE),
    approve: token("approve", ControlToken.CRITIC_APPROVE),
    revise: token("revise", ControlToken.CRITIC_REVISE),
    planningDone: token("planningDone", ControlToken.PLANNING_DONE),
    workflowDone: token("workflowDone", ControlToken.WORKFLOW_DONE),
    stageAccepted: token("stageAccepted", ControlToken.STAGE_ACCEPTED),
  };
  if (tokens.approve === tokens.revise) fail('"tokens.approve" and "tokens.revise" must differ');
  return tokens;
}

/** Cross-validate that every role referenced by a stage is defined in agents. */
function validateAgentReferences(config: SocietyConfig): void {
  const defined = new Set(Object.keys(config.agents));

  function check(agentName: string, context: string): void {
    if (!defined.has(agentName)) {
      fail(`Agent "${agentName}" referenced in ${context} is not defined in "agents"`);
    }
  }

  for (const stage of config.stages) {
    const ctx = `stage ${stage.stage}`;
    for (const r of stage.planning.roles) check(r, `${ctx} planning`);
    check(stage.implementation.implementer, `${ctx} implementation`);
    check(stage.implementation.critic, `${ctx} implementation`);
    if (stage.implementation.consolidator) check(stage.implementation.consolidator, `${ctx} implementation`);
    for (const r of stage.review?.roles ?? []) check(r, `${ctx} review`);
  }
}

export function parseSocietyConfig(raw: unknown): SocietyConfig {
  const obj = v.requireRecord(raw, "Config");
  const config: SocietyConfig = {
    primaryModel: v.optionalString(obj, "primaryModel") || DEFAULT_PRIMARY_MODEL,
    agents: validateAgents(obj.agents),
    tokens: validateTokens(obj.tokens),
    stages: validateStages(obj.stages),
  };
  validateAgentReferences(config);
  return config;
}

/** Check that every reminder block a stage names exists. */
export function validateBlockReferences(config: SocietyConfig, blocks: PromptBlocks): void {
  for (const stage of config.stages) {
    for (const name of [...stage.planning.reminders, ...(stage.review?.reminders ?? [])]) {
      if (!blocks.has(name)) fail(`Prompt block "${name}" referenced in stage ${stage.stage} does not exist`);
    }
  }
}

export function findStage(config: SocietyConfig, stage: number): StageConfig {
  const found = config.stages.find((s) => s.stage === stage);
  if (!found) {
    throw new ConfigError(`Stage ${stage} is not defined. Defined stages: ${config.stages.map((s) => s.stage).join(", ")}`);
  }
  return found;
}

export interface LoadedSociety {
  config: SocietyConfig;
  source: string;
}

/**
 * Load the society config from the work root (or an explicit file), falling back to
 * the bundled default. `primaryModel` overrides the YAML value.
 */
export function loadSocietyConfig(workRoot: string, configFile?: string, primaryModel?: string): LoadedSociety {
  const candidates = configFile
    ? [path.resolve(workRoot, configFile)]
    : [path.join(workRoot, CONFIG_FILE_NAME), path.join(DEFAULTS_DIR, CONFIG_FILE_NAME)];
  const source = candidates.find((p) => fs.existsSync(p));
  if (!source) fail(`No ${configFile ?? CONFIG_FILE_NAME} found (looked in ${candidates.join(", ")})`);

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(source, "utf-8"));
  } catch (err) {
    fail(`Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = parseSocietyConfig(parsed);
  return {
    config: primaryModel ? { ...config, primaryModel } : config,
    source,
  };
}
