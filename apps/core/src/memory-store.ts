import * as path from "node:path";
import { atomicWriteJson, readJsonFile } from "./atomic-write.js";
import { RESERVED_TOKENS } from "./constants.js";
import { MemoryFile } from "./paths.js";
import type { Message, MessageKind, ToolCall } from "./role.js";
import { stripTokens } from "./utils.js";
import { isRecord } from "./yaml-validate.js";

export interface StagePosition {
  stage: number;
  subtask: number | null;
  iteration: number | null;
}

export interface WorkflowState {
  current_position: StagePosition;
  stages_completed: number[];
  /** `iterations["stageN"]["subtaskM"]`: last iteration written for that subtask. */
  iterations: Record<string, Record<string, number>>;
}

export interface CheckpointRecord {
  id: string;
  timestamp: string;
  position: StagePosition;
  label: string;
  state_snapshot: WorkflowState;
}

interface CheckpointLog {
  stages_completed: number[];
  checkpoints: Record<string, CheckpointRecord>;
}

export interface SummaryRecord {
  timestamp: string;
  iteration: number;
  task_description: string;
  summary: string;
}

export interface TranscriptRecord {
  timestamp: string;
  iteration: number;
  messages: Message[];
}

/** `doc["stageN"]["subtaskM"]["iterationK"]` */
type KeyedDocument<T> = Record<string, Record<string, Record<string, T>>>;

/** One record selected for a task prompt, with control tokens already removed. */
export interface ContextEntry {
  stage: number;
  subtask: number;
  iteration: number;
  taskDescription: string;
  summary: string;
}

export interface ResumePoint {
  subtask: number;
  iteration: number;
}

export interface MemoryStoreOptions {
  now?: () => Date;
  /** Tokens removed from records before they are replayed into prompts. */
  reservedTokens?: readonly string[];
}

const stageKey = (stage: number) => `stage${stage}`;
const subtaskKey = (subtask: number) => `subtask${subtask}`;
const iterationKey = (iteration: number) => `iteration${iteration}`;

/** Numeric suffixes of keys such as `stage3`, ascending. Keys with another prefix are ignored. */
function keyNumbers(obj: Record<string, unknown> | undefined, prefix: string): number[] {
  if (!obj) return [];
  const out: number[] = [];
  for (const key of Object.keys(obj)) {
    if (!key.startsWith(prefix)) continue;
    const n = Number(key.slice(prefix.length));
    if (Number.isInteger(n)) out.push(n);
  }
  return out.sort((a, b) => a - b);
}

function emptyState(): WorkflowState {
  return { current_position: { stage: 1, subtask: null, iteration: null }, stages_completed: [], iterations: {} };
}

// ---------------------------------------------------------------------------
// Parsing persisted documents
// ---------------------------------------------------------------------------

function isNullableInt(value: unknown): value is number | null {
  return value === null || (typeof value === "number" && Number.isInteger(value));
}

function parsePosition(raw: unknown): StagePosition | undefined {
  if (!isRecord(raw) || typeof raw.stage !== "number") return undefined;
  const subtask = raw.subtask ?? null;
  const iteration = raw.iteration ?? null;
  if (!isNullableInt(subtask) || !isNullableInt(iteration)) return undefined;
  return { stage: raw.stage, subtask, iteration };
}

function parseNumberList(raw: unknown): number[] {
  return Array.isArray(raw) ? raw.filter((n): n is number => typeof n === "number") : [];
}

function parseState(raw: unknown): WorkflowState {
  if (!isRecord(raw)) return emptyState();
  const iterations: Record<string, Record<string, number>> = {};
  if (isRecord(raw.iterations)) {
    for (const [stage, subtasks] of Object.entries(raw.iterations)) {
      if (!isRecord(subtasks)) continue;
      const entry: Record<string, number> = {};
      for (const [subtask, iteration] of Object.entries(subtasks)) {
        if (typeof iteration === "number") entry[subtask] = iteration;
      }
      iterations[stage] = entry;
    }
  }
  return {
    current_position: parsePosition(raw.current_position) ?? emptyState().current_position,
    stages_completed: parseNumberList(raw.stages_completed),
    iterations,
  };
}

function parseCheckpointLog(raw: unknown): CheckpointLog {
  const log: CheckpointLog = { stages_completed: [], checkpoints: {} };
  if (!isRecord(raw)) return log;
  log.stages_completed = parseNumberList(raw.stages_completed);
  if (isRecord(raw.checkpoints)) {
    for (const [id, cp] of Object.entries(raw.checkpoints)) {
      if (!isRecord(cp) || typeof cp.timestamp !== "string" || typeof cp.label !== "string") continue;
      const position = parsePosition(cp.position);
      if (!position) continue;
      log.checkpoints[id] = { id, timestamp: cp.timestamp, position, label: cp.label, state_snapshot: parseState(cp.state_snapshot) };
    }
  }
  return log;
}

function parseSummary(raw: unknown): SummaryRecord | undefined {
  if (!isRecord(raw)) return undefined;
  const { timestamp, iteration, task_description, summary } = raw;
  if (typeof timestamp !== "string" || typeof iteration !== "number") return undefined;
  if (typeof task_description !== "string" || typeof summary !== "string") return undefined;
  return { timestamp, iteration, task_description, summary };
}

const MESSAGE_KINDS: readonly string[] = ["text", "tool_call", "tool_result"] satisfies MessageKind[];

function isMessageKind(value: unknown): value is MessageKind {
  return typeof value === "string" && MESSAGE_KINDS.includes(value);
}

function parseToolCall(raw: unknown): ToolCall | undefined {
  if (!isRecord(raw) || typeof raw.name !== "string") return undefined;
  return { name: raw.name, args: isRecord(raw.args) ? raw.args : {} };
}

function parseMessage(raw: unknown): Message | undefined {
  if (!isRecord(raw) || typeof raw.source !== "string" || typeof raw.content !== "string") return undefined;
  const kind = isMessageKind(raw.kind) ? raw.kind : "text";
  const toolCall = parseToolCall(raw.toolCall);
  return toolCall ? { source: raw.source, content: raw.content, kind, toolCall } : { source: raw.source, content: raw.content, kind };
}

function parseTranscript(raw: unknown): TranscriptRecord | undefined {
  if (!isRecord(raw) || typeof raw.timestamp !== "string" || typeof raw.iteration !== "number") return undefined;
  const messages = Array.isArray(raw.messages)
    ? raw.messages.map(parseMessage).filter((m): m is Message => m !== undefined)
    : [];
  return { timestamp: raw.timestamp, iteration: raw.iteration, messages };
}

function parseKeyedDocument<T>(raw: unknown, parse: (value: unknown) => T | undefined): KeyedDocument<T> {
  const doc: KeyedDocument<T> = {};
  if (!isRecord(raw)) return doc;
  for (const [stage, subtasks] of Object.entries(raw)) {
    if (!isRecord(subtasks)) continue;
    doc[stage] = {};
    for (const [subtask, iterations] of Object.entries(subtasks)) {
      if (!isRecord(iterations)) continue;
      doc[stage][subtask] = {};
      for (const [iteration, value] of Object.entries(iterations)) {
        const parsed = parse(value);
        if (parsed !== undefined) doc[stage][subtask][iteration] = parsed;
      }
    }
  }
  return doc;
}

function upsert<T>(doc: KeyedDocument<T>, stage: number, subtask: number, iteration: number, value: T): void {
  const s = (doc[stageKey(stage)] ??= {});
  const m = (s[subtaskKey(subtask)] ??= {});
  m[iterationKey(iteration)] = value;
}

function dropStagesFrom<T>(doc: Record<string, T>, stage: number): void {
  for (const n of keyNumbers(doc, "stage")) {
    if (n >= stage) delete doc[stageKey(n)];
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Stage → subtask → iteration keyed history plus workflow state and checkpoints,
 * kept as JSON documents in one directory. "Latest iteration" is always derived
 * from the summary keys, never from the last-write-wins iteration pointers.
 */
export class MemoryStore {
  private readonly now: () => Date;
  private readonly reservedTokens: readonly string[];

  constructor(
    readonly dir: string,
    options: MemoryStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.reservedTokens = options.reservedTokens ?? RESERVED_TOKENS;
  }

  private file(name: string): string {
    return path.join(this.dir, name);
  }

  private async readSummaries(): Promise<KeyedDocument<SummaryRecord>> {
    return parseKeyedDocument(await readJsonFile(this.file(MemoryFile.SUMMARIES)), parseSummary);
  }

  private async readTranscripts(): Promise<KeyedDocument<TranscriptRecord>> {
    return parseKeyedDocument(await readJsonFile(this.file(MemoryFile.MESSAGES)), parseTranscript);
  }

  private async readCheckpointLog(): Promise<CheckpointLog> {
    return parseCheckpointLog(await readJsonFile(this.file(MemoryFile.CHECKPOINTS)));
  }

  async getWorkflowState(): Promise<WorkflowState> {
    return parseState(await readJsonFile(this.file(MemoryFile.WORKFLOW_STATE)));
  }

  private async writeState(state: WorkflowState): Promise<void> {
    await atomicWriteJson(this.file(MemoryFile.WORKFLOW_STATE), state);
  }

  // --- Records ---

  /** Upsert the transcript and summary for one (stage, subtask, iteration) key. */
  async save(
    stage: number,
    subtask: number,
    iteration: number,
    transcript: readonly Message[],
    summary: string,
    taskDescription: string,
  ): Promise<void> {
    const timestamp = this.now().toISOString();

    const transcripts = await this.readTranscripts();
    upsert(transcripts, stage, subtask, iteration, { timestamp, iteration, messages: [...transcript] });
    await atomicWriteJson(this.file(MemoryFile.MESSAGES), transcripts);

    const summaries = await this.readSummaries();
    upsert(summaries, stage, subtask, iteration, { timestamp, iteration, task_description: taskDescription, summary });
    await atomicWriteJson(this.file(MemoryFile.SUMMARIES), summaries);
  }

  async getSummary(stage: number, subtask: number, iteration: number): Promise<SummaryRecord | undefined> {
    const summaries = await this.readSummaries();
    return summaries[stageKey(stage)]?.[subtaskKey(subtask)]?.[iterationKey(iteration)];
  }

  async getTranscript(stage: number, subtask: number, iteration: number): Promise<TranscriptRecord | undefined> {
    const transcripts = await this.readTranscripts();
    return transcripts[stageKey(stage)]?.[subtaskKey(subtask)]?.[iterationKey(iteration)];
  }

  /** Largest iteration with a summary for this subtask, or 0. */
  async getMaxIteration(stage: number, subtask: number): Promise<number> {
    return maxIteration(await this.readSummaries(), stage, subtask);
  }

  // --- Position ---

  async updatePosition(stage: number, subtask: number | null = null, iteration: number | null = null): Promise<void> {
    const state = await this.getWorkflowState();
    state.current_position = { stage, subtask, iteration };
    if (subtask !== null && iteration !== null) {
      const entry = (state.iterations[stageKey(stage)] ??= {});
      entry[subtaskKey(subtask)] = iteration;
    }
    await this.writeState(state);
  }

  // --- Context assembly ---

  /** Records a subtask at (stage, subtask, iteration) may see, in prompt order. */
  async assembleContext(stage: number, subtask: number, iteration: number): Promise<ContextEntry[]> {
    const summaries = await this.readSummaries();
    const keys: Array<[number, number, number]> = [];

    for (const s of keyNumbers(summaries, "stage")) {
      if (s >= stage) continue;
      for (const m of keyNumbers(summaries[stageKey(s)], "subtask")) {
        keys.push([s, m, maxIteration(summaries, s, m)]);
      }
    }

    const current = summaries[stageKey(stage)];
    const subtasks = keyNumbers(current, "subtask");
    for (const m of subtasks) {
      if (m < subtask) keys.push([stage, m, maxIteration(summaries, stage, m)]);
    }

    if (iteration > 1) {
      for (let k = 1; k < iteration; k++) keys.push([stage, subtask, k]);
      for (const m of subtasks) {
        if (m > subtask) keys.push([stage, m, iteration - 1]);
      }
    }

    const entries: ContextEntry[] = [];
    for (const [s, m, k] of keys) {
      const record = summaries[stageKey(s)]?.[subtaskKey(m)]?.[iterationKey(k)];
      if (!record) continue;
      entries.push({
        stage: s,
        subtask: m,
        iteration: k,
        taskDescription: stripTokens(record.task_description, this.reservedTokens),
        summary: stripTokens(record.summary, this.reservedTokens),
      });
    }
    return entries;
  }

  /** The current task, preceded by every record it may see. */
  async formatTaskPrompt(stage: number, subtask: number, taskText: string, iteration: number): Promise<string> {
    const entries = await this.assembleContext(stage, subtask, iteration);
    if (entries.length === 0) return `## Current task\n\n${taskText}`;
    const previous = entries
      .map(
        (e) =>
          `### Stage ${e.stage}, subtask ${e.subtask}, iteration ${e.iteration}\n\n` +
          `**Task:**\n${e.taskDescription}\n\n**Result:**\n${e.summary}`,
      )
      .join("\n\n");
    return (
      "## Summaries of previous tasks\n\n" +
      "These are not the current task, but they may hold relevant information.\n\n" +
      `${previous}\n\n## Current task\n\n${taskText}`
    );
  }

  // --- Checkpoints ---

  async checkpoint(position: StagePosition, label: string): Promise<CheckpointRecord> {
    const log = await this.readCheckpointLog();
    const state = await this.getWorkflowState();
    const timestamp = this.now().toISOString();
    const base = `stage${position.stage}_subtask${position.subtask ?? 0}_iteration${position.iteration ?? 0}_${timestamp.replace(/[-:.]/g, "")}`;

    let id = base;
    for (let n = 1; id in log.checkpoints; n++) id = `${base}-${n}`;

    const record: CheckpointRecord = { id, timestamp, position: { ...position }, label, state_snapshot: state };
    log.checkpoints[id] = record;
    await atomicWriteJson(this.file(MemoryFile.CHECKPOINTS), log);
    return record;
  }

  /** Every checkpoint, oldest first. */
  async listCheckpoints(): Promise<CheckpointRecord[]> {
    const log = await this.readCheckpointLog();
    return Object.values(log.checkpoints);
  }

  /** Write a checkpoint's snapshot back as the workflow state. */
  async restoreCheckpoint(id: string): Promise<WorkflowState> {
    const log = await this.readCheckpointLog();
    const record = log.checkpoints[id];
    if (!record) throw new Error(`Unknown checkpoint "${id}"`);
    await this.writeState(record.state_snapshot);
    return record.state_snapshot;
  }

  // --- Stage completion ---

  async markStageCompleted(stage: number): Promise<void> {
    const state = await this.getWorkflowState();
    if (!state.stages_completed.includes(stage)) {
      state.stages_completed = [...state.stages_completed, stage].sort((a, b) => a - b);
      await this.writeState(state);
    }
    const log = await this.readCheckpointLog();
    if (!log.stages_completed.includes(stage)) {
      log.stages_completed = [...log.stages_completed, stage].sort((a, b) => a - b);
      await atomicWriteJson(this.file(MemoryFile.CHECKPOINTS), log);
    }
  }

  async isStageCompleted(stage: number): Promise<boolean> {
    const state = await this.getWorkflowState();
    return state.stages_completed.includes(stage);
  }

  /**
   * Forget this stage and every later one: summaries, transcripts, iteration pointers
   * and completion marks. Checkpoints are kept.
   */
  async clearStage(stage: number): Promise<void> {
    const summaries = await this.readSummaries();
    dropStagesFrom(summaries, stage);
    await atomicWriteJson(this.file(MemoryFile.SUMMARIES), summaries);

    const transcripts = await this.readTranscripts();
    dropStagesFrom(transcripts, stage);
    await atomicWriteJson(this.file(MemoryFile.MESSAGES), transcripts);

    const state = await this.getWorkflowState();
    dropStagesFrom(state.iterations, stage);
    state.stages_completed = state.stages_completed.filter((s) => s < stage);
    state.current_position = { stage, subtask: null, iteration: null };
    await this.writeState(state);

    const log = await this.readCheckpointLog();
    const completed = log.stages_completed.filter((s) => s < stage);
    if (completed.length !== log.stages_completed.length) {
      log.stages_completed = completed;
      await atomicWriteJson(this.file(MemoryFile.CHECKPOINTS), log);
    }
  }

  /**
   * Last subtask saved in this stage, ordered by iteration and then by subtask,
   * or null when the stage is empty. An implementation at iteration 2 comes after
   * the review at iteration 1.
   */
  async resolveResumePoint(stage: number): Promise<ResumePoint | null> {
    const summaries = await this.readSummaries();
    let latest: ResumePoint | null = null;
    for (const subtask of keyNumbers(summaries[stageKey(stage)], "subtask")) {
      const iteration = maxIteration(summaries, stage, subtask);
      if (iteration === 0) continue;
      if (!latest || iteration > latest.iteration || (iteration === latest.iteration && subtask > latest.subtask)) {
        latest = { subtask, iteration };
      }
    }
    return latest;
  }
}

function maxIteration(summaries: KeyedDocument<SummaryRecord>, stage: number, subtask: number): number {
  const iterations = keyNumbers(summaries[stageKey(stage)]?.[subtaskKey(subtask)], "iteration");
  return iterations.length > 0 ? iterations[iterations.length - 1] : 0;
}
