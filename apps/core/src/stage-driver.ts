import * as fs from "node:fs/promises";
import * as path from "node:path";
import { executeCodeTool, readNotebookTool, searchDirectoryTool, writeNotebookTool } from "./builtin-tools.js";
import type { CodeRunner } from "./code-runner.js";
import { CodeRunnerRole } from "./code-runner.js";
import { CODE_EXECUTOR_ROLE, USER_SOURCE } from "./constants.js";
import { isAbortError, RoleInvocationError, StageFailedError } from "./errors.js";
import { IterationController } from "./iteration-controller.js";
import type { Logger } from "./logger.js";
import type { MemoryStore, ResumePoint } from "./memory-store.js";
import { msg } from "./messages.js";
import { notebookPath, stageOutputDir, stageWorkDir } from "./paths.js";
import { PlanningController } from "./planning-controller.js";
import type { ProgressTracker } from "./progress-tracker.js";
import { type BlockVariables, fillTemplate, type PromptBlocks } from "./prompt-blocks.js";
import type { ConversationalRole, Message } from "./role.js";
import { textMessage } from "./role.js";
import { lastTextMessage, RoundRobinSession } from "./round-robin.js";
import { type DiscussionConfig, findStage, type SocietyConfig, type StageConfig } from "./society-config.js";
import { ToolRegistry } from "./tool-registry.js";
import { containsToken, sleep } from "./utils.js";

export type StageMode = "fresh" | "restart" | "resume";

export interface ToolSpec {
  name: string;
  description: string;
}

/** Builds the conversational role for a configured agent. */
export interface RoleFactory {
  createRole(name: string, options?: { tools?: readonly ToolSpec[] }): ConversationalRole;
}

export interface StageDriverOptions {
  society: SocietyConfig;
  store: MemoryStore;
  blocks: PromptBlocks;
  roles: RoleFactory;
  codeRunner: CodeRunner;
  logger: Logger;
  workRoot: string;
  tracker?: ProgressTracker;
  /** Attempts per subtask, including the first. */
  maxRetries?: number;
  /** Backoff unit; attempt n waits n × retryDelayMs. */
  retryDelayMs?: number;
  phaseDelayMs?: number;
  codeTimeoutMs?: number;
}

export type StageStatus = "completed" | "skipped" | "exhausted";

export interface StageOutcome {
  readonly stage: number;
  readonly status: StageStatus;
  /** Last iteration run (or found on resume). */
  readonly iterations: number;
  readonly workflowDone: boolean;
}

interface SubtaskResult {
  transcript: readonly Message[];
  summary: string;
}

/** Where a stage picks up: planning first, or straight into the iteration loop. */
interface StartPoint {
  runPlanning: boolean;
  iteration: number;
  skipImplementation: boolean;
}

interface StageContext {
  config: StageConfig;
  registry: ToolRegistry;
  variables: (iteration: number) => BlockVariables;
  signal: AbortSignal;
}

const subtaskLabel = (stage: number, subtask: number, iteration: number) =>
  `Stage ${stage}, subtask ${subtask}, iteration ${iteration} saved`;

/**
 * Runs one stage: planning, then implementation and review alternating until the
 * review accepts or the iteration budget runs out. Every subtask is saved and
 * checkpointed before the next one starts.
 */
export class StageDriver {
  private readonly society: SocietyConfig;
  private readonly store: MemoryStore;
  private readonly blocks: PromptBlocks;
  private readonly roles: RoleFactory;
  private readonly codeRunner: CodeRunner;
  private readonly logger: Logger;
  private readonly workRoot: string;
  private readonly tracker: ProgressTracker | undefined;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly phaseDelayMs: number;
  private readonly codeTimeoutMs: number;

  constructor(options: StageDriverOptions) {
    this.society = options.society;
    this.store = options.store;
    this.blocks = options.blocks;
    this.roles = options.roles;
    this.codeRunner = options.codeRunner;
    this.logger = options.logger;
    this.workRoot = options.workRoot;
    this.tracker = options.tracker;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.phaseDelayMs = options.phaseDelayMs ?? 0;
    this.codeTimeoutMs = options.codeTimeoutMs ?? 600_000;
  }

  async runStage(stageNumber: number, mode: StageMode, signal: AbortSignal): Promise<StageOutcome> {
    const config = findStage(this.society, stageNumber);
    const { stage } = config;
    this.logger.info(msg.stageStart(stage, config.name));
    await this.warnIfPreviousIncomplete(stage);

    const workDir = stageWorkDir(this.workRoot, stage);
    let resumePoint: ResumePoint | null = null;

    if (mode === "restart") {
      this.logger.info(msg.stageRestart(stage));
      await this.store.clearStage(stage);
      await fs.rm(workDir, { recursive: true, force: true });
    } else if (mode === "resume") {
      resumePoint = await this.store.resolveResumePoint(stage);
      if (resumePoint) {
        this.logger.info(msg.stageResume(stage, resumePoint.subtask, resumePoint.iteration));
      } else {
        this.logger.warn(msg.stageNothingToResume(stage));
      }
    } else if (await this.store.isStageCompleted(stage)) {
      this.logger.info(msg.stageAlreadyCompleted(stage));
      return { stage, status: "skipped", iterations: 0, workflowDone: false };
    }

    await fs.mkdir(path.join(workDir, stageOutputDir(stage)), { recursive: true });
    const ctx: StageContext = {
      config,
      registry: this.buildRegistry(stage, workDir),
      variables: (iteration) => ({
        stage: String(stage),
        iteration: String(iteration),
        outputDir: stageOutputDir(stage),
        workDir,
      }),
      signal,
    };

    const start = await this.startPoint(config, resumePoint);
    if (start === "accepted") {
      const iterations = resumePoint?.iteration ?? 1;
      return this.completeStage(stage, iterations, await this.reviewReportedDone(stage, iterations));
    }

    if (start.runPlanning) await this.runPlanning(ctx);

    for (let iteration = start.iteration; iteration <= config.maxIterations; iteration++) {
      const skipImplementation = start.skipImplementation && iteration === start.iteration;
      if (!skipImplementation) await this.runImplementation(ctx, iteration);

      if (!config.review) return this.completeStage(stage, iteration, false);

      const review = await this.runReview(ctx, config.review, iteration);
      if (review.accepted) return this.completeStage(stage, iteration, review.workflowDone);
    }

    this.logger.warn(msg.stageIterationsExhausted(stage, config.maxIterations));
    return { stage, status: "exhausted", iterations: config.maxIterations, workflowDone: false };
  }

  private async warnIfPreviousIncomplete(stage: number): Promise<void> {
    const earlier = this.society.stages.filter((s) => s.stage < stage);
    if (earlier.length === 0) return;
    const previous = earlier[earlier.length - 1].stage;
    if (!(await this.store.isStageCompleted(previous))) {
      this.logger.warn(msg.stagePrerequisiteMissing(previous));
    }
  }

  /** Map the last saved subtask to the next step to run. */
  private async startPoint(config: StageConfig, resume: ResumePoint | null): Promise<StartPoint | "accepted"> {
    if (!resume) return { runPlanning: true, iteration: 1, skipImplementation: false };
    switch (resume.subtask) {
      case 1:
        return { runPlanning: false, iteration: 1, skipImplementation: false };
      case 2:
        if (!config.review) return "accepted";
        return { runPlanning: false, iteration: resume.iteration, skipImplementation: true };
      default: {
        const summary = await this.store.getSummary(config.stage, 3, resume.iteration);
        if (summary && this.isAcceptance(summary.summary)) return "accepted";
        return { runPlanning: false, iteration: resume.iteration + 1, skipImplementation: false };
      }
    }
  }

  private buildRegistry(stage: number, workDir: string): ToolRegistry {
    const notebook = notebookPath(this.workRoot, stage);
    return new ToolRegistry([
      executeCodeTool(this.codeRunner, workDir, this.codeTimeoutMs),
      searchDirectoryTool(workDir),
      readNotebookTool(notebook),
      writeNotebookTool(notebook),
    ]);
  }

  private createRole(name: string, tools: readonly string[], registry: ToolRegistry): ConversationalRole {
    const specs = tools.map((t) => ({ name: t, description: registry.describe(t) ?? "" }));
    return this.roles.createRole(name, { tools: specs });
  }

  // --- Subtasks ---

  private async runPlanning(ctx: StageContext): Promise<void> {
    const { stage, planning } = ctx.config;
    this.logger.info(msg.subtaskPlanning(stage));
    await this.runSubtask(ctx, 1, 1, planning.task, async (prompt) => {
      const result = await this.discussion(ctx, "planning", planning, 1).run([textMessage(USER_SOURCE, prompt)], {
        signal: ctx.signal,
        variables: ctx.variables(1),
      });
      return { transcript: result.transcript.messages, summary: lastTextMessage(result.transcript.produced)?.content ?? "" };
    });
  }

  private async runImplementation(ctx: StageContext, iteration: number): Promise<void> {
    const { stage, implementation: impl } = ctx.config;
    const { tokens } = this.society;
    this.logger.info(msg.subtaskImplementation(stage, iteration));
    const template = iteration > 1 && impl.revisionTask ? impl.revisionTask : impl.task;

    await this.runSubtask(ctx, 2, iteration, template, async (prompt) => {
      const implementerSession = new RoundRobinSession({
        name: `${impl.implementer} session`,
        participants: [
          this.createRole(impl.implementer, impl.implementerTools, ctx.registry),
          new CodeRunnerRole(CODE_EXECUTOR_ROLE),
        ],
        stopWhen: (m) => containsToken(m.content, tokens.implementerDone),
        maxTurns: impl.implementerMaxTurns,
        tools: ctx.registry,
      });
      const criticSession = new RoundRobinSession({
        name: `${impl.critic} session`,
        participants: [this.createRole(impl.critic, impl.criticTools, ctx.registry)],
        stopWhen: (m) =>
          containsToken(m.content, tokens.criticDone) ||
          containsToken(m.content, tokens.approve) ||
          containsToken(m.content, tokens.revise),
        maxTurns: impl.criticMaxTurns,
        tools: ctx.registry,
      });
      const controller = new IterationController({
        implementerSession,
        criticSession,
        tokens,
        blocks: this.blocks,
        logger: this.logger,
        maxRevisions: impl.maxRevisions,
        numLastMessages: impl.numLastMessages,
        maxMessagesToReturn: impl.maxMessagesToReturn,
        consolidator: impl.consolidator ? this.roles.createRole(impl.consolidator) : undefined,
        criticEvidence: impl.criticEvidence,
        observer: this.tracker,
        phaseDelayMs: this.phaseDelayMs,
      });

      const result = await controller.run([textMessage(USER_SOURCE, prompt)], {
        signal: ctx.signal,
        outputDir: stageOutputDir(stage),
      });
      this.logger.info(msg.implementationFinished(result.state, result.criticRounds));
      return { transcript: result.history, summary: result.artifact };
    });
  }

  private async runReview(
    ctx: StageContext,
    review: DiscussionConfig,
    iteration: number,
  ): Promise<{ accepted: boolean; workflowDone: boolean }> {
    this.logger.info(msg.subtaskReview(ctx.config.stage, iteration));
    const outcome = await this.runSubtask(ctx, 3, iteration, review.task, async (prompt) => {
      const result = await this.discussion(ctx, "review", review, iteration).run([textMessage(USER_SOURCE, prompt)], {
        signal: ctx.signal,
        variables: ctx.variables(iteration),
      });
      const summary = lastTextMessage(result.transcript.produced)?.content ?? "";
      return {
        transcript: result.transcript.messages,
        summary,
        accepted: this.isAcceptance(summary),
        workflowDone: result.workflowDone,
      };
    });
    this.logger.info(msg.reviewVerdict(outcome.accepted));
    return { accepted: outcome.accepted, workflowDone: outcome.workflowDone };
  }

  private discussion(ctx: StageContext, label: string, config: DiscussionConfig, iteration: number) {
    const { tokens } = this.society;
    return new PlanningController({
      name: `Stage ${ctx.config.stage} ${label} (iteration ${iteration})`,
      participants: config.roles.map((r) => this.createRole(r, config.tools, ctx.registry)),
      maxTurns: config.maxTurns,
      tokens: { terminate: tokens.planningDone, workflowDone: tokens.workflowDone },
      blocks: this.blocks,
      logger: this.logger,
      reminderBlocks: config.reminders,
      tools: ctx.registry,
      observer: this.tracker,
      phaseDelayMs: this.phaseDelayMs,
    });
  }

  private isAcceptance(text: string): boolean {
    const { tokens } = this.society;
    return containsToken(text, tokens.stageAccepted) || containsToken(text, tokens.workflowDone);
  }

  private async reviewReportedDone(stage: number, iteration: number): Promise<boolean> {
    const summary = await this.store.getSummary(stage, 3, iteration);
    return summary !== undefined && containsToken(summary.summary, this.society.tokens.workflowDone);
  }

  /** formatTaskPrompt, updatePosition, run with retries, save, checkpoint. */
  private async runSubtask<R extends SubtaskResult>(
    ctx: StageContext,
    subtask: number,
    iteration: number,
    template: string,
    execute: (prompt: string) => Promise<R>,
  ): Promise<R> {
    const { stage } = ctx.config;
    const key = this.tracker?.addSubtask(stage, subtask, iteration);
    if (key) this.tracker?.activate(key);

    const taskText = fillTemplate(template, ctx.variables(iteration)).trim();
    const prompt = await this.store.formatTaskPrompt(stage, subtask, taskText, iteration);
    await this.store.updatePosition(stage, subtask, iteration);

    let result: R;
    try {
      result = await this.withRetries(stage, subtask, iteration, () => execute(prompt), ctx.signal);
    } catch (err) {
      if (key) this.tracker?.fail(key);
      throw err;
    }

    await this.store.save(stage, subtask, iteration, result.transcript, result.summary, taskText);
    this.logger.info(msg.subtaskSaved(stage, subtask, iteration));
    const label = subtaskLabel(stage, subtask, iteration);
    await this.store.checkpoint({ stage, subtask, iteration }, label);
    this.logger.info(msg.checkpointSaved(label));
    if (key) this.tracker?.complete(key);
    return result;
  }

  private async withRetries<T>(
    stage: number,
    subtask: number,
    iteration: number,
    fn: () => Promise<T>,
    signal: AbortSignal,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (isAbortError(err, signal) || !(err instanceof RoleInvocationError)) throw err;
        this.logger.error(err.message);
        if (attempt >= this.maxRetries) {
          this.logger.error(msg.subtaskFailed(stage, subtask, iteration, this.maxRetries));
          throw new StageFailedError(stage, subtask, iteration, err);
        }
        this.logger.warn(msg.subtaskRetry(attempt + 1, this.maxRetries));
        await sleep(this.retryDelayMs * attempt, signal);
      }
    }
  }

  private async completeStage(stage: number, iterations: number, workflowDone: boolean): Promise<StageOutcome> {
    await this.store.markStageCompleted(stage);
    await this.store.updatePosition(stage + 1);
    const label = `Stage ${stage} completed, ready for stage ${stage + 1}`;
    await this.store.checkpoint({ stage: stage + 1, subtask: null, iteration: null }, label);
    this.logger.info(msg.checkpointSaved(label));
    this.logger.info(msg.stageComplete(stage, iterations));
    return { stage, status: "completed", iterations, workflowDone };
  }
}
