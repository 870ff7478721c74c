import { Block } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { NULL_OBSERVER, type ProgressObserver } from "./progress-tracker.js";
import type { BlockVariables, PromptBlocks } from "./prompt-blocks.js";
import type { ConversationalRole, Message } from "./role.js";
import { textMessage, withContent } from "./role.js";
import { lastTextMessage, RoundRobinSession, type SessionOutcome, type SessionTranscript } from "./round-robin.js";
import type { ToolRegistry } from "./tool-registry.js";
import { containsToken, estimateMessageTokens, sleep, stripTokens } from "./utils.js";

export interface PlanningTokens {
  readonly terminate: string;
  readonly workflowDone: string;
}

export interface PlanningControllerOptions {
  name: string;
  participants: readonly ConversationalRole[];
  maxTurns: number;
  tokens: PlanningTokens;
  blocks: PromptBlocks;
  logger: Logger;
  /** Placed ahead of the task messages. */
  reminderBlocks?: readonly string[];
  tools?: ToolRegistry;
  observer?: ProgressObserver;
  phaseDelayMs?: number;
}

export interface PlanningResult {
  /** Final planning message with the control tokens removed. */
  readonly message: Message;
  readonly workflowDone: boolean;
  readonly outcome: SessionOutcome;
  readonly transcript: SessionTranscript;
}

export interface PlanningRunOptions {
  signal?: AbortSignal;
  variables?: BlockVariables;
}

/** One round-robin discussion among the planning roles, ending in a single plan message. */
export class PlanningController {
  private readonly session: RoundRobinSession;
  private readonly tokens: PlanningTokens;
  private readonly blocks: PromptBlocks;
  private readonly logger: Logger;
  private readonly reminderBlocks: readonly string[];
  private readonly observer: ProgressObserver;
  private readonly phaseDelayMs: number;

  constructor(options: PlanningControllerOptions) {
    const { terminate, workflowDone } = options.tokens;
    this.session = new RoundRobinSession({
      name: options.name,
      participants: options.participants,
      maxTurns: options.maxTurns,
      tools: options.tools,
      stopWhen: (m) => containsToken(m.content, terminate) || containsToken(m.content, workflowDone),
    });
    this.tokens = options.tokens;
    this.blocks = options.blocks;
    this.logger = options.logger;
    this.reminderBlocks = options.reminderBlocks ?? [Block.PERFORMANCE_TARGETS];
    this.observer = options.observer ?? NULL_OBSERVER;
    this.phaseDelayMs = options.phaseDelayMs ?? 0;
  }

  async run(taskMessages: readonly Message[], options: PlanningRunOptions = {}): Promise<PlanningResult> {
    const signal = options.signal ?? new AbortController().signal;
    const input = [...this.blocks.messages(this.reminderBlocks, options.variables), ...taskMessages];

    this.observer.onSessionStart({
      phase: "planning",
      round: 0,
      messageCount: input.length,
      tokenEstimate: estimateMessageTokens(input),
    });
    const transcript = await this.session.run(input, { signal });
    if (transcript.outcome === "max_turns") {
      this.logger.warn(msg.sessionMaxTurns(this.session.name, transcript.turns));
    } else {
      this.logger.info(msg.planningStopped(this.session.name));
    }
    await sleep(this.phaseDelayMs, signal);

    const last = lastTextMessage(transcript.produced) ?? textMessage(this.session.name, "");
    const workflowDone = containsToken(last.content, this.tokens.workflowDone);
    if (workflowDone) this.logger.info(msg.workflowDone);
    const message = withContent(last, stripTokens(last.content, [this.tokens.terminate, this.tokens.workflowDone]));
    return { message, workflowDone, outcome: transcript.outcome, transcript };
  }
}
