import { Block, INSTRUCTION_BLOCKS, MAX_RETAINED_MESSAGES, REVISION_BLOCKS, USER_SOURCE } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { NULL_OBSERVER, type ProgressObserver, type SessionPhase } from "./progress-tracker.js";
import type { BlockVariables, PromptBlocks } from "./prompt-blocks.js";
import type { ConversationalRole, Message } from "./role.js";
import { textMessage, withContent } from "./role.js";
import { lastTextMessage, RoundRobinSession, type SessionTranscript } from "./round-robin.js";
import { estimateMessageTokens, formatReport, preview, sleep, stripTokens } from "./utils.js";
import { classifyVerdict, type Verdict } from "./verdict.js";

export interface IterationTokens {
  readonly approve: string;
  readonly revise: string;
  readonly implementerDone: string;
  readonly criticDone: string;
}

export interface CriticEvidencePolicy {
  /** Re-prompt the critic when its transcript holds no tool exchange. */
  readonly required: boolean;
  readonly maxReprompts: number;
}

export interface IterationControllerOptions {
  implementerSession: RoundRobinSession;
  criticSession: RoundRobinSession;
  tokens: IterationTokens;
  blocks: PromptBlocks;
  logger: Logger;
  maxRevisions?: number;
  numLastMessages?: number;
  maxMessagesToReturn?: number;
  /** Writes the final report from the whole history. Without one the report is assembled from the history. */
  consolidator?: ConversationalRole;
  instructionBlocks?: readonly string[];
  criticBlocks?: readonly string[];
  revisionBlocks?: readonly string[];
  evidenceBlock?: string;
  criticEvidence?: CriticEvidencePolicy;
  observer?: ProgressObserver;
  /** Pause after every session run. */
  phaseDelayMs?: number;
}

export type IterationState = "approved" | "aborted";

export interface IterationResult {
  readonly state: IterationState;
  readonly artifact: string;
  /** Every retained implementer message and every verdict, in order. */
  readonly history: readonly Message[];
  readonly criticRounds: number;
  readonly implementerRounds: number;
  readonly verdicts: readonly Verdict[];
}

export interface IterationRunOptions {
  signal?: AbortSignal;
  /** Directory the implementer must write into; fills `{{outputDir}}` in the prompt blocks. */
  outputDir: string;
}

/** Whether an implementer message is kept for the critic and for later rounds. */
export function isQualifying(message: Message): boolean {
  return message.kind === "text" && !message.content.toLowerCase().includes("error");
}

/**
 * Alternates an implementer session and a critic session until the critic approves
 * or the revision cap is exceeded. Always ends with an artifact.
 */
export class IterationController {
  private readonly implementerSession: RoundRobinSession;
  private readonly criticSession: RoundRobinSession;
  private readonly tokens: IterationTokens;
  private readonly blocks: PromptBlocks;
  private readonly logger: Logger;
  private readonly maxRevisions: number;
  private readonly numLastMessages: number;
  private readonly maxMessagesToReturn: number;
  private readonly consolidator: ConversationalRole | undefined;
  private readonly instructionBlocks: readonly string[];
  private readonly criticBlocks: readonly string[];
  private readonly revisionBlocks: readonly string[];
  private readonly evidenceBlock: string;
  private readonly criticEvidence: CriticEvidencePolicy;
  private readonly observer: ProgressObserver;
  private readonly phaseDelayMs: number;

  constructor(options: IterationControllerOptions) {
    this.implementerSession = options.implementerSession;
    this.criticSession = options.criticSession;
    this.tokens = options.tokens;
    this.blocks = options.blocks;
    this.logger = options.logger;
    this.maxRevisions = options.maxRevisions ?? 3;
    this.numLastMessages = Math.min(options.numLastMessages ?? 25, MAX_RETAINED_MESSAGES);
    this.maxMessagesToReturn = options.maxMessagesToReturn ?? 25;
    this.consolidator = options.consolidator;
    this.instructionBlocks = options.instructionBlocks ?? INSTRUCTION_BLOCKS;
    this.criticBlocks = options.criticBlocks ?? [Block.CRITIC_TOOLS];
    this.revisionBlocks = options.revisionBlocks ?? REVISION_BLOCKS;
    this.evidenceBlock = options.evidenceBlock ?? Block.CRITIC_EVIDENCE;
    this.criticEvidence = options.criticEvidence ?? { required: false, maxReprompts: 0 };
    this.observer = options.observer ?? NULL_OBSERVER;
    this.phaseDelayMs = options.phaseDelayMs ?? 0;

    if (!Number.isInteger(this.maxRevisions) || this.maxRevisions < 0) {
      throw new Error(`maxRevisions must be a non-negative integer, got ${this.maxRevisions}`);
    }
    if (this.numLastMessages < 1 || this.maxMessagesToReturn < 1) {
      throw new Error("numLastMessages and maxMessagesToReturn must be at least 1");
    }
  }

  async run(taskMessages: readonly Message[], options: IterationRunOptions): Promise<IterationResult> {
    const signal = options.signal ?? new AbortController().signal;
    const vars: BlockVariables = { outputDir: options.outputDir };
    const instructions = this.blocks.messages(this.instructionBlocks, vars);
    const history: Message[] = [];
    const verdicts: Verdict[] = [];

    let retained = await this.runImplementer([...taskMessages, ...instructions], 0, signal);
    let implementerRounds = 1;
    history.push(...retained);

    let verdictMessage: Message | undefined;
    let revisions = 0;
    let criticRounds = 0;
    let state: IterationState;

    for (;;) {
      const criticInput = [
        ...taskMessages,
        ...(verdictMessage ? [verdictMessage] : []),
        ...retained,
        ...this.blocks.messages(this.criticBlocks, vars),
      ];
      this.logger.info(msg.reviewRound(criticRounds + 1, this.maxRevisions + 1));
      const transcript = await this.runCritic(criticInput, criticRounds, vars, signal);
      criticRounds++;

      const last = lastTextMessage(transcript.produced) ?? textMessage(this.criticSession.name, "");
      const verdict = classifyVerdict(last.content, this.tokens);
      verdicts.push(verdict);
      verdictMessage = withContent(
        last,
        stripTokens(last.content, [this.tokens.approve, this.tokens.revise, this.tokens.criticDone]),
      );
      history.push(verdictMessage);

      if (verdict.kind === "approve") {
        this.logger.info(msg.approved(last.source));
        state = "approved";
        break;
      }
      if (verdict.kind === "unclear") {
        this.logger.warn(msg.ambiguousVerdict(verdict.reason));
      } else {
        this.logger.info(msg.revisionRequested(preview(verdictMessage.content)));
      }

      revisions++;
      if (revisions > this.maxRevisions) {
        this.logger.warn(msg.revisionCapReached(this.maxRevisions));
        state = "aborted";
        break;
      }

      const revisionInput = [
        ...taskMessages,
        ...instructions,
        ...retained,
        verdictMessage,
        ...this.blocks.messages(this.revisionBlocks, vars),
      ];
      const next = await this.runImplementer(revisionInput, revisions, signal);
      implementerRounds++;
      if (next.length > 0) {
        retained = next;
        history.push(...next);
      }
    }

    const artifact = await this.buildArtifact(taskMessages, history, signal);
    return { state, artifact, history, criticRounds, implementerRounds, verdicts };
  }

  private async runImplementer(input: readonly Message[], round: number, signal: AbortSignal): Promise<Message[]> {
    const transcript = await this.runSession(this.implementerSession, "implementer", input, round, signal);
    return transcript.produced
      .filter(isQualifying)
      .slice(-this.numLastMessages)
      .map((m) => withContent(m, stripTokens(m.content, [this.tokens.implementerDone])));
  }

  private async runCritic(
    input: readonly Message[],
    round: number,
    vars: BlockVariables,
    signal: AbortSignal,
  ): Promise<SessionTranscript> {
    let transcript = await this.runSession(this.criticSession, "critic", input, round, signal);
    if (!this.criticEvidence.required) return transcript;

    let reprompts = 0;
    while (transcript.toolCalls.length === 0 && reprompts < this.criticEvidence.maxReprompts) {
      reprompts++;
      this.logger.warn(msg.criticEvidenceMissing(reprompts, this.criticEvidence.maxReprompts));
      const withEvidence = [...input, ...this.blocks.messages([this.evidenceBlock], vars)];
      transcript = await this.runSession(this.criticSession, "critic", withEvidence, round, signal);
    }
    return transcript;
  }

  private async runSession(
    session: RoundRobinSession,
    phase: SessionPhase,
    input: readonly Message[],
    round: number,
    signal: AbortSignal,
  ): Promise<SessionTranscript> {
    this.observer.onSessionStart({
      phase,
      round,
      messageCount: input.length,
      tokenEstimate: estimateMessageTokens(input),
    });
    const transcript = await session.run(input, { signal });
    if (transcript.outcome === "max_turns") {
      this.logger.warn(msg.sessionMaxTurns(session.name, transcript.turns));
    }
    await sleep(this.phaseDelayMs, signal);
    return transcript;
  }

  private async buildArtifact(
    taskMessages: readonly Message[],
    history: readonly Message[],
    signal: AbortSignal,
  ): Promise<string> {
    if (!this.consolidator) {
      return formatReport(history.slice(-this.maxMessagesToReturn));
    }

    this.logger.info(msg.consolidating(this.consolidator.name));
    const taskText = taskMessages.map((m) => m.content).join("\n\n");
    const input = [
      textMessage(USER_SOURCE, `# Original Task\n\n${taskText}`),
      textMessage(USER_SOURCE, "# Implementation and Critic Feedback"),
      ...history,
    ];
    const session = new RoundRobinSession({
      name: this.consolidator.name,
      participants: [this.consolidator],
      stopWhen: () => true,
      maxTurns: 1,
    });
    const transcript = await this.runSession(session, "consolidator", input, 0, signal);
    return lastTextMessage(transcript.produced)?.content ?? formatReport(history.slice(-this.maxMessagesToReturn));
  }
}
