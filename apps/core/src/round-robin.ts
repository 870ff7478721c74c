import { isAbortError, RoleInvocationError } from "./errors.js";
import type { ConversationalRole, Message, ToolCall, ToolExchange, TurnContext } from "./role.js";
import { textMessage } from "./role.js";
import type { ToolRegistry } from "./tool-registry.js";

export type SessionOutcome = "stopped" | "max_turns";

export interface SessionTranscript {
  /** Initial messages followed by everything produced. */
  readonly messages: readonly Message[];
  readonly produced: readonly Message[];
  readonly toolCalls: readonly ToolExchange[];
  readonly outcome: SessionOutcome;
  readonly turns: number;
}

export interface RoundRobinOptions {
  name: string;
  participants: readonly ConversationalRole[];
  /** Checked on every role reply; true ends the session. */
  stopWhen: (message: Message) => boolean;
  maxTurns: number;
  tools?: ToolRegistry;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function describeCall(call: ToolCall): string {
  return `${call.name}(${JSON.stringify(call.args)})`;
}

/** Last produced text message, if any. */
export function lastTextMessage(messages: readonly Message[]): Message | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m.kind === "text") return m;
  }
  return undefined;
}

/**
 * Fixed rotation over the participants until a reply satisfies the stop predicate
 * or the turn budget runs out. Each run starts a fresh transcript.
 */
export class RoundRobinSession {
  readonly name: string;
  private readonly participants: readonly ConversationalRole[];
  private readonly stopWhen: (message: Message) => boolean;
  private readonly maxTurns: number;
  private readonly tools: ToolRegistry | undefined;

  constructor(options: RoundRobinOptions) {
    if (options.participants.length === 0) {
      throw new Error(`Session "${options.name}" needs at least one participant`);
    }
    if (!Number.isInteger(options.maxTurns) || options.maxTurns < 1) {
      throw new Error(`Session "${options.name}" needs a positive integer maxTurns, got ${options.maxTurns}`);
    }
    this.name = options.name;
    this.participants = options.participants;
    this.stopWhen = options.stopWhen;
    this.maxTurns = options.maxTurns;
    this.tools = options.tools;
  }

  get participantNames(): string[] {
    return this.participants.map((p) => p.name);
  }

  async run(initialMessages: readonly Message[], options: RunOptions = {}): Promise<SessionTranscript> {
    const signal = options.signal ?? new AbortController().signal;
    const produced: Message[] = [];
    const toolCalls: ToolExchange[] = [];
    let turns = 0;

    for (;;) {
      signal.throwIfAborted();
      if (turns >= this.maxTurns) {
        return this.transcript(initialMessages, produced, toolCalls, "max_turns", turns);
      }

      const role = this.participants[turns % this.participants.length];
      const history = [...initialMessages, ...produced];
      const ctx = this.turnContext(role, signal, produced, toolCalls);

      let content: string;
      try {
        content = (await role.invoke(history, ctx)).content;
      } catch (err) {
        if (isAbortError(err, signal) || err instanceof RoleInvocationError) throw err;
        throw new RoleInvocationError(role.name, err);
      }
      turns++;

      const reply = textMessage(role.name, content);
      produced.push(reply);
      if (this.stopWhen(reply)) {
        return this.transcript(initialMessages, produced, toolCalls, "stopped", turns);
      }
    }
  }

  private turnContext(
    role: ConversationalRole,
    signal: AbortSignal,
    produced: Message[],
    toolCalls: ToolExchange[],
  ): TurnContext {
    const tools = this.tools;
    return {
      signal,
      async callTool(name, args) {
        const call: ToolCall = { name, args: { ...args } };
        produced.push({ source: role.name, content: describeCall(call), kind: "tool_call", toolCall: call });
        const result = tools ? await tools.call(name, call.args, role, signal) : `Error: no tools are available`;
        produced.push({ source: name, content: result, kind: "tool_result", toolCall: call });
        toolCalls.push({ source: role.name, call, result, external: false });
        return result;
      },
      reportToolUse(name, args) {
        const call: ToolCall = { name, args: { ...args } };
        produced.push({ source: role.name, content: describeCall(call), kind: "tool_call", toolCall: call });
        toolCalls.push({ source: role.name, call, external: true });
      },
    };
  }

  private transcript(
    initial: readonly Message[],
    produced: Message[],
    toolCalls: ToolExchange[],
    outcome: SessionOutcome,
    turns: number,
  ): SessionTranscript {
    return { messages: [...initial, ...produced], produced: [...produced], toolCalls: [...toolCalls], outcome, turns };
  }
}
