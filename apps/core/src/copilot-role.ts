import type { CopilotSession } from "@github/copilot-sdk";
import { CopilotClient } from "@github/copilot-sdk";
import type { AgentInstructions } from "./agent-instructions.js";
import { SessionEvent, SYSTEM_MESSAGE_MODE } from "./constants.js";
import type { Logger } from "./logger.js";
import { msg } from "./messages.js";
import type { ConversationalRole, Message, RoleReply, TurnContext } from "./role.js";
import { extractToolCalls, toolUsageHelp } from "./tool-protocol.js";
import { raceAbort, renderHistory } from "./utils.js";
import { isRecord } from "./yaml-validate.js";

/** Follow-up prompts with tool results per role turn. */
const MAX_TOOL_ROUNDS = 5;

export interface CopilotBackendOptions {
  verbose: boolean;
  sessionTimeoutMs: number;
  primaryModel: string;
}

export interface CopilotRoleOptions {
  agent?: string;
  model?: string;
  tools?: ReadonlyArray<{ name: string; description: string }>;
}

/** LLM backend: one Copilot SDK session per role invocation. */
export class CopilotBackend {
  private readonly client: CopilotClient;

  constructor(
    private readonly options: CopilotBackendOptions,
    private readonly instructions: AgentInstructions,
    private readonly logger: Logger,
  ) {
    this.client = new CopilotClient({
      logLevel: options.verbose ? "debug" : "warning",
    });
  }

  async start(): Promise<void> {
    await this.client.start();
  }

  async stop(): Promise<void> {
    await this.client.stop();
  }

  createRole(name: string, options: CopilotRoleOptions = {}): CopilotRole {
    return new CopilotRole(name, options.agent ?? name, this, options.model, options.tools ?? []);
  }

  /**
   * Run one prompt in a fresh session. Requested registry tools are executed through
   * the turn context and their results sent back in the same session. Tool executions
   * the SDK performs on its own are reported as external exchanges.
   */
  async complete(agent: string, prompt: string, ctx: TurnContext, model?: string, useTools = false): Promise<string> {
    ctx.signal.throwIfAborted();
    const instructions = await this.instructions.load(agent);
    const session = await this.client.createSession({
      model: model ?? this.options.primaryModel,
      systemMessage: { mode: SYSTEM_MESSAGE_MODE, content: instructions },
      onPermissionRequest: async () => ({ kind: "approved" }),
    });
    this.attachListeners(session, ctx);

    try {
      let reply = await this.send(session, prompt, agent, ctx.signal);
      for (let round = 0; useTools && round < MAX_TOOL_ROUNDS; round++) {
        const calls = extractToolCalls(reply);
        if (calls.length === 0) break;
        const results: string[] = [];
        for (const call of calls) {
          results.push(`### ${call.name}\n${await ctx.callTool(call.name, { ...call.args })}`);
        }
        reply = await this.send(session, `Tool results:\n\n${results.join("\n\n")}`, agent, ctx.signal);
      }
      return reply;
    } finally {
      await session.destroy();
    }
  }

  private async send(session: CopilotSession, prompt: string, agent: string, signal: AbortSignal): Promise<string> {
    this.logger.startWaiting(msg.roleWorking(agent));
    try {
      const response = await raceAbort(session.sendAndWait({ prompt }, this.options.sessionTimeoutMs), signal);
      return response?.data.content ?? "";
    } finally {
      this.logger.stopWaiting();
      this.logger.endStream();
    }
  }

  private attachListeners(session: CopilotSession, ctx: TurnContext): void {
    session.on(SessionEvent.TOOL_EXECUTION_START, (e) => {
      const args = isRecord(e.data.arguments) ? e.data.arguments : {};
      ctx.reportToolUse(e.data.toolName, args);
      this.logger.debug(msg.toolExecution(e.data.toolName));
    });
    if (this.options.verbose) {
      session.on(SessionEvent.MESSAGE_DELTA, (e) => {
        this.logger.stream(e.data.deltaContent);
      });
      session.on(SessionEvent.INTENT, (e) => {
        this.logger.debug(msg.intentUpdate(e.data.intent));
      });
    }
  }
}

/** Conversational role answering through a Copilot SDK session with its agent instructions. */
export class CopilotRole implements ConversationalRole {
  readonly tools: readonly string[];
  private readonly toolHelp: string;

  constructor(
    readonly name: string,
    readonly agent: string,
    private readonly backend: CopilotBackend,
    private readonly model: string | undefined,
    tools: ReadonlyArray<{ name: string; description: string }>,
  ) {
    this.tools = tools.map((t) => t.name);
    this.toolHelp = toolUsageHelp(tools);
  }

  async invoke(history: readonly Message[], ctx: TurnContext): Promise<RoleReply> {
    const parts = [renderHistory(history)];
    if (this.toolHelp) parts.push(this.toolHelp);
    parts.push(`### ${this.name}\n(Your turn. Reply as ${this.name}.)`);
    const content = await this.backend.complete(this.agent, parts.join("\n\n"), ctx, this.model, this.tools.length > 0);
    return { content };
  }
}
