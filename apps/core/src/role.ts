/** Opaque role identifier. Roles are configuration, not types. */
export type RoleId = string;

export type MessageKind = "text" | "tool_call" | "tool_result";

export interface ToolCall {
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>>;
}

export interface Message {
  readonly source: RoleId;
  readonly content: string;
  readonly kind: MessageKind;
  readonly toolCall?: ToolCall;
}

/**
 * A tool call made during a session. `external` exchanges were executed by the
 * role's own backend and only reported; their result is not known to the session.
 */
export interface ToolExchange {
  readonly source: RoleId;
  readonly call: ToolCall;
  readonly result?: string;
  readonly external: boolean;
}

export interface RoleReply {
  readonly content: string;
}

/** Per-turn services a session hands to the role whose turn it is. */
export interface TurnContext {
  readonly signal: AbortSignal;
  /** Run a tool from the role's capability set and wait for its text result. */
  callTool(name: string, args: Record<string, unknown>): Promise<string>;
  /** Record a tool call the role's backend executed on its own. */
  reportToolUse(name: string, args: Record<string, unknown>): void;
}

/** A participant in a session: history in, one reply out. */
export interface ConversationalRole {
  readonly name: RoleId;
  /** Tool names this role may call through its turn context. */
  readonly tools: readonly string[];
  invoke(history: readonly Message[], ctx: TurnContext): Promise<RoleReply>;
}

export function textMessage(source: RoleId, content: string): Message {
  return { source, content, kind: "text" };
}

/** Copy of `message` with new content; messages are never mutated. */
export function withContent(message: Message, content: string): Message {
  return { ...message, content };
}
