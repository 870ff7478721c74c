import { isAbortError } from "./errors.js";
import type { RoleId } from "./role.js";

const ERROR_PREFIX = "Error";

export interface ToolRunContext {
  readonly caller: RoleId;
  readonly signal: AbortSignal;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  run(args: Readonly<Record<string, unknown>>, ctx: ToolRunContext): Promise<string>;
}

/** The part of a role the registry needs to authorize a call. */
export interface ToolCaller {
  readonly name: RoleId;
  readonly tools: readonly string[];
}

/** Whether a tool result reports a failure. */
export function isToolError(result: string): boolean {
  return result.startsWith(ERROR_PREFIX);
}

/** Read a required string argument or throw a message the registry turns into an error result. */
export function requireStringArg(args: Readonly<Record<string, unknown>>, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`missing string argument "${key}"`);
  }
  return value;
}

/**
 * Named callables returning text. Failures never throw out of `call`: they come
 * back as results starting with "Error" so the next turn can react to them.
 * Cancellation is the one exception and propagates unchanged.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly counts = new Map<string, number>();

  constructor(definitions: readonly ToolDefinition[] = []) {
    for (const def of definitions) this.register(def);
  }

  register(def: ToolDefinition): this {
    if (this.tools.has(def.name)) {
      throw new Error(`Tool "${def.name}" is already registered`);
    }
    this.tools.set(def.name, def);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  describe(name: string): string | undefined {
    return this.tools.get(name)?.description;
  }

  /** Number of completed calls to `name`, successful or not. */
  invocationCount(name: string): number {
    return this.counts.get(name) ?? 0;
  }

  async call(
    name: string,
    args: Readonly<Record<string, unknown>>,
    caller: ToolCaller,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<string> {
    signal.throwIfAborted();
    const def = this.tools.get(name);
    if (!def) return `${ERROR_PREFIX}: unknown tool "${name}"`;
    if (!caller.tools.includes(name)) {
      return `${ERROR_PREFIX}: role "${caller.name}" may not call tool "${name}"`;
    }

    this.counts.set(name, this.invocationCount(name) + 1);
    try {
      return await def.run(args, { caller: caller.name, signal });
    } catch (err) {
      if (isAbortError(err, signal)) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      return `${ERROR_PREFIX}: ${name} failed: ${detail}`;
    }
  }
}
