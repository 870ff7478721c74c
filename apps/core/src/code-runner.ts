import { spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ToolName } from "./constants.js";
import { msg } from "./messages.js";
import type { ConversationalRole, Message, RoleReply, TurnContext } from "./role.js";

/** Exit status reported when a script is killed for running past its timeout. */
export const TIMEOUT_EXIT_STATUS = 124;

export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitStatus: number;
  readonly timedOut: boolean;
}

/** Sandboxed script execution. */
export interface CodeRunner {
  execute(script: string, workdir: string, timeoutMs: number, signal?: AbortSignal): Promise<ExecutionResult>;
}

export interface LocalCodeRunnerOptions {
  /** Interpreter binary. */
  interpreter: string;
  /** Extension of the temporary script file. */
  extension?: string;
}

/** Runs scripts with a local interpreter, one child process per script. */
export class LocalCodeRunner implements CodeRunner {
  private readonly interpreter: string;
  private readonly extension: string;

  constructor(options: LocalCodeRunnerOptions) {
    this.interpreter = options.interpreter;
    this.extension = options.extension ?? ".py";
  }

  async execute(script: string, workdir: string, timeoutMs: number, signal?: AbortSignal): Promise<ExecutionResult> {
    signal?.throwIfAborted();
    await fs.mkdir(workdir, { recursive: true });
    const scriptPath = path.join(workdir, `tmp_code_${randomUUID()}${this.extension}`);
    await fs.writeFile(scriptPath, script, "utf-8");
    try {
      return await this.spawnScript(scriptPath, workdir, timeoutMs, signal);
    } finally {
      await fs.rm(scriptPath, { force: true });
    }
  }

  private spawnScript(
    scriptPath: string,
    workdir: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = spawn(this.interpreter, [scriptPath], {
        cwd: workdir,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;
      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, timeoutMs);
      const onAbort = () => {
        child.kill("SIGKILL");
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      child.on("error", (err) => {
        cleanup();
        reject(err);
      });
      child.on("close", (code) => {
        cleanup();
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }
        if (timedOut) {
          resolve({ stdout, stderr, exitStatus: TIMEOUT_EXIT_STATUS, timedOut: true });
          return;
        }
        resolve({ stdout, stderr, exitStatus: code ?? 1, timedOut: false });
      });
    });
  }
}

/** Text form of an execution result, as tools and the code-runner role report it. */
export function formatExecutionResult(result: ExecutionResult, timeoutMs: number): string {
  const output = `${result.stdout}${result.stderr}`.trim();
  if (result.timedOut) {
    const header = `Error: ${msg.codeTimedOut(Math.round(timeoutMs / 1000))} (exit status ${result.exitStatus})`;
    return output ? `${header}\n${output}` : header;
  }
  if (result.exitStatus !== 0) {
    const header = `Error: exit status ${result.exitStatus}`;
    return output ? `${header}\n${output}` : header;
  }
  return output || "(no output)";
}

const CODE_BLOCK = /```([\w+-]*)[^\S\n]*\n([\s\S]*?)```/g;

export interface CodeBlock {
  readonly language: string;
  readonly code: string;
}

/** Extract fenced code blocks from markdown, in order. */
export function extractCodeBlocks(text: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  for (const match of text.matchAll(CODE_BLOCK)) {
    const code = match[2] ?? "";
    if (code.trim().length === 0) continue;
    blocks.push({ language: (match[1] ?? "").toLowerCase(), code });
  }
  return blocks;
}

export const NO_CODE_REPLY =
  "No code blocks found in the last message. Please provide at least one markdown-encoded code block to execute.";

/**
 * Session participant that executes the code blocks of the most recent text message
 * from another role through the `execute_code` tool.
 */
export class CodeRunnerRole implements ConversationalRole {
  readonly tools = [ToolName.EXECUTE_CODE];

  constructor(
    readonly name: string,
    private readonly languages: readonly string[] = ["python", "py", "sh", "bash", ""],
  ) {}

  async invoke(history: readonly Message[], ctx: TurnContext): Promise<RoleReply> {
    const last = [...history].reverse().find((m) => m.kind === "text" && m.source !== this.name);
    const blocks = last ? extractCodeBlocks(last.content).filter((b) => this.languages.includes(b.language)) : [];
    if (blocks.length === 0) return { content: NO_CODE_REPLY };

    const results: string[] = [];
    for (const block of blocks) {
      results.push(await ctx.callTool(ToolName.EXECUTE_CODE, { code: block.code, language: block.language }));
    }
    return { content: results.join("\n\n") };
  }
}
