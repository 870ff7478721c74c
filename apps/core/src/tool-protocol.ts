import type { ToolCall } from "./role.js";
import { isRecord } from "./yaml-validate.js";

const TOOL_BLOCK = /```tool[^\S\n]*\n([\s\S]*?)```/g;

/** Tool calls a reply requests as fenced `tool` blocks holding `{"name": ..., "args": {...}}`. */
export function extractToolCalls(text: string): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const match of text.matchAll(TOOL_BLOCK)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(match[1] ?? "");
    } catch {
      continue;
    }
    if (!isRecord(parsed) || typeof parsed.name !== "string") continue;
    calls.push({ name: parsed.name, args: isRecord(parsed.args) ? parsed.args : {} });
  }
  return calls;
}

/** Prompt section describing how to call the registry tools a role may use. */
export function toolUsageHelp(tools: ReadonlyArray<{ name: string; description: string }>): string {
  if (tools.length === 0) return "";
  const lines = tools.map((t) => `- ${t.name}: ${t.description}`);
  return [
    "## Tools",
    "",
    "Besides your own tools you may call these. Request a call with a fenced block and wait for the result:",
    "",
    '```tool\n{"name": "<tool>", "args": {}}\n```',
    "",
    ...lines,
  ].join("\n");
}
