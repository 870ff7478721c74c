import type { Message } from "./role.js";

// ---------------------------------------------------------------------------
// Token estimation
// ---------------------------------------------------------------------------

/** Rough token estimate used for telemetry: three tokens per whitespace-separated word. */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  return words.length * 3;
}

/** Token estimate over the content of every message. */
export function estimateMessageTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, m) => sum + estimateTokens(m.content), 0);
}

// ---------------------------------------------------------------------------
// Control tokens
// ---------------------------------------------------------------------------

/** Check whether a response contains the given control token. Tokens are matched case-sensitively. */
export function containsToken(text: string, token: string): boolean {
  return token.length > 0 && text.includes(token);
}

/**
 * Remove every occurrence of the given tokens and trim the result.
 * Longer tokens go first so a token that contains another is removed whole.
 */
export function stripTokens(text: string, tokens: readonly string[]): string {
  const ordered = [...tokens].filter((t) => t.length > 0).sort((a, b) => b.length - a.length);
  let out = text;
  for (const token of ordered) {
    out = out.split(token).join("");
  }
  return out.trim();
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Render a history as plain text for a backend that takes a single prompt. */
export function renderHistory(messages: readonly Message[]): string {
  return messages
    .map((m) => {
      if (m.kind === "tool_call") return `[${m.source} called ${m.content}]`;
      if (m.kind === "tool_result") return `[tool result]\n${m.content}`;
      return `### ${m.source}\n${m.content}`;
    })
    .join("\n\n");
}

/** Format messages as one markdown report with numbered sections. */
export function formatReport(messages: readonly Message[]): string {
  const parts = ["# IMPLEMENTATION REPORT", ""];
  messages.forEach((m, i) => {
    parts.push(`## Message ${i + 1} from ${m.source}`, "", m.content, "", "=".repeat(80), "");
  });
  return parts.join("\n").trimEnd();
}

// ---------------------------------------------------------------------------
// Timing
// ---------------------------------------------------------------------------

/** Wait `ms` milliseconds. Rejects with the signal's reason if it aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** One-line preview of a long text for log output. */
export function preview(text: string, length = 120): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > length ? flat.substring(0, length) : flat;
}

/** Settle with `promise`, or reject with the signal's reason as soon as it aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  signal.throwIfAborted();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
