import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type CodeRunner, formatExecutionResult } from "./code-runner.js";
import { ToolName } from "./constants.js";
import { requireStringArg, type ToolDefinition } from "./tool-registry.js";

const MAX_SEARCH_RESULTS = 200;

const isWithinOrEqual = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
};

/** Resolve a tool-supplied path inside `root`, rejecting anything that escapes it. */
export function resolveInside(root: string, input: string): string {
  const absolute = path.resolve(root, input);
  if (!isWithinOrEqual(absolute, root)) {
    throw new Error(`path "${input}" is outside ${root}`);
  }
  return absolute;
}

export function executeCodeTool(runner: CodeRunner, workdir: string, timeoutMs: number): ToolDefinition {
  return {
    name: ToolName.EXECUTE_CODE,
    description: "Run a script in the stage work directory and return its output and exit status.",
    async run(args, ctx) {
      const code = requireStringArg(args, "code");
      const result = await runner.execute(code, workdir, timeoutMs, ctx.signal);
      return formatExecutionResult(result, timeoutMs);
    },
  };
}

async function walk(dir: string, root: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (out.length >= MAX_SEARCH_RESULTS) return;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, root, out);
    } else {
      out.push(path.relative(root, full));
    }
  }
}

/** Lists files under a directory, optionally filtered by a case-insensitive substring. */
export function searchDirectoryTool(root: string): ToolDefinition {
  return {
    name: ToolName.SEARCH_DIRECTORY,
    description: 'List files under a directory. Args: "path" (relative to the work root), optional "pattern".',
    async run(args) {
      const dir = resolveInside(root, typeof args.path === "string" ? args.path : ".");
      const pattern = typeof args.pattern === "string" ? args.pattern.toLowerCase() : "";
      const files: string[] = [];
      await walk(dir, dir, files);
      const matches = pattern ? files.filter((f) => f.toLowerCase().includes(pattern)) : files;
      return matches.length > 0 ? matches.join("\n") : "(no files)";
    },
  };
}

/** Reads the lab notebook, a markdown file kept per stage. */
export function readNotebookTool(notebookPath: string): ToolDefinition {
  return {
    name: ToolName.READ_NOTEBOOK,
    description: "Read the lab notebook for the current stage.",
    async run() {
      try {
        return await fs.readFile(notebookPath, "utf-8");
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return "(the notebook is empty)";
        throw err;
      }
    },
  };
}

/** Appends a timestamped entry to the lab notebook. */
export function writeNotebookTool(notebookPath: string, now: () => Date = () => new Date()): ToolDefinition {
  return {
    name: ToolName.WRITE_NOTEBOOK,
    description: 'Append an entry to the lab notebook. Args: "entry", optional "title".',
    async run(args, ctx) {
      const entry = requireStringArg(args, "entry");
      const title = typeof args.title === "string" && args.title.length > 0 ? args.title : ctx.caller;
      await fs.mkdir(path.dirname(notebookPath), { recursive: true });
      await fs.appendFile(notebookPath, `## ${title} — ${now().toISOString()}\n\n${entry.trim()}\n\n`, "utf-8");
      return `Notebook updated: ${path.basename(notebookPath)}`;
    },
  };
}
