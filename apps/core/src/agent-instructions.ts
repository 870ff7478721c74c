import * as fs from "node:fs/promises";
import * as path from "node:path";
import { BUILTIN_AGENT_PREFIX } from "./constants.js";
import { ConfigError } from "./errors.js";
import { DEFAULTS_DIR } from "./paths.js";

const BUNDLED_AGENTS_DIR = path.join(DEFAULTS_DIR, "agents");

/**
 * Resolves role instructions from the society config's `agents` map.
 * - "builtin:<name>" → `<agentsDir>/<name>.md`, falling back to the bundled defaults
 * - File path → relative to the work root, no fallback
 * - Undefined → `<agentsDir>/<agentName>.md`, falling back to the bundled defaults
 */
export class AgentInstructions {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly agents: Readonly<Record<string, string>>,
    private readonly workRoot: string,
    private readonly agentsDir: string,
    private readonly bundledDir: string = BUNDLED_AGENTS_DIR,
  ) {}

  async load(agentName: string): Promise<string> {
    const cached = this.cache.get(agentName);
    if (cached !== undefined) return cached;

    const source = this.agents[agentName];
    let agentFileName: string | undefined;
    let repoFilePath: string;

    if (source === undefined) {
      agentFileName = `${agentName}.md`;
      repoFilePath = path.resolve(this.workRoot, this.agentsDir, agentFileName);
    } else if (source.startsWith(BUILTIN_AGENT_PREFIX)) {
      agentFileName = `${source.slice(BUILTIN_AGENT_PREFIX.length)}.md`;
      repoFilePath = path.resolve(this.workRoot, this.agentsDir, agentFileName);
    } else {
      repoFilePath = path.resolve(this.workRoot, source);
    }

    const candidates = agentFileName ? [repoFilePath, path.join(this.bundledDir, agentFileName)] : [repoFilePath];
    for (const candidate of candidates) {
      const content = await readIfExists(candidate);
      if (content !== undefined) {
        this.cache.set(agentName, content);
        return content;
      }
    }

    throw new ConfigError(
      `Failed to load agent instructions for "${agentName}": not found in work root (${repoFilePath}) or bundled defaults`,
    );
  }
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}
