import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { USER_SOURCE } from "./constants.js";
import { ConfigError } from "./errors.js";
import { DEFAULTS_DIR } from "./paths.js";
import { type Message, textMessage } from "./role.js";
import { isRecord } from "./yaml-validate.js";

const BLOCKS_FILE_NAME = "prompt-blocks.yaml";
const VARIABLE = /\{\{\s*(\w+)\s*\}\}/g;

export type BlockVariables = Readonly<Record<string, string>>;

/** Replace `{{name}}` placeholders. Unknown variables are left as written. */
export function fillTemplate(text: string, variables: BlockVariables): string {
  return text.replace(VARIABLE, (whole, key: string) => variables[key] ?? whole);
}

/** Named prompt text blocks with `{{variable}}` placeholders. */
export class PromptBlocks {
  private readonly blocks: ReadonlyMap<string, string>;

  constructor(blocks: Readonly<Record<string, string>>) {
    this.blocks = new Map(Object.entries(blocks).map(([name, text]) => [name, text.trimEnd()]));
  }

  static parse(yamlContent: string, source: string): PromptBlocks {
    let parsed: unknown;
    try {
      parsed = parseYaml(yamlContent);
    } catch (err) {
      throw new ConfigError(`Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isRecord(parsed)) throw new ConfigError(`${source} must map block names to text`);

    const blocks: Record<string, string> = {};
    for (const [name, text] of Object.entries(parsed)) {
      if (typeof text !== "string" || text.trim() === "") {
        throw new ConfigError(`Prompt block "${name}" in ${source} must be non-empty text`);
      }
      blocks[name] = text;
    }
    return new PromptBlocks(blocks);
  }

  /** Load blocks from the work root, falling back to the bundled defaults. */
  static load(workRoot: string): PromptBlocks {
    const repoPath = path.join(workRoot, BLOCKS_FILE_NAME);
    const source = fs.existsSync(repoPath) ? repoPath : path.join(DEFAULTS_DIR, BLOCKS_FILE_NAME);
    return PromptBlocks.parse(fs.readFileSync(source, "utf-8"), source);
  }

  has(name: string): boolean {
    return this.blocks.has(name);
  }

  names(): string[] {
    return [...this.blocks.keys()];
  }

  /** Block text with variables filled in. */
  get(name: string, variables: BlockVariables = {}): string {
    const text = this.blocks.get(name);
    if (text === undefined) throw new ConfigError(`Unknown prompt block "${name}"`);
    return fillTemplate(text, variables);
  }

  /** One message per block, in the order given. */
  messages(names: readonly string[], variables: BlockVariables = {}, source = USER_SOURCE): Message[] {
    return names.map((name) => textMessage(source, this.get(name, variables)));
  }
}
