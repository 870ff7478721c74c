import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AgentInstructions } from "./agent-instructions.js";

let workRoot: string;
let bundled: string;

beforeEach(() => {
  workRoot = fs.mkdtempSync(path.join(os.tmpdir(), "clockwork-agents-"));
  bundled = path.join(workRoot, "bundled");
  fs.mkdirSync(bundled);
  fs.mkdirSync(path.join(workRoot, "agents"));
  fs.writeFileSync(path.join(bundled, "engineer.md"), "bundled engineer");
  fs.writeFileSync(path.join(bundled, "critic.md"), "bundled critic");
  fs.writeFileSync(path.join(workRoot, "agents", "critic.md"), "local critic");
  fs.writeFileSync(path.join(workRoot, "custom.md"), "custom lead");
});

afterEach(() => {
  fs.rmSync(workRoot, { recursive: true, force: true });
});

function instructions(agents: Record<string, string>): AgentInstructions {
  return new AgentInstructions(agents, workRoot, "agents", bundled);
}

describe("AgentInstructions", () => {
  it("falls back to the bundled file for a builtin agent", async () => {
    expect(await instructions({ engineer: "builtin:engineer" }).load("engineer")).toBe("bundled engineer");
  });

  it("prefers the work root's agents directory", async () => {
    expect(await instructions({ critic: "builtin:critic" }).load("critic")).toBe("local critic");
  });

  it("resolves an undeclared agent by its name", async () => {
    expect(await instructions({}).load("critic")).toBe("local critic");
  });

  it("reads a path source relative to the work root", async () => {
    expect(await instructions({ lead: "custom.md" }).load("lead")).toBe("custom lead");
  });

  it("throws a ConfigError when nothing is found", async () => {
    await expect(instructions({ lead: "missing.md" }).load("lead")).rejects.toMatchObject({ name: "ConfigError" });
  });
});
