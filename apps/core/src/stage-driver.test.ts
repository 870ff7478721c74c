import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CodeRunner, ExecutionResult } from "./code-runner.js";
import type { Logger } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import { msg } from "./messages.js";
import { stageWorkDir } from "./paths.js";
import { ProgressTracker } from "./progress-tracker.js";
import { PromptBlocks } from "./prompt-blocks.js";
import { type ConversationalRole, textMessage } from "./role.js";
import { parseSocietyConfig, type SocietyConfig } from "./society-config.js";
import { type RoleFactory, StageDriver, type StageDriverOptions } from "./stage-driver.js";
import { quietLogger, ScriptedRole, type ScriptStep } from "./testing/scripted-role.js";

const FIXED = new Date("2026-03-04T05:06:07.000Z");
const PREAMBLE =
  "## Summaries of previous tasks\n\nThese are not the current task, but they may hold relevant information.\n\n";

const blocks = new PromptBlocks({
  "output-directory": "OUT {{outputDir}}",
  "best-practices": "PRACTICES",
  "notebook-reminder": "NOTEBOOK",
  "critic-tools": "TOOLS",
  "critic-evidence": "EVIDENCE",
  "directory-reminder": "DIR",
  "troubleshooting-reminder": "TROUBLE",
  "feedback-acknowledgement": "ACK",
  "performance-targets": "TARGETS",
});

const society: SocietyConfig = parseSocietyConfig({
  agents: {
    lead: "builtin:lead",
    engineer: "builtin:engineer",
    critic: "builtin:critic",
    summarizer: "builtin:summarizer",
  },
  stages: [
    {
      stage: 1,
      name: "Split",
      maxIterations: 2,
      planning: { roles: ["lead"], maxTurns: 3, task: "Plan stage {{stage}}" },
      implementation: {
        implementer: "engineer",
        critic: "critic",
        consolidator: "summarizer",
        implementerMaxTurns: 5,
        task: "Build in {{outputDir}}",
        revisionTask: "Revise iteration {{iteration}}",
      },
      review: { roles: ["lead"], maxTurns: 3, task: "Review iteration {{iteration}}" },
    },
    {
      stage: 2,
      name: "Train",
      maxIterations: 1,
      planning: { roles: ["lead"], maxTurns: 3, task: "Plan training" },
      implementation: { implementer: "engineer", critic: "critic", task: "Train" },
    },
  ],
});

class FakeRunner implements CodeRunner {
  readonly scripts: string[] = [];
  readonly workdirs: string[] = [];

  async execute(script: string, workdir: string): Promise<ExecutionResult> {
    this.scripts.push(script);
    this.workdirs.push(workdir);
    return { stdout: "1\n", stderr: "", exitStatus: 0, timedOut: false };
  }
}

class FixedRoles implements RoleFactory {
  private readonly roles: Map<string, ConversationalRole>;

  constructor(roles: readonly ConversationalRole[]) {
    this.roles = new Map(roles.map((r) => [r.name, r]));
  }

  createRole(name: string): ConversationalRole {
    const role = this.roles.get(name);
    if (!role) throw new Error(`No role named ${name}`);
    return role;
  }
}

interface Scripts {
  lead: ScriptStep[];
  engineer?: ScriptStep[];
  critic?: ScriptStep[];
  summarizer?: ScriptStep[];
}

let tmpDir: string;
let store: MemoryStore;
let runner: FakeRunner;
let logger: Logger;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "clockwork-stage-"));
  store = new MemoryStore(path.join(tmpDir, "memory"), { now: () => FIXED });
  runner = new FakeRunner();
  logger = quietLogger();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function setup(scripts: Scripts, overrides: Partial<StageDriverOptions> = {}) {
  const lead = new ScriptedRole("lead", scripts.lead);
  const engineer = new ScriptedRole("engineer", scripts.engineer ?? ["Done ENGINEER_DONE"]);
  const critic = new ScriptedRole("critic", scripts.critic ?? ["Fine APPROVE_ENGINEER"]);
  const summarizer = new ScriptedRole("summarizer", scripts.summarizer ?? ["Report"]);
  const driver = new StageDriver({
    society,
    store,
    blocks,
    roles: new FixedRoles([lead, engineer, critic, summarizer]),
    codeRunner: runner,
    logger,
    workRoot: tmpDir,
    retryDelayMs: 0,
    ...overrides,
  });
  return { driver, lead, engineer, critic, summarizer };
}

function run(driver: StageDriver, stage = 1, mode: "fresh" | "restart" | "resume" = "fresh") {
  return driver.runStage(stage, mode, new AbortController().signal);
}

describe("StageDriver", () => {
  it("plans, implements and completes a stage the review accepts", async () => {
    const tracker = new ProgressTracker();
    const { driver, lead, engineer } = setup(
      {
        lead: ["Plan: split by dataset. TERMINATE", "Looks good. STAGE_ACCEPTED TERMINATE"],
        engineer: ["```python\nprint(1)\n```", "Split done ENGINEER_DONE"],
        critic: ["Verified. APPROVE_ENGINEER"],
        summarizer: ["Split report"],
      },
      { tracker },
    );

    const outcome = await run(driver);

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 1, workflowDone: false });
    expect(runner.scripts).toEqual(["print(1)\n"]);
    expect(runner.workdirs).toEqual([stageWorkDir(tmpDir, 1)]);
    expect(engineer.received[0][0].content).toBe(
      `${PREAMBLE}### Stage 1, subtask 1, iteration 1\n\n**Task:**\nPlan stage 1\n\n**Result:**\nPlan: split by dataset.` +
        "\n\n## Current task\n\nBuild in stage_1_outputs",
    );
    expect(lead.received[1][0].content).toBe(
      `${PREAMBLE}### Stage 1, subtask 1, iteration 1\n\n**Task:**\nPlan stage 1\n\n**Result:**\nPlan: split by dataset.` +
        "\n\n### Stage 1, subtask 2, iteration 1\n\n**Task:**\nBuild in stage_1_outputs\n\n**Result:**\nSplit report" +
        "\n\n## Current task\n\nReview iteration 1",
    );
    expect((await store.getSummary(1, 2, 1))?.summary).toBe("Split report");
    expect(await store.getWorkflowState()).toEqual({
      current_position: { stage: 2, subtask: null, iteration: null },
      stages_completed: [1],
      iterations: { stage1: { subtask1: 1, subtask2: 1, subtask3: 1 } },
    });
    expect((await store.listCheckpoints()).map((c) => c.label)).toEqual([
      "Stage 1, subtask 1, iteration 1 saved",
      "Stage 1, subtask 2, iteration 1 saved",
      "Stage 1, subtask 3, iteration 1 saved",
      "Stage 1 completed, ready for stage 2",
    ]);
    expect(fs.existsSync(path.join(stageWorkDir(tmpDir, 1), "stage_1_outputs"))).toBe(true);
    expect(tracker.completedSubtaskCount).toBe(3);
    expect(tracker.sessionCount).toBe(5);
  });

  it("runs another iteration with the review in context when the review asks for changes", async () => {
    const { driver, engineer } = setup({
      lead: ["Plan TERMINATE", "Use dataset-level splits. TERMINATE", "Accepted STAGE_ACCEPTED TERMINATE"],
      summarizer: ["Report A", "Report B"],
    });

    const outcome = await run(driver);

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 2, workflowDone: false });
    expect(engineer.received[1][0].content).toBe(
      `${PREAMBLE}### Stage 1, subtask 1, iteration 1\n\n**Task:**\nPlan stage 1\n\n**Result:**\nPlan` +
        "\n\n### Stage 1, subtask 2, iteration 1\n\n**Task:**\nBuild in stage_1_outputs\n\n**Result:**\nReport A" +
        "\n\n### Stage 1, subtask 3, iteration 1\n\n**Task:**\nReview iteration 1\n\n**Result:**\nUse dataset-level splits." +
        "\n\n## Current task\n\nRevise iteration 2",
    );
    expect((await store.getSummary(1, 2, 2))?.summary).toBe("Report B");
    expect((await store.getSummary(1, 2, 2))?.task_description).toBe("Revise iteration 2");
  });

  it("stops at maxIterations without marking the stage completed", async () => {
    const { driver } = setup({ lead: ["Plan TERMINATE", "Not yet TERMINATE"] });
    const warn = vi.spyOn(logger, "warn");

    const outcome = await run(driver);

    expect(outcome).toEqual({ stage: 1, status: "exhausted", iterations: 2, workflowDone: false });
    expect(await store.isStageCompleted(1)).toBe(false);
    expect(await store.getMaxIteration(1, 3)).toBe(2);
    expect(warn).toHaveBeenCalledWith(msg.stageIterationsExhausted(1, 2));
  });

  it("reports workflowDone when the review says the whole task is done", async () => {
    const { driver } = setup({ lead: ["Plan TERMINATE", "All targets met ENTIRE_TASK_DONE"] });

    const outcome = await run(driver);

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 1, workflowDone: true });
  });

  it("retries a subtask whose role failed", async () => {
    const { driver, engineer } = setup({
      lead: ["Plan TERMINATE", "OK STAGE_ACCEPTED TERMINATE"],
      engineer: [new Error("backend down"), "Done ENGINEER_DONE"],
    });
    const warn = vi.spyOn(logger, "warn");

    const outcome = await run(driver);

    expect(outcome.status).toBe("completed");
    expect(engineer.invocations).toBe(2);
    expect(warn).toHaveBeenCalledWith(msg.subtaskRetry(2, 3));
  });

  it("throws StageFailedError once the retries run out and keeps earlier records", async () => {
    const { driver, engineer } = setup(
      { lead: ["Plan TERMINATE"], engineer: [new Error("backend down")] },
      { maxRetries: 2 },
    );

    await expect(run(driver)).rejects.toMatchObject({ name: "StageFailedError", stage: 1, subtask: 2, iteration: 1 });
    expect(engineer.invocations).toBe(2);
    expect(await store.getSummary(1, 2, 1)).toBeUndefined();
    expect((await store.getSummary(1, 1, 1))?.summary).toBe("Plan TERMINATE");
    expect((await store.getWorkflowState()).current_position).toEqual({ stage: 1, subtask: 2, iteration: 1 });
  });

  it("does not retry a cancelled subtask", async () => {
    const controller = new AbortController();
    let calls = 0;
    const engineer: ConversationalRole = {
      name: "engineer",
      tools: [],
      async invoke(_history, ctx) {
        calls++;
        controller.abort();
        ctx.signal.throwIfAborted();
        return { content: "" };
      },
    };
    const lead = new ScriptedRole("lead", ["Plan TERMINATE"]);
    const driver = new StageDriver({
      society,
      store,
      blocks,
      roles: new FixedRoles([lead, engineer, new ScriptedRole("critic", ["x"]), new ScriptedRole("summarizer", ["x"])]),
      codeRunner: runner,
      logger,
      workRoot: tmpDir,
      retryDelayMs: 0,
    });

    const error = await driver.runStage(1, "fresh", controller.signal).catch((err: unknown) => err);

    expect(controller.signal.aborted).toBe(true);
    expect(error).toBe(controller.signal.reason);
    expect(error).toMatchObject({ name: "AbortError" });
    expect(calls).toBe(1);
  });

  it("resumes with the review when the implementation was the last saved subtask", async () => {
    await store.save(1, 1, 1, [textMessage("lead", "Plan")], "Plan", "Plan stage 1");
    await store.save(1, 2, 1, [textMessage("engineer", "Done")], "Report A", "Build in stage_1_outputs");
    const { driver, lead, engineer } = setup({ lead: ["Accepted STAGE_ACCEPTED TERMINATE"] });

    const outcome = await run(driver, 1, "resume");

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 1, workflowDone: false });
    expect(engineer.invocations).toBe(0);
    expect(lead.invocations).toBe(1);
  });

  it("resumes with the review of a revised implementation saved after an earlier review", async () => {
    await store.save(1, 1, 1, [], "Plan", "Plan stage 1");
    await store.save(1, 2, 1, [], "Report A", "Build in stage_1_outputs");
    await store.save(1, 3, 1, [], "Change things", "Review iteration 1");
    await store.save(1, 2, 2, [], "Report B", "Revise iteration 2");
    const { driver, lead, engineer } = setup({ lead: ["Accepted STAGE_ACCEPTED TERMINATE"] });

    const outcome = await run(driver, 1, "resume");

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 2, workflowDone: false });
    expect(engineer.invocations).toBe(0);
    expect(lead.invocations).toBe(1);
    expect((await store.getSummary(1, 3, 2))?.summary).toBe("Accepted STAGE_ACCEPTED TERMINATE");
  });

  it("completes without running anything when the last saved review accepted the stage", async () => {
    await store.save(1, 1, 1, [], "Plan", "Plan stage 1");
    await store.save(1, 2, 1, [], "Report A", "Build in stage_1_outputs");
    await store.save(1, 3, 1, [], "Accepted STAGE_ACCEPTED", "Review iteration 1");
    const { driver, lead } = setup({ lead: ["unused"] });

    const outcome = await run(driver, 1, "resume");

    expect(outcome).toEqual({ stage: 1, status: "completed", iterations: 1, workflowDone: false });
    expect(lead.invocations).toBe(0);
    expect(await store.isStageCompleted(1)).toBe(true);
  });

  it("starts from the beginning when there is nothing to resume", async () => {
    const { driver, lead } = setup({ lead: ["Plan TERMINATE", "OK STAGE_ACCEPTED TERMINATE"] });
    const warn = vi.spyOn(logger, "warn");

    await run(driver, 1, "resume");

    expect(warn).toHaveBeenCalledWith(msg.stageNothingToResume(1));
    expect(lead.invocations).toBe(2);
  });

  it("clears the stage memory and work directory on restart", async () => {
    await store.save(1, 1, 1, [], "Old plan", "Plan stage 1");
    await store.markStageCompleted(1);
    const workDir = stageWorkDir(tmpDir, 1);
    fs.mkdirSync(workDir, { recursive: true });
    fs.writeFileSync(path.join(workDir, "old.txt"), "stale");
    const { driver } = setup({ lead: ["New plan TERMINATE", "OK STAGE_ACCEPTED TERMINATE"] });

    const outcome = await run(driver, 1, "restart");

    expect(outcome.status).toBe("completed");
    expect(fs.existsSync(path.join(workDir, "old.txt"))).toBe(false);
    expect((await store.getSummary(1, 1, 1))?.summary).toBe("New plan TERMINATE");
  });

  it("skips a completed stage in fresh mode", async () => {
    await store.markStageCompleted(1);
    const { driver, lead } = setup({ lead: ["unused"] });

    const outcome = await run(driver);

    expect(outcome).toEqual({ stage: 1, status: "skipped", iterations: 0, workflowDone: false });
    expect(lead.invocations).toBe(0);
  });

  it("completes a stage without review after one implementation and warns about the missing previous stage", async () => {
    const { driver } = setup({ lead: ["Plan TERMINATE"] });
    const warn = vi.spyOn(logger, "warn");

    const outcome = await run(driver, 2);

    const rule = "=".repeat(80);
    expect(outcome).toEqual({ stage: 2, status: "completed", iterations: 1, workflowDone: false });
    expect(warn).toHaveBeenCalledWith(msg.stagePrerequisiteMissing(1));
    expect((await store.getSummary(2, 2, 1))?.summary).toBe(
      `# IMPLEMENTATION REPORT\n\n## Message 1 from engineer\n\nDone\n\n${rule}\n\n## Message 2 from critic\n\nFine\n\n${rule}`,
    );
  });

  it("rejects a stage the society does not define", async () => {
    const { driver } = setup({ lead: ["unused"] });

    await expect(run(driver, 7)).rejects.toThrow("Stage 7 is not defined. Defined stages: 1, 2");
  });
});
