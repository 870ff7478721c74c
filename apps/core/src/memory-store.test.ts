import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryStore } from "./memory-store.js";
import { textMessage } from "./role.js";

const FIXED = new Date("2026-01-02T03:04:05.678Z");

let tmpDir: string;
let store: MemoryStore;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "clockwork-memory-"));
  store = new MemoryStore(tmpDir, { now: () => FIXED });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readJson(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(tmpDir, name), "utf-8"));
}

async function saveSummary(stage: number, subtask: number, iteration: number, summary: string): Promise<void> {
  await store.save(stage, subtask, iteration, [textMessage("lead", summary)], summary, `task ${stage}.${subtask}`);
}

describe("MemoryStore records", () => {
  it("reports 0 as the max iteration of an unknown subtask", async () => {
    expect(await store.getMaxIteration(1, 2)).toBe(0);
  });

  it("derives the max iteration from the stored keys", async () => {
    await saveSummary(1, 2, 1, "first");
    await saveSummary(1, 2, 3, "third");
    await saveSummary(1, 2, 2, "second");

    expect(await store.getMaxIteration(1, 2)).toBe(3);
  });

  it("overwrites a key when it is saved again", async () => {
    await saveSummary(1, 1, 1, "draft");
    await saveSummary(1, 1, 1, "final");

    expect((await store.getSummary(1, 1, 1))?.summary).toBe("final");
    expect(readJson("structured_summaries.json")).toEqual({
      stage1: {
        subtask1: {
          iteration1: { timestamp: FIXED.toISOString(), iteration: 1, task_description: "task 1.1", summary: "final" },
        },
      },
    });
  });

  it("stores the transcript beside the summary", async () => {
    await store.save(1, 2, 1, [textMessage("engineer", "ran it")], "summary", "split the data");

    const transcript = await store.getTranscript(1, 2, 1);
    expect(transcript?.messages).toEqual([{ source: "engineer", content: "ran it", kind: "text" }]);
    expect(transcript?.iteration).toBe(1);
  });

  it("leaves no temporary files behind", async () => {
    await saveSummary(1, 1, 1, "plan");
    await store.updatePosition(1, 1, 1);

    expect(fs.readdirSync(tmpDir).sort()).toEqual([
      "structured_messages.json",
      "structured_summaries.json",
      "workflow_state.json",
    ]);
  });

  it("rejects a corrupt document", async () => {
    fs.writeFileSync(path.join(tmpDir, "structured_summaries.json"), "{not json");

    await expect(store.getMaxIteration(1, 1)).rejects.toThrow("Corrupt JSON");
  });
});

describe("MemoryStore.updatePosition", () => {
  it("sets the current position and the last-written iteration pointer", async () => {
    await store.updatePosition(1, 2, 3);
    await store.updatePosition(1, 2, 1);

    const state = await store.getWorkflowState();
    expect(state.current_position).toEqual({ stage: 1, subtask: 2, iteration: 1 });
    expect(state.iterations).toEqual({ stage1: { subtask2: 1 } });
  });

  it("leaves the iteration pointers alone when no iteration is given", async () => {
    await store.updatePosition(2);

    const state = await store.getWorkflowState();
    expect(state.current_position).toEqual({ stage: 2, subtask: null, iteration: null });
    expect(state.iterations).toEqual({});
  });
});

describe("MemoryStore.assembleContext", () => {
  it("uses the latest iteration of earlier subtasks even when the pointer is stale", async () => {
    await saveSummary(1, 1, 1, "plan the split");
    await saveSummary(1, 2, 1, "Saved dataset_split_sizes.png");
    await store.updatePosition(1, 2, 1);
    await saveSummary(1, 2, 2, "Saved train_split_distribution_rev.png");
    await store.updatePosition(1, 2, 2);
    await store.updatePosition(1, 2, 1);

    const entries = await store.assembleContext(2, 1, 1);

    expect(entries.map((e) => [e.stage, e.subtask, e.iteration])).toEqual([
      [1, 1, 1],
      [1, 2, 2],
    ]);
    expect(entries[1].summary).toBe("Saved train_split_distribution_rev.png");
    const prompt = await store.formatTaskPrompt(2, 1, "Train the model", 1);
    expect(prompt.includes("dataset_split_sizes.png")).toBe(false);
  });

  it("includes every earlier iteration of the current subtask and the latest review", async () => {
    await saveSummary(2, 1, 1, "plan");
    await saveSummary(2, 2, 1, "impl v1");
    await saveSummary(2, 3, 1, "review 1");
    await saveSummary(2, 2, 2, "impl v2");
    await saveSummary(2, 3, 2, "review 2");

    const entries = await store.assembleContext(2, 2, 3);

    expect(entries.map((e) => e.summary)).toEqual(["plan", "impl v1", "impl v2", "review 2"]);
  });

  it("shows only earlier subtasks on a first iteration", async () => {
    await saveSummary(2, 1, 1, "plan");
    await saveSummary(2, 2, 1, "impl v1");
    await saveSummary(2, 3, 1, "review 1");

    const entries = await store.assembleContext(2, 2, 1);

    expect(entries.map((e) => e.summary)).toEqual(["plan"]);
  });

  it("skips later stages and missing keys", async () => {
    await saveSummary(1, 1, 1, "stage one");
    await saveSummary(3, 1, 1, "stage three");

    const entries = await store.assembleContext(2, 1, 2);

    expect(entries.map((e) => e.summary)).toEqual(["stage one"]);
  });

  it("removes control tokens from the included records", async () => {
    await saveSummary(1, 1, 1, "Plan done. TERMINATE");
    await saveSummary(1, 2, 1, "Review ok TERMINATE_CRITIC");

    const entries = await store.assembleContext(2, 1, 1);

    expect(entries.map((e) => e.summary)).toEqual(["Plan done.", "Review ok"]);
  });
});

describe("MemoryStore.formatTaskPrompt", () => {
  it("returns the bare task when nothing came before", async () => {
    expect(await store.formatTaskPrompt(1, 1, "Explore the data", 1)).toBe("## Current task\n\nExplore the data");
  });

  it("prefixes the previous summaries", async () => {
    await store.save(1, 1, 1, [], "Ages span 0-100.", "Explore the data");

    const prompt = await store.formatTaskPrompt(2, 1, "Split the data", 1);

    expect(prompt).toBe(
      "## Summaries of previous tasks\n\n" +
        "These are not the current task, but they may hold relevant information.\n\n" +
        "### Stage 1, subtask 1, iteration 1\n\n**Task:**\nExplore the data\n\n**Result:**\nAges span 0-100.\n\n" +
        "## Current task\n\nSplit the data",
    );
  });
});

describe("MemoryStore checkpoints", () => {
  it("names checkpoints after their position and time", async () => {
    const cp = await store.checkpoint({ stage: 1, subtask: 2, iteration: 1 }, "implementation done");

    expect(cp.id).toBe("stage1_subtask2_iteration1_20260102T030405678Z");
    expect(cp.timestamp).toBe(FIXED.toISOString());
  });

  it("adds a suffix when the id is taken", async () => {
    const position = { stage: 1, subtask: 1, iteration: 1 };
    await store.checkpoint(position, "a");
    const second = await store.checkpoint(position, "b");
    const third = await store.checkpoint(position, "c");

    expect(second.id).toBe("stage1_subtask1_iteration1_20260102T030405678Z-1");
    expect(third.id).toBe("stage1_subtask1_iteration1_20260102T030405678Z-2");
    expect((await store.listCheckpoints()).map((c) => c.label)).toEqual(["a", "b", "c"]);
  });

  it("restores the snapshot as the workflow state", async () => {
    await store.updatePosition(1, 1, 1);
    const cp = await store.checkpoint({ stage: 1, subtask: 1, iteration: 1 }, "planned");
    await store.updatePosition(1, 2, 4);

    const restored = await store.restoreCheckpoint(cp.id);

    expect(restored.current_position).toEqual({ stage: 1, subtask: 1, iteration: 1 });
    expect((await store.getWorkflowState()).iterations).toEqual({ stage1: { subtask1: 1 } });
  });

  it("rejects unknown checkpoint ids", async () => {
    await expect(store.restoreCheckpoint("nope")).rejects.toThrow('Unknown checkpoint "nope"');
  });
});

describe("MemoryStore stage lifecycle", () => {
  it("marks stages completed in the state and the checkpoint log", async () => {
    await store.markStageCompleted(2);
    await store.markStageCompleted(1);
    await store.markStageCompleted(2);

    expect(await store.isStageCompleted(1)).toBe(true);
    expect(await store.isStageCompleted(3)).toBe(false);
    expect((await store.getWorkflowState()).stages_completed).toEqual([1, 2]);
    expect(readJson("workflow_checkpoints.json")).toEqual({ stages_completed: [1, 2], checkpoints: {} });
  });

  it("clears a stage and every later one but keeps checkpoints", async () => {
    await saveSummary(1, 1, 1, "one");
    await saveSummary(2, 1, 1, "two");
    await saveSummary(3, 1, 1, "three");
    await store.updatePosition(1, 1, 1);
    await store.updatePosition(2, 1, 1);
    await store.markStageCompleted(1);
    await store.markStageCompleted(2);
    await store.checkpoint({ stage: 2, subtask: 1, iteration: 1 }, "stage 2 planned");

    await store.clearStage(2);

    expect(await store.getMaxIteration(1, 1)).toBe(1);
    expect(await store.getMaxIteration(2, 1)).toBe(0);
    expect(await store.getMaxIteration(3, 1)).toBe(0);
    expect(await store.getTranscript(2, 1, 1)).toBeUndefined();
    const state = await store.getWorkflowState();
    expect(state.iterations).toEqual({ stage1: { subtask1: 1 } });
    expect(state.stages_completed).toEqual([1]);
    expect(state.current_position).toEqual({ stage: 2, subtask: null, iteration: null });
    expect(await store.listCheckpoints()).toHaveLength(1);
  });

  it("resolves the resume point from the summary keys", async () => {
    expect(await store.resolveResumePoint(1)).toBeNull();

    await saveSummary(1, 1, 1, "plan");
    await saveSummary(1, 2, 1, "impl v1");
    await saveSummary(1, 2, 2, "impl v2");
    await store.updatePosition(1, 2, 1);

    expect(await store.resolveResumePoint(1)).toEqual({ subtask: 2, iteration: 2 });
  });

  it("orders resume points by iteration before subtask", async () => {
    await saveSummary(1, 1, 1, "plan");
    await saveSummary(1, 2, 1, "impl v1");
    await saveSummary(1, 3, 1, "review 1");
    await saveSummary(1, 2, 2, "impl v2");

    expect(await store.resolveResumePoint(1)).toEqual({ subtask: 2, iteration: 2 });

    await saveSummary(1, 3, 2, "review 2");

    expect(await store.resolveResumePoint(1)).toEqual({ subtask: 3, iteration: 2 });
  });
});
