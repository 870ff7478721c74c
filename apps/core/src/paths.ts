import * as path from "node:path";
import { fileURLToPath } from "node:url";

/** Bundled defaults shipped with the package: agent instructions, society config, prompt blocks. */
export const DEFAULTS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "defaults");

export const MemoryFile = {
  WORKFLOW_STATE: "workflow_state.json",
  CHECKPOINTS: "workflow_checkpoints.json",
  SUMMARIES: "structured_summaries.json",
  MESSAGES: "structured_messages.json",
} as const;

/** Stage work directory: <workRoot>/task_<stage>_workdir */
export function stageWorkDir(workRoot: string, stage: number): string {
  return path.join(workRoot, `task_${stage}_workdir`);
}

/** Lab notebook for a stage, kept inside its work directory. */
export function notebookPath(workRoot: string, stage: number): string {
  return path.join(stageWorkDir(workRoot, stage), "lab_notebook.md");
}

/** Output directory a stage's implementer is told to write into, relative to its work directory. */
export function stageOutputDir(stage: number): string {
  return `stage_${stage}_outputs`;
}
