/** Centralized log messages. Edit this file to change any user-facing output. */
export const msg = {
  // --- Lifecycle ---
  starting: "🚀 Starting Clockwork...",
  configLoaded: (model: string, memoryDir: string, verbose: boolean) =>
    `⚙️  Config: model=${model}, memory=${memoryDir}, verbose=${verbose}`,
  societySource: (source: string) => `📋 Society: ${source}`,
  shuttingDown: (signal: string) => `\n🛑 Received ${signal} — stopping...`,

  // --- Stages ---
  stageStart: (stage: number, name: string) => `\n🧪 Stage ${stage}: ${name}`,
  stageAlreadyCompleted: (stage: number) => `⏭️  Stage ${stage} is already completed — use --restart to run it again`,
  stagePrerequisiteMissing: (previous: number) => `⚠️  Stage ${previous} has not been completed — continuing anyway`,
  stageRestart: (stage: number) => `🔄 Restarting stage ${stage} — clearing its memory and work directory`,
  stageResume: (stage: number, subtask: number, iteration: number) =>
    `🔄 Resuming stage ${stage} after subtask ${subtask}, iteration ${iteration}`,
  stageNothingToResume: (stage: number) => `⚠️  Nothing recorded for stage ${stage} — starting from the beginning`,
  stageComplete: (stage: number, iterations: number) => `🏁 Stage ${stage} completed after ${iterations} iteration(s)`,
  stageIterationsExhausted: (stage: number, max: number) =>
    `⚠️  Stage ${stage} reached its limit of ${max} iteration(s) without acceptance`,
  workflowDone: "🎉 Planning team reports the entire workflow is done",

  // --- Subtasks ---
  subtaskPlanning: (stage: number) => `\n[Stage ${stage} · Subtask 1: Planning discussion]`,
  subtaskImplementation: (stage: number, iteration: number) =>
    `\n[Stage ${stage} · Subtask 2: Implementation, iteration ${iteration}]`,
  subtaskReview: (stage: number, iteration: number) => `\n[Stage ${stage} · Subtask 3: Review, iteration ${iteration}]`,
  subtaskRetry: (attempt: number, max: number) => `  🔁 Retry attempt ${attempt}/${max}...`,
  subtaskFailed: (stage: number, subtask: number, iteration: number, max: number) =>
    `❌ Stage ${stage}, subtask ${subtask}, iteration ${iteration} failed after ${max} attempt(s)`,
  subtaskSaved: (stage: number, subtask: number, iteration: number) =>
    `💾 Saved stage ${stage}, subtask ${subtask}, iteration ${iteration}`,
  implementationFinished: (state: string, criticRounds: number) =>
    `  ${state === "approved" ? "✅" : "⚠️ "} Implementation ${state} after ${criticRounds} critic round(s)`,
  reviewVerdict: (accepted: boolean) => (accepted ? "  ✅ Review accepted the stage" : "  🔁 Review asked for changes"),

  // --- Iteration controller ---
  sessionTelemetry: (phase: string, round: number, tokens: number, count: number) =>
    `  📊 ${phase} (round ${round}): ~${tokens} tokens across ${count} messages`,
  reviewRound: (round: number, max: number) => `  └─ Critic round ${round}/${max}: Reviewing...`,
  approved: (agent: string) => `  ✅ Approved by ${agent}`,
  revisionRequested: (preview: string) => `  ❌ Feedback: ${preview}...`,
  ambiguousVerdict: (reason: string) =>
    `  ⚠️  Critic gave ${reason === "both" ? "both an approval and a revision" : "neither an approval nor a revision"} token — treating as a revision`,
  revisionCapReached: (max: number) => `  ⚠️  Revision cap (${max}) reached — returning best-effort result`,
  criticEvidenceMissing: (attempt: number, max: number) =>
    `  🔍 Critic used no tools — asking for evidence (${attempt}/${max})`,
  consolidating: (agent: string) => `  📝 ${agent} is consolidating the report...`,
  sessionMaxTurns: (name: string, max: number) => `  ⚠️  ${name} session hit its limit of ${max} turns`,

  // --- Planning ---
  planningStopped: (name: string) => `  ✅ ${name} discussion concluded`,

  // --- Tools & roles ---
  toolExecution: (name: string) => `    🔧 Tool: ${name}`,
  intentUpdate: (intent: string) => `    💭 Intent: ${intent}`,
  roleWorking: (role: string) => `${role} is working…`,
  codeTimedOut: (seconds: number) => `Execution timed out after ${seconds}s`,

  // --- Checkpoints ---
  checkpointSaved: (label: string) => `💾 Checkpoint: ${label}`,
  checkpointLine: (id: string, label: string, timestamp: string) => `  ${id.padEnd(52)} ${label} — ${timestamp}`,
  noCheckpoints: "No checkpoints recorded.",
  positionLine: (stage: number, subtask: number | null, iteration: number | null) =>
    `Current position: stage ${stage}, subtask ${subtask ?? "—"}, iteration ${iteration ?? "—"}`,
  stagesCompletedLine: (stages: readonly number[]) =>
    `Stages completed: ${stages.length > 0 ? stages.join(", ") : "none"}`,
  checkpointRestored: (id: string) => `⏪ Restored checkpoint ${id}`,

  // --- Summary ---
  summaryDivider: "─".repeat(60),
  summaryRounds: (sessions: number, tokens: number) => `  Sessions run: ${sessions} (~${tokens} tokens sent)`,

  // --- Log File ---
  logFileHint: (path: string) => `📋 Full log: ${path}`,
} as const;
