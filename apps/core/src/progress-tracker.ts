import type { Logger } from "./logger.js";
import { msg } from "./messages.js";

export type SessionPhase = "implementer" | "critic" | "planning" | "consolidator";
export type SubtaskStatus = "pending" | "active" | "done" | "failed";

/** Emitted before every session run. */
export interface SessionTelemetry {
  readonly phase: SessionPhase;
  readonly round: number;
  readonly messageCount: number;
  readonly tokenEstimate: number;
}

/** Telemetry hook the controllers call; implementations must not throw. */
export interface ProgressObserver {
  onSessionStart(telemetry: SessionTelemetry): void;
}

/** Observer that does nothing. */
export const NULL_OBSERVER: ProgressObserver = {
  onSessionStart() {},
};

export interface SubtaskInfo {
  key: string;
  name: string;
  status: SubtaskStatus;
}

const SUBTASK_NAMES: Record<number, string> = {
  1: "Planning discussion",
  2: "Implementation",
  3: "Review",
};

/** Logs session telemetry and keeps the per-run round log for the end-of-stage summary. */
export class ProgressTracker implements ProgressObserver {
  readonly rounds: SessionTelemetry[] = [];
  subtasks: SubtaskInfo[] = [];
  startTime = Date.now();

  constructor(private readonly logger?: Logger) {}

  onSessionStart(telemetry: SessionTelemetry): void {
    this.rounds.push(telemetry);
    this.logger?.info(
      msg.sessionTelemetry(telemetry.phase, telemetry.round, telemetry.tokenEstimate, telemetry.messageCount),
    );
  }

  /** Register a subtask of a stage. Keys are `<stage>.<subtask>.<iteration>`. */
  addSubtask(stage: number, subtask: number, iteration: number): string {
    const key = `${stage}.${subtask}.${iteration}`;
    if (!this.subtasks.some((s) => s.key === key)) {
      const name = `${SUBTASK_NAMES[subtask] ?? `Subtask ${subtask}`} (iteration ${iteration})`;
      this.subtasks.push({ key, name, status: "pending" });
    }
    return key;
  }

  activate(key: string): void {
    this.setStatus(key, "active");
  }

  complete(key: string): void {
    this.setStatus(key, "done");
  }

  fail(key: string): void {
    this.setStatus(key, "failed");
  }

  get completedSubtaskCount(): number {
    return this.subtasks.filter((s) => s.status === "done").length;
  }

  get sessionCount(): number {
    return this.rounds.length;
  }

  /** Sum of the token estimates sent into every session so far. */
  get totalTokens(): number {
    return this.rounds.reduce((sum, r) => sum + r.tokenEstimate, 0);
  }

  /** Seconds since the tracker was created. */
  get elapsedSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  /** Lines for the end-of-stage summary. */
  summaryLines(): string[] {
    const lines = [msg.summaryDivider, msg.summaryRounds(this.sessionCount, this.totalTokens)];
    for (const s of this.subtasks) {
      lines.push(`  ${s.status === "done" ? "✓" : s.status === "failed" ? "✗" : "·"} ${s.name}`);
    }
    lines.push(msg.summaryDivider);
    return lines;
  }

  private setStatus(key: string, status: SubtaskStatus): void {
    const entry = this.subtasks.find((s) => s.key === key);
    if (entry) entry.status = status;
  }
}
