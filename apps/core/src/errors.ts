/** A Conversational Role backend failed while producing its turn. */
export class RoleInvocationError extends Error {
  override readonly name = "RoleInvocationError";

  constructor(
    readonly role: string,
    readonly cause: unknown,
  ) {
    super(`Role "${role}" failed: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}

/** Invalid environment, CLI or YAML configuration. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

/** A stage subtask exhausted its retries. The memory store keeps its last good state. */
export class StageFailedError extends Error {
  override readonly name = "StageFailedError";

  constructor(
    readonly stage: number,
    readonly subtask: number,
    readonly iteration: number,
    readonly cause: unknown,
  ) {
    super(
      `Stage ${stage}, subtask ${subtask}, iteration ${iteration} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
  }
}

/** Whether an error came from an aborted signal rather than from a role or tool. */
export function isAbortError(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && err === signal.reason) return true;
  return err instanceof Error && err.name === "AbortError";
}
