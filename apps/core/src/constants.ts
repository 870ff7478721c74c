/** Copilot SDK session event names. */
export const SessionEvent = {
  MESSAGE_DELTA: "assistant.message_delta",
  TOOL_EXECUTION_START: "tool.execution_start",
  INTENT: "assistant.intent",
} as const;

/** Control tokens roles use to signal decisions. Defaults for `society.config.yaml`. */
export const ControlToken = {
  IMPLEMENTER_DONE: "ENGINEER_DONE",
  CRITIC_DONE: "TERMINATE_CRITIC",
  CRITIC_APPROVE: "APPROVE_ENGINEER",
  CRITIC_REVISE: "REVISE_ENGINEER",
  PLANNING_DONE: "TERMINATE",
  WORKFLOW_DONE: "ENTIRE_TASK_DONE",
  STAGE_ACCEPTED: "STAGE_ACCEPTED",
} as const;

/** Every default control token; stripped from summaries before they are replayed into prompts. */
export const RESERVED_TOKENS: readonly string[] = Object.values(ControlToken);

/** Named prompt blocks in `defaults/prompt-blocks.yaml`. */
export const Block = {
  OUTPUT_DIRECTORY: "output-directory",
  BEST_PRACTICES: "best-practices",
  NOTEBOOK_REMINDER: "notebook-reminder",
  CRITIC_TOOLS: "critic-tools",
  CRITIC_EVIDENCE: "critic-evidence",
  DIRECTORY_REMINDER: "directory-reminder",
  TROUBLESHOOTING_REMINDER: "troubleshooting-reminder",
  FEEDBACK_ACKNOWLEDGEMENT: "feedback-acknowledgement",
  PERFORMANCE_TARGETS: "performance-targets",
} as const;

/** Blocks appended to the first implementer input, in order. */
export const INSTRUCTION_BLOCKS = [Block.OUTPUT_DIRECTORY, Block.BEST_PRACTICES, Block.NOTEBOOK_REMINDER] as const;

/** Blocks appended after the critic verdict on every revision round, in order. */
export const REVISION_BLOCKS = [
  Block.DIRECTORY_REMINDER,
  Block.TROUBLESHOOTING_REMINDER,
  Block.FEEDBACK_ACKNOWLEDGEMENT,
] as const;

/** Source label for synthetic messages injected by the controllers. */
export const USER_SOURCE = "user";

/** Hard ceiling on retained implementer messages per round. */
export const MAX_RETAINED_MESSAGES = 50;

/** Prefix for built-in role instruction references. */
export const BUILTIN_AGENT_PREFIX = "builtin:" as const;

/** System message injection mode for Copilot sessions. */
export const SYSTEM_MESSAGE_MODE = "append" as const;

/** Built-in tool names. */
export const ToolName = {
  EXECUTE_CODE: "execute_code",
  SEARCH_DIRECTORY: "search_directory",
  READ_NOTEBOOK: "read_notebook",
  WRITE_NOTEBOOK: "write_notebook",
} as const;

/** Session participant that runs the implementer's code blocks. */
export const CODE_EXECUTOR_ROLE = "code_executor";
