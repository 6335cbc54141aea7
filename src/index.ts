export {
  Agent,
  type AgentOptions,
  type DoOptions,
  type TellOptions,
  type TellWithSchemaOptions,
  type CheckOptions,
  type RedoOptions,
} from "./agent.js";
export { Verdict, verdictSchema, type VerdictOutput } from "./verdict.js";
export {
  TaskLoop,
  reasoningStepSchema,
  type LoopRequest,
  type TaskLoopOptions,
  type TaskMode,
} from "./task-loop.js";
export { Conversation, summarizeActions } from "./conversation.js";
export { ContextBuilder, type ContextBuilderOptions, type MemoryConfig } from "./context-builder.js";
export {
  ToolRegistry,
  defineTool,
  capabilityTool,
  formatIssues,
  type Capability,
  type ToolReturn,
  type ToolSpec,
} from "./tools/registry.js";
export { ToolDispatcher, type DispatcherOptions } from "./tools/dispatcher.js";
export { COMPLETE_WORK, ABORT_WORK, CONTROL_TOOL_NAMES } from "./tools/control.js";
export { TraceRecorder, serializeTrace, parseTrace } from "./trace.js";
export { Replayer, type ReplayPolicy, type ReplayerOptions } from "./replay.js";
export { DEFAULT_SYSTEM_PROMPT, renderGoal } from "./prompt/system-prompt.js";
export { OpenAIEngine } from "./llm/openai-engine.js";
export { MockReasoningEngine, loopingEngine, type ScriptedStep } from "./llm/mock-engine.js";
export {
  AgentError,
  TaskAbortedError,
  ReasoningEngineError,
  ObservationError,
  OutputValidationError,
  ReplayError,
  AgentBusyError,
  TimeoutError,
  type FailureContext,
} from "./errors.js";
export { createLogger, type Logger } from "./logger.js";
export { loadConfig, configSchema, type TaskpilotConfig } from "./config.js";
export type * from "./types.js";
