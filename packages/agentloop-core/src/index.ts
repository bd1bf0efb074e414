export {
  Agent,
  formatFinalOutputTypeError,
  type AgentAsToolOptions,
  type AgentConfiguration,
  type AgentInstructions,
  type AgentOptions,
  type ToolsToFinalOutputResult,
  type ToolToFinalOutputFunction,
  type ToolUseBehavior,
  type ToolUseBehaviorFlags,
} from './agent';
export { loadEnv, logging, runDefaults } from './config';
export {
  AgentLoopError,
  ConversationLockedError,
  GuardrailExecutionError,
  InputGuardrailTripwireTriggered,
  isConversationLockedError,
  MaxTurnsExceededError,
  ModelBehaviorError,
  OutputGuardrailTripwireTriggered,
  SystemError,
  ToolCallError,
  ToolInputGuardrailTripwireTriggered,
  ToolOutputGuardrailTripwireTriggered,
  UserError,
  type ErrorContext,
  type RecoveryAction,
  type RunPhase,
} from './errors';
export {
  defineInputGuardrail,
  defineOutputGuardrail,
  type GuardrailFunctionOutput,
  type InputGuardrail,
  type InputGuardrailDefinition,
  type InputGuardrailFunction,
  type InputGuardrailFunctionArgs,
  type InputGuardrailResult,
  type OutputGuardrail,
  type OutputGuardrailDefinition,
  type OutputGuardrailFunction,
  type OutputGuardrailFunctionArgs,
  type OutputGuardrailResult,
} from './guardrail';
export {
  getHandoff,
  getTransferMessage,
  Handoff,
  handoff,
  type HandoffConfig,
  type HandoffInputData,
  type HandoffInputFilter,
} from './handoff';
export {
  extractAllTextOutput,
  RunHandoffCallItem,
  RunHandoffOutputItem,
  RunItemBase,
  RunMessageOutputItem,
  RunProtocolApprovalResponseItem,
  RunProtocolListToolsItem,
  RunReasoningItem,
  RunToolApprovalItem,
  RunToolCallItem,
  RunToolCallOutputItem,
  ToolOrigin,
  type AgentRef,
  type ApprovalRawItem,
  type RunItem,
} from './items';
export {
  AgentHooks,
  RunHooks,
  type AgentHookEvents,
  type RunHookEvents,
  type ToolEventDetails,
  type ToolRef,
} from './lifecycle';
export { getLogger, logger, type Logger } from './logger';
export { MemorySession, type MemorySessionOptions } from './memory/memorySession';
export type { Session, SessionInputCallback } from './memory/session';
export type {
  Model,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelSettings,
  ModelSettingsToolChoice,
  ResponseStreamEvent,
  SerializedHandoff,
  SerializedOutputType,
  SerializedTool,
} from './model';
export { RunResult } from './result';
export {
  DEFAULT_MAX_TURNS_RESUME_INSTRUCTION,
  run,
  Runner,
  setDefaultRunner,
  type RunConfig,
  type RunOptions,
} from './run';
export {
  RunContext,
  type ApprovalRecord,
  type RunContextJSON,
} from './runContext';
export {
  CURRENT_SCHEMA_VERSION,
  RunState,
  type RunStateDocument,
} from './runState';
export {
  actionTool,
  applyPatchTool,
  computerTool,
  hostedTool,
  localShellTool,
  protocolServerTool,
  shellTool,
  tool,
  type ActionRequest,
  type ActionTool,
  type ActionToolOptions,
  type ApprovalDecision,
  type FunctionTool,
  type FunctionToolResult,
  type HostedTool,
  type ProtocolServerTool,
  type Tool,
  type ToolApprovalFunction,
  type ToolCallDetails,
  type ToolEnabledFunction,
  type ToolErrorFunction,
  type ToolExecuteFunction,
  type ToolOptions,
} from './tool';
export {
  defineToolInputGuardrail,
  defineToolOutputGuardrail,
  ToolGuardrailFunctionOutputFactory,
  type ToolGuardrailBehavior,
  type ToolGuardrailFunctionOutput,
  type ToolInputGuardrailDefinition,
  type ToolInputGuardrailResult,
  type ToolOutputGuardrailDefinition,
  type ToolOutputGuardrailResult,
} from './toolGuardrail';
export * from './types';
export { RequestUsage, Usage } from './usage';
