import { z } from 'zod';

// ----------------------------
// Shared base types
// ----------------------------

/**
 * Every item in the protocol can carry provider specific data. It is kept on in-memory items so
 * model adapters can round-trip it, but it is never part of a serialized run state.
 */
export const SharedBase = z.object({
  providerData: z.record(z.string(), z.unknown()).optional(),
});

export type SharedBase = z.infer<typeof SharedBase>;

export const ItemBase = SharedBase.extend({
  /**
   * An ID to identify the item. This is optional by default. If a model provider absolutely
   * requires this field, it will be validated on the model level.
   */
  id: z.string().optional(),
});

export type ItemBase = z.infer<typeof ItemBase>;

// ----------------------------
// Content types
// ----------------------------

export const InputText = SharedBase.extend({
  type: z.literal('input_text'),
  text: z.string(),
});

export type InputText = z.infer<typeof InputText>;

export const OutputText = SharedBase.extend({
  type: z.literal('output_text'),
  text: z.string(),
});

export type OutputText = z.infer<typeof OutputText>;

export const Refusal = SharedBase.extend({
  type: z.literal('refusal'),
  refusal: z.string(),
});

export type Refusal = z.infer<typeof Refusal>;

export const AssistantContent = z.discriminatedUnion('type', [
  OutputText,
  Refusal,
]);

export type AssistantContent = z.infer<typeof AssistantContent>;

// ----------------------------
// Messages
// ----------------------------

export const SystemMessageItem = ItemBase.extend({
  type: z.literal('message'),
  role: z.literal('system'),
  content: z.string(),
});

export type SystemMessageItem = z.infer<typeof SystemMessageItem>;

export const UserMessageItem = ItemBase.extend({
  type: z.literal('message'),
  role: z.literal('user'),
  content: z.union([z.string(), z.array(InputText)]),
});

export type UserMessageItem = z.infer<typeof UserMessageItem>;

export const AssistantMessageItem = ItemBase.extend({
  type: z.literal('message'),
  role: z.literal('assistant'),
  status: z.enum(['in_progress', 'completed', 'incomplete']),
  content: z.array(AssistantContent),
});

export type AssistantMessageItem = z.infer<typeof AssistantMessageItem>;

export const MessageItem = z.discriminatedUnion('role', [
  SystemMessageItem,
  UserMessageItem,
  AssistantMessageItem,
]);

export type MessageItem = z.infer<typeof MessageItem>;

// ----------------------------
// Tool calls
// ----------------------------

export const FunctionCallItem = ItemBase.extend({
  type: z.literal('function_call'),
  callId: z.string(),
  name: z.string(),
  status: z.enum(['in_progress', 'completed', 'incomplete']).optional(),
  arguments: z.string(),
});

export type FunctionCallItem = z.infer<typeof FunctionCallItem>;

export const ToolCallTextOutput = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export type ToolCallTextOutput = z.infer<typeof ToolCallTextOutput>;

export const FunctionCallResultItem = ItemBase.extend({
  type: z.literal('function_call_result'),
  name: z.string(),
  callId: z.string(),
  status: z.enum(['in_progress', 'completed', 'incomplete']),
  output: ToolCallTextOutput,
});

export type FunctionCallResultItem = z.infer<typeof FunctionCallResultItem>;

/**
 * A call to a tool that is executed by the model provider or by a remote tool server. The engine
 * only records these.
 */
export const HostedToolCallItem = ItemBase.extend({
  type: z.literal('hosted_tool_call'),
  name: z.string(),
  serverLabel: z.string().optional(),
  arguments: z.string().optional(),
  status: z.string().optional(),
  output: z.string().optional(),
});

export type HostedToolCallItem = z.infer<typeof HostedToolCallItem>;

/**
 * A remote tool server asking for a human decision before it runs one of its tools.
 */
export const ProtocolApprovalRequestItem = ItemBase.extend({
  type: z.literal('protocol_approval_request'),
  id: z.string(),
  serverLabel: z.string(),
  name: z.string(),
  arguments: z.string(),
});

export type ProtocolApprovalRequestItem = z.infer<
  typeof ProtocolApprovalRequestItem
>;

export const ProtocolApprovalResponseItem = ItemBase.extend({
  type: z.literal('protocol_approval_response'),
  approvalRequestId: z.string(),
  approve: z.boolean(),
  reason: z.string().optional(),
});

export type ProtocolApprovalResponseItem = z.infer<
  typeof ProtocolApprovalResponseItem
>;

export const ProtocolListToolsItem = ItemBase.extend({
  type: z.literal('protocol_list_tools'),
  serverLabel: z.string(),
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
    }),
  ),
});

export type ProtocolListToolsItem = z.infer<typeof ProtocolListToolsItem>;

export const ACTION_CALL_TYPES = [
  'shell_call',
  'local_shell_call',
  'apply_patch_call',
  'computer_call',
] as const;

export type ActionCallType = (typeof ACTION_CALL_TYPES)[number];

/**
 * Calls to capabilities that run on the caller's machine (shells, patch appliers, computers).
 * The action payload is opaque to the engine and handed to the matching tool as-is.
 */
export const ActionCallItem = ItemBase.extend({
  type: z.enum(ACTION_CALL_TYPES),
  callId: z.string(),
  status: z.enum(['in_progress', 'completed', 'incomplete']).optional(),
  action: z.record(z.string(), z.unknown()),
});

export type ActionCallItem = z.infer<typeof ActionCallItem>;

export const ActionCallResultItem = ItemBase.extend({
  type: z.literal('action_call_output'),
  callType: z.enum(ACTION_CALL_TYPES),
  callId: z.string(),
  output: z.string(),
});

export type ActionCallResultItem = z.infer<typeof ActionCallResultItem>;

export const ReasoningItem = ItemBase.extend({
  type: z.literal('reasoning'),
  content: z.array(InputText),
});

export type ReasoningItem = z.infer<typeof ReasoningItem>;

/**
 * Anything a provider returns that this version of the protocol does not know about. It is kept
 * verbatim so it can be sent back unchanged.
 */
export const UnknownItem = ItemBase.extend({
  type: z.literal('unknown'),
  payload: z.record(z.string(), z.unknown()).optional(),
});

export type UnknownItem = z.infer<typeof UnknownItem>;

export const ToolCallItem = z.union([
  FunctionCallItem,
  HostedToolCallItem,
  ActionCallItem,
]);

export type ToolCallItem = z.infer<typeof ToolCallItem>;

/**
 * Items that can come back from a model call.
 */
export const OutputModelItem = z.union([
  AssistantMessageItem,
  FunctionCallItem,
  HostedToolCallItem,
  ActionCallItem,
  ProtocolApprovalRequestItem,
  ProtocolListToolsItem,
  ReasoningItem,
  UnknownItem,
]);

export type OutputModelItem = z.infer<typeof OutputModelItem>;

/**
 * Every item that can be part of a conversation.
 */
export const ModelItem = z.union([
  UserMessageItem,
  SystemMessageItem,
  AssistantMessageItem,
  FunctionCallItem,
  FunctionCallResultItem,
  HostedToolCallItem,
  ActionCallItem,
  ActionCallResultItem,
  ProtocolApprovalRequestItem,
  ProtocolApprovalResponseItem,
  ProtocolListToolsItem,
  ReasoningItem,
  UnknownItem,
]);

export type ModelItem = z.infer<typeof ModelItem>;

// ----------------------------
// Usage
// ----------------------------

export const RequestUsageData = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
  inputTokensDetails: z.record(z.string(), z.number()).optional(),
  outputTokensDetails: z.record(z.string(), z.number()).optional(),
});

export type RequestUsageData = z.infer<typeof RequestUsageData>;

export const UsageData = z.object({
  requests: z.number().optional(),
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
  inputTokensDetails: z.array(z.record(z.string(), z.number())).optional(),
  outputTokensDetails: z.array(z.record(z.string(), z.number())).optional(),
  requestUsageEntries: z.array(RequestUsageData).optional(),
});

export type UsageData = z.infer<typeof UsageData>;
