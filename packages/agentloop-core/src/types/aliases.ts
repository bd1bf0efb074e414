import type {
  ActionCallItem,
  ActionCallResultItem,
  AssistantMessageItem,
  FunctionCallItem,
  FunctionCallResultItem,
  HostedToolCallItem,
  ModelItem,
  OutputModelItem,
  ProtocolApprovalRequestItem,
  ProtocolApprovalResponseItem,
  ProtocolListToolsItem,
  ReasoningItem,
  SystemMessageItem,
  UnknownItem,
  UserMessageItem,
} from './protocol';

/**
 * Context that is passed around when no custom context type is provided.
 */
export type UnknownContext = unknown;

/**
 * Agents without an explicit output schema produce plain text.
 */
export type TextOutput = 'text';

/**
 * Items that can be sent to a model as input.
 */
export type AgentInputItem = ModelItem;

/**
 * Items a model can produce.
 */
export type AgentOutputItem = OutputModelItem;

export type {
  ActionCallItem,
  ActionCallResultItem,
  AssistantMessageItem,
  FunctionCallItem,
  FunctionCallResultItem,
  HostedToolCallItem,
  ProtocolApprovalRequestItem,
  ProtocolApprovalResponseItem,
  ProtocolListToolsItem,
  ReasoningItem,
  SystemMessageItem,
  UnknownItem,
  UserMessageItem,
};

/**
 * A JSON schema describing an object, as sent to models for tool parameters and structured output.
 */
export type JsonObjectSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
  [key: string]: unknown;
};

/**
 * A named JSON schema for structured agent output.
 */
export type JsonSchemaDefinition = {
  type: 'json_schema';
  name: string;
  strict: boolean;
  schema: JsonObjectSchema;
};
