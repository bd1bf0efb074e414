import type {
  AgentInputItem,
  AgentOutputItem,
  JsonObjectSchema,
  JsonSchemaDefinition,
  TextOutput,
} from './types';
import type * as protocol from './types/protocol';
import type { Usage } from './usage';

export type ModelSettingsToolChoice =
  | 'auto'
  | 'required'
  | 'none'
  | (string & {});

/**
 * Settings to use when calling an LLM.
 *
 * This class holds optional model configuration parameters (e.g. temperature,
 * topP, penalties, truncation, etc.).
 *
 * Not all models/providers support all of these parameters, so please check the API documentation
 * for the specific model and provider you are using.
 */
export type ModelSettings = {
  /**
   * The temperature to use when calling the model.
   */
  temperature?: number;

  /**
   * The topP to use when calling the model.
   */
  topP?: number;

  /**
   * The tool choice to use when calling the model. `none` disables tool use for the request.
   */
  toolChoice?: ModelSettingsToolChoice;

  /**
   * Whether to use parallel tool calls when calling the model.
   * Defaults to false if not provided.
   */
  parallelToolCalls?: boolean;

  /**
   * The maximum number of output tokens to generate.
   */
  maxTokens?: number;

  /**
   * Whether to store the generated model response for later retrieval.
   */
  store?: boolean;

  /**
   * Additional provider specific settings to be passed directly to the model request.
   */
  providerData?: Record<string, unknown>;
};

export type SerializedFunctionTool = {
  type: 'function';
  name: string;
  description: string;
  parameters: JsonObjectSchema;
  strict: boolean;
};

export type SerializedActionTool = {
  type: 'action';
  callType: protocol.ActionCallType;
  name: string;
};

export type SerializedProtocolServerTool = {
  type: 'protocol_server';
  serverLabel: string;
  serverUrl?: string;
  allowedTools?: string[];
  requireApproval:
    | 'never'
    | 'always'
    | { never?: string[]; always?: string[] };
};

export type SerializedHostedTool = {
  type: 'hosted_tool';
  name: string;
  providerData?: Record<string, unknown>;
};

export type SerializedTool =
  | SerializedFunctionTool
  | SerializedActionTool
  | SerializedProtocolServerTool
  | SerializedHostedTool;

export type SerializedHandoff = {
  /**
   * The name of the tool that represents the handoff.
   */
  toolName: string;
  /**
   * The tool description for the handoff
   */
  toolDescription: string;
  /**
   * The JSON schema for the handoff input. Can be empty if the handoff does not take an input
   */
  inputJsonSchema: JsonObjectSchema;
  /**
   * Whether the input JSON schema is in strict mode. We strongly recommend setting this to true,
   * as it increases the likelihood of correct JSON input.
   */
  strictJsonSchema: boolean;
};

export type SerializedOutputType = JsonSchemaDefinition | TextOutput;

/**
 * A request to a large language model.
 */
export type ModelRequest = {
  /**
   * The system instructions to use for the model.
   */
  systemInstructions?: string;

  /**
   * The input to the model.
   */
  input: string | AgentInputItem[];

  /**
   * The ID of the previous response to use for the model.
   */
  previousResponseId?: string;

  /**
   * The ID of the server-managed conversation to append to.
   */
  conversationId?: string;

  /**
   * The model settings to use for the model.
   */
  modelSettings: ModelSettings;

  /**
   * The tools to use for the model.
   */
  tools: SerializedTool[];

  /**
   * The type of the output to use for the model.
   */
  outputType: SerializedOutputType;

  /**
   * The handoffs to use for the model.
   */
  handoffs: SerializedHandoff[];

  /**
   * An optional signal to abort the model request.
   */
  signal?: AbortSignal;
};

export type ModelResponse = {
  /**
   * The usage information for response.
   */
  usage: Usage;

  /**
   * A list of outputs (messages, tool calls, etc.) generated by the model.
   */
  output: AgentOutputItem[];

  /**
   * An ID for the response which can be used to refer to the response in subsequent calls to the
   * model. Not supported by all model providers.
   */
  responseId?: string;

  /**
   * Raw response data from the underlying model provider.
   */
  providerData?: Record<string, unknown>;
};

/**
 * Events of a streamed model response. The stream ends with `response_done`, which carries the
 * same response `getResponse` would have returned.
 */
export type ResponseStreamEvent =
  | { type: 'output_text_delta'; delta: string }
  | { type: 'response_done'; response: ModelResponse };

/**
 * The base interface for calling an LLM.
 */
export interface Model {
  /**
   * Get a response from the model.
   *
   * Adapters for providers that keep conversations on the server should raise
   * `ConversationLockedError` (or an error whose `code` is `conversation_locked`) when another
   * request is writing to the same conversation.
   *
   * @param request - The request to get a response for.
   */
  getResponse(request: ModelRequest): Promise<ModelResponse>;

  /**
   * Get a streamed response from the model. Used by runs started with `stream: true`; models
   * without it answer those runs through `getResponse`.
   *
   * @param request - The request to get a response for.
   */
  getStreamedResponse?(
    request: ModelRequest,
  ): AsyncIterable<ResponseStreamEvent>;
}

/**
 * The base interface for a model provider.
 *
 * The model provider is responsible for looking up `Model` instances by name.
 */
export interface ModelProvider {
  /**
   * Get a model by name
   *
   * @param modelName - The name of the model to get.
   */
  getModel(modelName?: string): Promise<Model> | Model;
}
