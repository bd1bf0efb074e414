import { z } from 'zod';
import { Agent } from './agent';
import { UserError } from './errors';
import type {
  InputGuardrailResult,
  OutputGuardrailResult,
} from './guardrail';
import { Handoff } from './handoff';
import {
  RunHandoffCallItem,
  RunHandoffOutputItem,
  RunMessageOutputItem,
  RunProtocolApprovalResponseItem,
  RunProtocolListToolsItem,
  RunReasoningItem,
  RunToolApprovalItem,
  RunToolCallItem,
  RunToolCallOutputItem,
  ToolOrigin,
  type RunItem,
} from './items';
import logger from './logger';
import type { ModelResponse } from './model';
import { RunContext } from './runContext';
import { getTurnInput } from './runner/items';
import type { NextStep } from './runner/steps';
import { AgentToolUseTracker } from './runner/toolUseTracker';
import type {
  ProcessedResponse,
  ToolRunAction,
  ToolRunFunction,
  ToolRunHandoff,
  ToolRunProtocolApprovalRequest,
} from './runner/types';
import {
  buildJsonToolCallTool,
  JSON_TOOL_CALL_NAME,
  type ActionTool,
  type FunctionTool,
  type ProtocolServerTool,
} from './tool';
import type {
  ToolInputGuardrailResult,
  ToolOutputGuardrailResult,
} from './toolGuardrail';
import type { AgentInputItem, UnknownContext } from './types';
import * as protocol from './types/protocol';
import { Usage } from './usage';
import { isRecord } from './utils/typeGuards';
import { normalizeWireValue } from './utils/wire';

/**
 * The schema version of the serialized run state. This is used to ensure that the serialized run
 * state is compatible with the current version of the library.
 *
 * If anything in this schema changes, the version will have to be incremented.
 */
export const CURRENT_SCHEMA_VERSION = '1.0' as const;
const SUPPORTED_SCHEMA_VERSIONS: readonly string[] = [CURRENT_SCHEMA_VERSION];

const serializedAgentSchema = z.object({
  name: z.string(),
});

const serializedRunItemSchema = z.object({
  type: z.string(),
  rawItem: z.unknown(),
  agent: serializedAgentSchema.optional(),
  sourceAgent: serializedAgentSchema.optional(),
  targetAgent: serializedAgentSchema.optional(),
  toolName: z.string().optional(),
  toolOrigin: ToolOrigin.optional(),
  output: z.unknown().optional(),
});

type SerializedRunItem = z.infer<typeof serializedRunItemSchema>;

const serializedModelResponseSchema = z.object({
  usage: protocol.UsageData,
  output: z.array(z.unknown()),
  responseId: z.string().optional(),
});

const approvalRecordSchema = z.object({
  approved: z.union([z.boolean(), z.array(z.string())]),
  rejected: z.union([z.boolean(), z.array(z.string())]),
});

const guardrailFunctionOutputSchema = z.object({
  tripwireTriggered: z.boolean(),
  outputInfo: z.unknown().optional(),
});

const inputGuardrailResultSchema = z.object({
  guardrail: z.object({ type: z.literal('input'), name: z.string() }),
  output: guardrailFunctionOutputSchema,
});

const outputGuardrailResultSchema = z.object({
  guardrail: z.object({ type: z.literal('output'), name: z.string() }),
  agentOutput: z.unknown(),
  output: guardrailFunctionOutputSchema,
});

const toolGuardrailBehaviorSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('allow') }),
  z.object({ type: z.literal('rejectContent'), message: z.string() }),
  z.object({ type: z.literal('throwException') }),
]);

const toolGuardrailOutputSchema = z.object({
  outputInfo: z.unknown().optional(),
  behavior: toolGuardrailBehaviorSchema,
});

const toolInputGuardrailResultSchema = z.object({
  guardrail: z.object({ type: z.literal('tool_input'), name: z.string() }),
  output: toolGuardrailOutputSchema,
});

const toolOutputGuardrailResultSchema = z.object({
  guardrail: z.object({ type: z.literal('tool_output'), name: z.string() }),
  output: toolGuardrailOutputSchema,
});

const serializedNextStepSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('next_step_handoff'),
    newAgent: serializedAgentSchema,
  }),
  z.object({
    type: z.literal('next_step_final_output'),
    output: z.string(),
  }),
  z.object({
    type: z.literal('next_step_run_again'),
  }),
  z.object({
    type: z.literal('next_step_interruption'),
    data: z.object({ interruptions: z.array(z.unknown()) }),
  }),
]);

export const SerializedRunState = z.object({
  $schemaVersion: z.string(),
  currentTurn: z.number(),
  currentAgent: serializedAgentSchema,
  originalInput: z.union([z.string(), z.array(z.unknown())]),
  modelResponses: z.array(serializedModelResponseSchema),
  context: z.object({
    context: z.unknown(),
    usage: protocol.UsageData,
    approvals: z.record(z.string(), approvalRecordSchema),
  }),
  toolUseTracker: z.record(z.string(), z.array(z.string())),
  maxTurns: z.number(),
  noActiveAgentRun: z.boolean(),
  inputGuardrailResults: z.array(inputGuardrailResultSchema),
  outputGuardrailResults: z.array(outputGuardrailResultSchema),
  toolInputGuardrailResults: z.array(toolInputGuardrailResultSchema),
  toolOutputGuardrailResults: z.array(toolOutputGuardrailResultSchema),
  currentStep: serializedNextStepSchema.optional(),
  lastModelResponse: serializedModelResponseSchema.optional(),
  generatedItems: z.array(z.unknown()),
  lastProcessedResponse: z
    .object({
      newItems: z.array(z.unknown()),
      toolsUsed: z.array(z.string()),
    })
    .optional(),
  conversationId: z.string().optional(),
  previousResponseId: z.string().optional(),
});

/**
 * The portable document a run state serializes to.
 */
export type RunStateDocument = z.infer<typeof SerializedRunState>;

/**
 * Serializes a model response. Provider data is left out.
 */
function serializeModelResponse(
  response: ModelResponse,
): z.infer<typeof serializedModelResponseSchema> {
  return {
    usage: response.usage.toJSON(),
    output: response.output.map((item) => normalizeWireValue(item)),
    responseId: response.responseId,
  };
}

/**
 * Serializes a run item with its raw payload in wire shape.
 */
export function serializeItem(item: RunItem): SerializedRunItem {
  return {
    ...item.toJSON(),
    rawItem: normalizeWireValue(item.rawItem),
  };
}

/**
 * Key under which an item is merged with other copies of itself. Items tied to a call use the
 * call id.
 */
function runItemKey(item: RunItem): string {
  const rawItem = item.rawItem;
  if ('callId' in rawItem) {
    return `${item.type}:call:${rawItem.callId}`;
  }
  if (rawItem.type === 'protocol_approval_response') {
    return `${item.type}:call:${rawItem.approvalRequestId}`;
  }
  if (typeof rawItem.id === 'string') {
    return `${item.type}:id:${rawItem.id}`;
  }
  return `${item.type}:raw:${JSON.stringify(normalizeWireValue(rawItem))}`;
}

function resolvedCallIds(items: RunItem[]): Set<string> {
  const resolved = new Set<string>();
  for (const item of items) {
    if (
      item.type === 'tool_call_output_item' ||
      item.type === 'handoff_output_item'
    ) {
      resolved.add(item.rawItem.callId);
    } else if (item.type === 'protocol_approval_response_item') {
      resolved.add(item.rawItem.approvalRequestId);
    }
  }
  return resolved;
}

/**
 * Appends the items of `extra` that are not already part of `items`. Approval requests whose call
 * was already answered in `items` are left out.
 */
export function mergeRunItems(items: RunItem[], extra: RunItem[]): RunItem[] {
  const seen = new Set(items.map(runItemKey));
  const resolved = resolvedCallIds(items);
  const merged = [...items];
  for (const item of extra) {
    const key = runItemKey(item);
    if (seen.has(key)) {
      continue;
    }
    if (item.type === 'tool_approval_item' && resolved.has(item.callId)) {
      continue;
    }
    seen.add(key);
    merged.push(item);
  }
  return merged;
}

/**
 * Serializable snapshot of an agent's run, including context, usage and trace. While this class
 * has publicly writable properties (prefixed with `_`), they are not meant to be used directly.
 * To read these properties, use the `RunResult` instead.
 *
 * Manipulation of the state directly can lead to unexpected behavior and should be avoided.
 * Instead, use the `approve` and `reject` methods to interact with the state.
 */
export class RunState<TContext = UnknownContext> {
  /**
   * Current turn number in the conversation.
   */
  public _currentTurn = 0;
  /**
   * The agent currently handling the conversation.
   */
  public _currentAgent: Agent<TContext>;
  /**
   * Original user input prior to any processing.
   */
  public _originalInput: string | AgentInputItem[];
  /**
   * Responses from the model so far.
   */
  public _modelResponses: ModelResponse[];
  /**
   * Run context tracking approvals, usage, and other metadata.
   */
  public _context: RunContext<TContext>;
  /**
   * Tracks what tools each agent has used.
   */
  public _toolUseTracker: AgentToolUseTracker;
  /**
   * Items generated by the agent during the run.
   */
  public _generatedItems: RunItem[];
  /**
   * Maximum allowed turns before forcing termination.
   */
  public _maxTurns: number;
  /**
   * Whether the run has an active agent step in progress.
   */
  public _noActiveAgentRun = true;
  /**
   * Last model response for the previous turn.
   */
  public _lastTurnResponse: ModelResponse | undefined;
  /**
   * Results from input guardrails applied to the run.
   */
  public _inputGuardrailResults: InputGuardrailResult[];
  /**
   * Results from output guardrails applied to the run.
   */
  public _outputGuardrailResults: OutputGuardrailResult[];
  /**
   * Results from tool input guardrails applied during tool execution.
   */
  public _toolInputGuardrailResults: ToolInputGuardrailResult[];
  /**
   * Results from tool output guardrails applied during tool execution.
   */
  public _toolOutputGuardrailResults: ToolOutputGuardrailResult[];
  /**
   * Next step computed for the agent to take.
   */
  public _currentStep: NextStep<TContext> | undefined = undefined;
  /**
   * Parsed model response after applying guardrails and tools.
   */
  public _lastProcessedResponse: ProcessedResponse<TContext> | undefined =
    undefined;
  /**
   * Server-managed conversation the run appends to, if any.
   */
  public _conversationId: string | undefined;
  /**
   * Response the next request chains from, if any.
   */
  public _previousResponseId: string | undefined;

  constructor(
    context: RunContext<TContext>,
    originalInput: string | AgentInputItem[],
    startingAgent: Agent<TContext>,
    maxTurns: number,
  ) {
    this._context = context;
    this._originalInput = structuredClone(originalInput);
    this._modelResponses = [];
    this._currentAgent = startingAgent;
    this._maxTurns = maxTurns;
    this._inputGuardrailResults = [];
    this._outputGuardrailResults = [];
    this._toolInputGuardrailResults = [];
    this._toolOutputGuardrailResults = [];
    this._generatedItems = [];
    this._toolUseTracker = new AgentToolUseTracker();
  }

  /**
   * The agent the run will continue with.
   */
  get currentAgent(): Agent<TContext> {
    return this._currentAgent;
  }

  /**
   * The history of the agent run. This includes the input items and the new items generated
   * during the run.
   *
   * This can be used as inputs for the next agent run.
   */
  get history(): AgentInputItem[] {
    return getTurnInput(this._originalInput, this._generatedItems);
  }

  /**
   * Returns all interruptions if the current step is an interruption otherwise returns an empty
   * array.
   */
  getInterruptions(): RunToolApprovalItem[] {
    if (this._currentStep?.type !== 'next_step_interruption') {
      return [];
    }
    return this._currentStep.data.interruptions;
  }

  /**
   * Approves a tool call requested by the agent through an interruption and approval item
   * request.
   *
   * To approve the request use this method and then run the agent again with the same state
   * object to continue the execution.
   *
   * By default it will only approve the current tool call. To allow the tool to be used multiple
   * times throughout the run, set `always` to `true`.
   *
   * @param approvalItem - The tool call approval item to approve.
   * @param options - Options for the approval.
   */
  approve(
    approvalItem: RunToolApprovalItem,
    options: { always?: boolean } = {},
  ) {
    this._context.approveTool(approvalItem, {
      alwaysApprove: options.always ?? false,
    });
  }

  /**
   * Rejects a tool call requested by the agent through an interruption and approval item
   * request.
   *
   * To reject the request use this method and then run the agent again with the same state
   * object to continue the execution.
   *
   * By default it will only reject the current tool call. To reject every future call of the
   * tool, set `always` to `true`.
   *
   * @param approvalItem - The tool call approval item to reject.
   * @param options - Options for the rejection.
   */
  reject(approvalItem: RunToolApprovalItem, options: { always?: boolean } = {}) {
    this._context.rejectTool(approvalItem, {
      alwaysReject: options.always ?? false,
    });
  }

  /**
   * Serializes the run state to a JSON object.
   *
   * This method is used to serialize the run state to a JSON object that can be used to resume
   * the run later.
   *
   * @returns The serialized run state.
   */
  toJSON(): RunStateDocument {
    const currentStep = this._currentStep;
    let serializedStep: RunStateDocument['currentStep'];
    if (currentStep?.type === 'next_step_handoff') {
      serializedStep = {
        type: currentStep.type,
        newAgent: currentStep.newAgent.toJSON(),
      };
    } else if (currentStep?.type === 'next_step_interruption') {
      serializedStep = {
        type: currentStep.type,
        data: {
          interruptions: currentStep.data.interruptions.map(serializeItem),
        },
      };
    } else {
      serializedStep = currentStep;
    }

    const output: RunStateDocument = {
      $schemaVersion: CURRENT_SCHEMA_VERSION,
      currentTurn: this._currentTurn,
      currentAgent: this._currentAgent.toJSON(),
      originalInput:
        typeof this._originalInput === 'string'
          ? this._originalInput
          : this._originalInput.map((item) => normalizeWireValue(item)),
      modelResponses: this._modelResponses.map(serializeModelResponse),
      context: this._context.toJSON(),
      toolUseTracker: this._toolUseTracker.toJSON(),
      maxTurns: this._maxTurns,
      noActiveAgentRun: this._noActiveAgentRun,
      inputGuardrailResults: this._inputGuardrailResults,
      outputGuardrailResults: this._outputGuardrailResults,
      toolInputGuardrailResults: this._toolInputGuardrailResults,
      toolOutputGuardrailResults: this._toolOutputGuardrailResults,
      currentStep: serializedStep,
      lastModelResponse: this._lastTurnResponse
        ? serializeModelResponse(this._lastTurnResponse)
        : undefined,
      generatedItems: this._generatedItems.map(serializeItem),
      lastProcessedResponse: this._lastProcessedResponse
        ? {
            newItems: this._lastProcessedResponse.newItems.map(serializeItem),
            toolsUsed: this._lastProcessedResponse.toolsUsed,
          }
        : undefined,
      conversationId: this._conversationId,
      previousResponseId: this._previousResponseId,
    };
    return output;
  }

  /**
   * The portable document form of the run state. Same as `toJSON()`.
   */
  toDocument(): RunStateDocument {
    return this.toJSON();
  }

  /**
   * Serializes the run state to a string.
   *
   * This method is used to serialize the run state to a string that can be used to resume the
   * run later.
   *
   * @returns The serialized run state.
   */
  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  /**
   * Deserializes a run state from a string.
   *
   * This method is used to deserialize a run state from a string that was serialized using the
   * `toString` method.
   */
  static async fromString<TContext>(
    initialAgent: Agent<TContext>,
    str: string,
  ): Promise<RunState<TContext>> {
    let document: unknown;
    try {
      document = JSON.parse(str);
    } catch (error) {
      throw new UserError(
        `Run state is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'snapshot',
      );
    }
    return RunState.fromDocument(initialAgent, document);
  }

  /**
   * Restores a run state from its document form. Agents are looked up by name among the agents
   * reachable from `initialAgent` through handoffs.
   */
  static async fromDocument<TContext>(
    initialAgent: Agent<TContext>,
    document: unknown,
  ): Promise<RunState<TContext>> {
    const stateJson = parseRunStateDocument(document);

    const agentMap = buildAgentMap(initialAgent);
    const currentAgent = agentMap.get(stateJson.currentAgent.name);
    if (!currentAgent) {
      throw new UserError(
        `Agent ${stateJson.currentAgent.name} not found`,
        'snapshot',
      );
    }

    //
    // Rebuild the context
    //
    // The stored context is whatever the caller put in when the run started.
    const context = new RunContext<TContext>(
      stateJson.context.context as TContext,
    );
    context.usage = new Usage(stateJson.context.usage);
    context._rebuildApprovals(stateJson.context.approvals);

    const originalInput =
      typeof stateJson.originalInput === 'string'
        ? stateJson.originalInput
        : deserializeInputItems(stateJson.originalInput);

    const state = new RunState<TContext>(
      context,
      '',
      currentAgent,
      stateJson.maxTurns,
    );
    state._originalInput = originalInput;
    state._currentTurn = stateJson.currentTurn;
    state._noActiveAgentRun = stateJson.noActiveAgentRun;
    state._conversationId = stateJson.conversationId;
    state._previousResponseId = stateJson.previousResponseId;

    for (const [agentName, toolNames] of Object.entries(
      stateJson.toolUseTracker,
    )) {
      const agent = agentMap.get(agentName);
      if (agent) {
        state._toolUseTracker.addToolUse(agent, toolNames);
      } else {
        logger.warn(`Skipping tool use history of unknown agent ${agentName}`);
      }
    }

    state._modelResponses = stateJson.modelResponses.map(
      deserializeModelResponse,
    );
    state._lastTurnResponse = stateJson.lastModelResponse
      ? deserializeModelResponse(stateJson.lastModelResponse)
      : undefined;

    state._inputGuardrailResults = stateJson.inputGuardrailResults;
    state._outputGuardrailResults = stateJson.outputGuardrailResults.map(
      (result) => ({
        guardrail: result.guardrail,
        agentOutput: result.agentOutput,
        output: result.output,
      }),
    );
    state._toolInputGuardrailResults = stateJson.toolInputGuardrailResults;
    state._toolOutputGuardrailResults = stateJson.toolOutputGuardrailResults;

    const generatedItems = deserializeItems(
      stateJson.generatedItems,
      agentMap,
    );

    if (stateJson.lastProcessedResponse) {
      const processedItems = deserializeItems(
        stateJson.lastProcessedResponse.newItems,
        agentMap,
      );
      state._lastProcessedResponse = await deserializeProcessedResponse(
        currentAgent,
        state._context,
        processedItems,
        stateJson.lastProcessedResponse.toolsUsed,
      );
      state._generatedItems = mergeRunItems(generatedItems, processedItems);
    } else {
      state._generatedItems = generatedItems;
    }

    state._currentStep = deserializeNextStep(
      stateJson.currentStep,
      agentMap,
      state._generatedItems,
    );

    return state;
  }
}

function parseRunStateDocument(document: unknown): RunStateDocument {
  if (!isRecord(document) || document.$schemaVersion === undefined) {
    throw new UserError('Run state is missing schema version', 'snapshot');
  }
  const version = document.$schemaVersion;
  if (
    typeof version !== 'string' ||
    !SUPPORTED_SCHEMA_VERSIONS.includes(version)
  ) {
    throw new UserError(
      `Run state schema version ${String(version)} is not supported. Please use version ${CURRENT_SCHEMA_VERSION}`,
      'snapshot',
    );
  }

  const parsed = SerializedRunState.safeParse(document);
  if (!parsed.success) {
    throw new UserError(
      `Invalid run state: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      'snapshot',
    );
  }
  return parsed.data;
}

/**
 * @internal
 * Walks the handoff graph from `initialAgent` and indexes every reachable agent by name. Cycles
 * are visited once.
 */
export function buildAgentMap<TContext>(
  initialAgent: Agent<TContext>,
): Map<string, Agent<TContext>> {
  const map = new Map<string, Agent<TContext>>();
  const queue: Agent<TContext>[] = [initialAgent];

  while (queue.length > 0) {
    const currentAgent = queue.shift();
    if (!currentAgent || map.has(currentAgent.name)) {
      continue;
    }
    map.set(currentAgent.name, currentAgent);

    for (const handoff of currentAgent.handoffs) {
      const target = handoff instanceof Handoff ? handoff.agent : handoff;
      if (!map.has(target.name)) {
        queue.push(target);
      }
    }
  }

  return map;
}

function deserializeInputItems(items: unknown[]): AgentInputItem[] {
  const result: AgentInputItem[] = [];
  for (const item of items) {
    const parsed = protocol.ModelItem.safeParse(normalizeWireValue(item));
    if (parsed.success) {
      result.push(parsed.data);
    } else {
      logger.warn(
        `Skipping invalid input item in run state: ${parsed.error.message}`,
      );
    }
  }
  return result;
}

/**
 * @internal
 * Restores a model response. Output items that fail validation are skipped with a warning.
 */
export function deserializeModelResponse(
  serializedModelResponse: z.infer<typeof serializedModelResponseSchema>,
): ModelResponse {
  const output: ModelResponse['output'] = [];
  for (const item of serializedModelResponse.output) {
    const parsed = protocol.OutputModelItem.safeParse(normalizeWireValue(item));
    if (parsed.success) {
      output.push(parsed.data);
    } else {
      logger.warn(
        `Skipping invalid model output item in run state: ${parsed.error.message}`,
      );
    }
  }
  return {
    usage: new Usage(serializedModelResponse.usage),
    output,
    responseId: serializedModelResponse.responseId,
  };
}

function deserializeItems<TContext>(
  items: unknown[],
  agentMap: Map<string, Agent<TContext>>,
): RunItem[] {
  const result: RunItem[] = [];
  for (const item of items) {
    const restored = deserializeItem(item, agentMap);
    if (restored) {
      result.push(restored);
    }
  }
  return result;
}

function skipItem(type: string, reason: string): undefined {
  logger.warn(`Skipping run item of type ${type} in run state: ${reason}`);
  return undefined;
}

function parseRawItem<T extends z.ZodTypeAny>(
  schema: T,
  item: SerializedRunItem,
): z.infer<T> | undefined {
  const parsed = schema.safeParse(normalizeWireValue(item.rawItem));
  if (!parsed.success) {
    return skipItem(item.type, parsed.error.message);
  }
  return parsed.data;
}

/**
 * @internal
 * Restores one run item. Items that reference an unknown agent or fail validation are skipped
 * with a warning and `undefined` is returned.
 */
export function deserializeItem<TContext>(
  serialized: unknown,
  agentMap: Map<string, Agent<TContext>>,
): RunItem | undefined {
  const envelope = serializedRunItemSchema.safeParse(serialized);
  if (!envelope.success) {
    return skipItem('unknown', envelope.error.message);
  }
  const item = envelope.data;

  if (item.type === 'handoff_output_item') {
    const sourceAgent = item.sourceAgent
      ? agentMap.get(item.sourceAgent.name)
      : undefined;
    const targetAgent = item.targetAgent
      ? agentMap.get(item.targetAgent.name)
      : undefined;
    if (!sourceAgent || !targetAgent) {
      return skipItem(item.type, 'handoff references an unknown agent');
    }
    const rawItem = parseRawItem(protocol.FunctionCallResultItem, item);
    return rawItem
      ? new RunHandoffOutputItem(rawItem, sourceAgent, targetAgent)
      : undefined;
  }

  const agent = item.agent ? agentMap.get(item.agent.name) : undefined;
  if (!agent) {
    return skipItem(
      item.type,
      `agent ${item.agent?.name ?? '(missing)'} not found`,
    );
  }

  switch (item.type) {
    case 'message_output_item': {
      const rawItem = parseRawItem(protocol.AssistantMessageItem, item);
      return rawItem ? new RunMessageOutputItem(rawItem, agent) : undefined;
    }
    case 'tool_call_item': {
      const rawItem = parseRawItem(protocol.ToolCallItem, item);
      return rawItem
        ? new RunToolCallItem(rawItem, agent, item.toolOrigin)
        : undefined;
    }
    case 'tool_call_output_item': {
      const rawItem = parseRawItem(
        z.union([protocol.FunctionCallResultItem, protocol.ActionCallResultItem]),
        item,
      );
      if (!rawItem) {
        return undefined;
      }
      const output =
        item.output ??
        (rawItem.type === 'function_call_result'
          ? rawItem.output.text
          : rawItem.output);
      return new RunToolCallOutputItem(rawItem, agent, output, item.toolOrigin);
    }
    case 'reasoning_item': {
      const rawItem = parseRawItem(protocol.ReasoningItem, item);
      return rawItem ? new RunReasoningItem(rawItem, agent) : undefined;
    }
    case 'handoff_call_item': {
      const rawItem = parseRawItem(protocol.FunctionCallItem, item);
      return rawItem ? new RunHandoffCallItem(rawItem, agent) : undefined;
    }
    case 'tool_approval_item': {
      const rawItem = parseRawItem(
        z.union([
          protocol.FunctionCallItem,
          protocol.ActionCallItem,
          protocol.ProtocolApprovalRequestItem,
        ]),
        item,
      );
      return rawItem
        ? new RunToolApprovalItem(
            rawItem,
            agent,
            item.toolName,
            item.toolOrigin,
          )
        : undefined;
    }
    case 'protocol_list_tools_item': {
      const rawItem = parseRawItem(protocol.ProtocolListToolsItem, item);
      return rawItem ? new RunProtocolListToolsItem(rawItem, agent) : undefined;
    }
    case 'protocol_approval_response_item': {
      const rawItem = parseRawItem(protocol.ProtocolApprovalResponseItem, item);
      return rawItem
        ? new RunProtocolApprovalResponseItem(rawItem, agent)
        : undefined;
    }
    default:
      return skipItem(item.type, 'unsupported item type');
  }
}

function deserializeNextStep<TContext>(
  step: RunStateDocument['currentStep'],
  agentMap: Map<string, Agent<TContext>>,
  generatedItems: RunItem[],
): NextStep<TContext> | undefined {
  if (!step) {
    return undefined;
  }
  switch (step.type) {
    case 'next_step_handoff': {
      const newAgent = agentMap.get(step.newAgent.name);
      if (!newAgent) {
        throw new UserError(
          `Handoff target ${step.newAgent.name} not found`,
          'snapshot',
        );
      }
      return { type: step.type, newAgent };
    }
    case 'next_step_interruption': {
      const restored = deserializeItems(step.data.interruptions, agentMap);
      // Reuse the generated item instances so decisions recorded on either apply to both.
      const approvalsByKey = new Map(
        generatedItems
          .filter(
            (item): item is RunToolApprovalItem =>
              item.type === 'tool_approval_item',
          )
          .map((item) => [`${item.toolName}:${item.callId}`, item]),
      );
      const interruptions = restored
        .filter(
          (item): item is RunToolApprovalItem =>
            item.type === 'tool_approval_item',
        )
        .map(
          (item) =>
            approvalsByKey.get(`${item.toolName}:${item.callId}`) ?? item,
        );
      return { type: step.type, data: { interruptions } };
    }
    default:
      return step;
  }
}

/**
 * @internal
 * Rebuilds the actionable part of the last processed response by resolving its items against the
 * current agent's tools and handoffs.
 */
export async function deserializeProcessedResponse<TContext>(
  currentAgent: Agent<TContext>,
  context: RunContext<TContext>,
  newItems: RunItem[],
  toolsUsed: string[],
): Promise<ProcessedResponse<TContext>> {
  const allTools = await currentAgent.getAllTools(context);
  const functionMap = new Map(
    allTools
      .filter((t): t is FunctionTool<TContext> => t.type === 'function')
      .map((t) => [t.name, t]),
  );
  const actionToolMap = new Map(
    allTools
      .filter((t): t is ActionTool<TContext> => t.type === 'action')
      .map((t) => [t.callType, t]),
  );
  const protocolServerMap = new Map(
    allTools
      .filter(
        (t): t is ProtocolServerTool<TContext> => t.type === 'protocol_server',
      )
      .map((t) => [t.serverLabel, t]),
  );
  const handoffMap = new Map(
    currentAgent.getEnabledHandoffs().map((h) => [h.toolName, h]),
  );

  const handoffs: ToolRunHandoff<TContext>[] = [];
  const functions: ToolRunFunction<TContext>[] = [];
  const actions: ToolRunAction<TContext>[] = [];
  const protocolApprovalRequests: ToolRunProtocolApprovalRequest<TContext>[] =
    [];

  for (const item of newItems) {
    if (item.type === 'handoff_call_item') {
      const handoff = handoffMap.get(item.rawItem.name);
      if (handoff) {
        handoffs.push({ toolCall: item.rawItem, handoff });
      } else {
        logger.warn(`Handoff ${item.rawItem.name} not found on resume`);
      }
    } else if (item.type === 'tool_call_item') {
      const rawItem = item.rawItem;
      if (rawItem.type === 'function_call') {
        const tool =
          functionMap.get(rawItem.name) ??
          (rawItem.name === JSON_TOOL_CALL_NAME &&
          currentAgent.outputType !== 'text'
            ? buildJsonToolCallTool<TContext>()
            : undefined);
        if (tool) {
          functions.push({ toolCall: rawItem, tool });
        } else {
          logger.warn(`Tool ${rawItem.name} not found on resume`);
        }
      } else if (rawItem.type !== 'hosted_tool_call') {
        const tool = actionToolMap.get(rawItem.type);
        if (tool) {
          actions.push({ toolCall: rawItem, tool });
        } else {
          logger.warn(`No tool handles ${rawItem.type} on resume`);
        }
      }
    } else if (
      item.type === 'tool_approval_item' &&
      item.rawItem.type === 'protocol_approval_request'
    ) {
      const serverTool = protocolServerMap.get(item.rawItem.serverLabel);
      if (serverTool) {
        protocolApprovalRequests.push({ requestItem: item, serverTool });
      } else {
        logger.warn(
          `Protocol server ${item.rawItem.serverLabel} not found on resume`,
        );
      }
    }
  }

  return {
    newItems,
    handoffs,
    functions,
    actions,
    protocolApprovalRequests,
    toolsUsed,
    hasToolsOrApprovalsToRun(): boolean {
      return (
        handoffs.length > 0 ||
        functions.length > 0 ||
        protocolApprovalRequests.length > 0 ||
        actions.length > 0
      );
    },
  };
}
