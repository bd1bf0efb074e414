import type { z } from 'zod';
import { ModelBehaviorError } from './errors';
import type {
  AgentRef,
  RunToolApprovalItem,
  RunToolCallOutputItem,
  ToolOrigin,
} from './items';
import { actionToolName, FUNCTION_TOOL_ORIGIN } from './items';
import logger from './logger';
import type { RunContext } from './runContext';
import {
  resolveToolInputGuardrails,
  resolveToolOutputGuardrails,
  type ToolInputGuardrailDefinition,
  type ToolInputGuardrailFunction,
  type ToolOutputGuardrailDefinition,
  type ToolOutputGuardrailFunction,
} from './toolGuardrail';
import type { JsonObjectSchema, UnknownContext } from './types';
import type * as protocol from './types/protocol';
import { toSmartString } from './utils/smartString';
import {
  getSchemaAndParserFromInputType,
  toFunctionToolName,
} from './utils/tools';
import { isZodObject } from './utils/typeGuards';

/**
 * Events a streaming tool yields. Deltas are forwarded to listeners while the tool runs; the
 * `final` event carries the value recorded as the tool output.
 */
export type ToolStreamEvent =
  | { type: 'delta'; delta: string }
  | { type: 'final'; output: unknown };

export type ToolStream = AsyncIterable<ToolStreamEvent>;

export function isToolStream(value: unknown): value is ToolStream {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === 'function'
  );
}

/**
 * Results of a nested agent run, written by tools that run another agent so the outer run can
 * pick them up for this exact call.
 */
export type NestedRunRecord = {
  agentName?: string;
  finalOutput?: unknown;
  interruptions: RunToolApprovalItem[];
};

/**
 * Per-call information handed to a function tool.
 */
export type ToolCallDetails = {
  toolCall: protocol.FunctionCallItem;
  /**
   * Filled in by tools that run another agent.
   */
  nestedRun?: NestedRunRecord;
};

/**
 * A function that determines if a tool call should be approved.
 *
 * @param runContext The current run context
 * @param input The parsed input to the tool
 * @param callId The ID of the tool call
 * @returns True if the tool call should be approved, false otherwise
 */
export type ToolApprovalFunction<TArgs, TContext = UnknownContext> = (
  runContext: RunContext<TContext>,
  input: TArgs,
  callId?: string,
) => Promise<boolean> | boolean;

export type ToolEnabledFunction<TContext = UnknownContext> = (
  runContext: RunContext<TContext>,
  agent: AgentRef,
) => Promise<boolean>;

type ToolEnabledOption<TContext = UnknownContext> =
  | boolean
  | ((args: {
      runContext: RunContext<TContext>;
      agent: AgentRef;
    }) => boolean | Promise<boolean>);

/**
 * The function to invoke when an error occurs while running the tool. Its result is recorded as
 * the tool output and the run continues.
 */
export type ToolErrorFunction<TContext = UnknownContext> = (
  context: RunContext<TContext>,
  error: unknown,
) => Promise<string> | string;

/**
 * Exposes a function to the agent as a tool to be called
 */
export type FunctionTool<TContext = UnknownContext> = {
  type: 'function';
  /**
   * The name of the tool.
   */
  name: string;
  /**
   * The description of the tool that helps the model to understand when to use the tool
   */
  description: string;
  /**
   * A JSON schema describing the parameters of the tool.
   */
  parameters: JsonObjectSchema;
  /**
   * Whether the tool is strict. If true, the model must try to strictly follow the schema.
   */
  strict: boolean;
  /**
   * Where the tool comes from.
   */
  origin: ToolOrigin;

  /**
   * Runs the tool with the raw JSON arguments from the model. May resolve to a `ToolStream`.
   */
  invoke: (
    runContext: RunContext<TContext>,
    input: string,
    details?: ToolCallDetails,
  ) => Promise<unknown>;

  /**
   * Whether the call needs human approval before it can run. Receives the raw JSON arguments.
   */
  needsApproval: (
    runContext: RunContext<TContext>,
    input: string,
    callId?: string,
  ) => Promise<boolean>;

  /**
   * Determines whether the tool should be made available to the model for the current run.
   */
  isEnabled: ToolEnabledFunction<TContext>;
  /**
   * Guardrails that run before the tool executes.
   */
  inputGuardrails?: ToolInputGuardrailDefinition<TContext>[];
  /**
   * Guardrails that run after the tool executes.
   */
  outputGuardrails?: ToolOutputGuardrailDefinition<TContext>[];
};

/**
 * What an action tool gets asked to do. The payload is provider defined.
 */
export type ActionRequest = {
  callId: string;
  action: Record<string, unknown>;
};

export type ActionApprovalFunction<TContext = UnknownContext> = (
  runContext: RunContext<TContext>,
  action: Record<string, unknown>,
  callId?: string,
) => Promise<boolean> | boolean;

export type ApprovalDecision = { approve: boolean; reason?: string };

export type OnApprovalFunction<TContext = UnknownContext> = (
  runContext: RunContext<TContext>,
  approvalItem: RunToolApprovalItem,
) => Promise<ApprovalDecision> | ApprovalDecision;

/**
 * A capability that runs on the caller's side in response to a shell, local shell, patch or
 * computer call from the model.
 */
export type ActionTool<TContext = UnknownContext> = {
  type: 'action';
  /**
   * The kind of call this tool handles.
   */
  callType: protocol.ActionCallType;
  /**
   * Public name exposed to the model.
   */
  name: string;
  origin: ToolOrigin;
  run: (
    runContext: RunContext<TContext>,
    request: ActionRequest,
  ) => Promise<string> | string;
  needsApproval: ActionApprovalFunction<TContext>;
  /**
   * Optional handler to approve or reject immediately when approval is required.
   */
  onApproval?: OnApprovalFunction<TContext>;
};

export type ActionToolOptions<TContext = UnknownContext> = {
  name?: string;
  run: ActionTool<TContext>['run'];
  needsApproval?: boolean | ActionApprovalFunction<TContext>;
  onApproval?: OnApprovalFunction<TContext>;
};

export function actionTool<TContext = UnknownContext>(
  callType: protocol.ActionCallType,
  options: ActionToolOptions<TContext>,
): ActionTool<TContext> {
  const approvalOption = options.needsApproval;
  const needsApproval: ActionApprovalFunction<TContext> =
    typeof approvalOption === 'function'
      ? approvalOption
      : async () => approvalOption ?? false;

  return {
    type: 'action',
    callType,
    name: options.name ?? actionToolName(callType),
    origin: FUNCTION_TOOL_ORIGIN,
    run: options.run,
    needsApproval,
    onApproval: options.onApproval,
  };
}

export function shellTool<TContext = UnknownContext>(
  options: ActionToolOptions<TContext>,
): ActionTool<TContext> {
  return actionTool('shell_call', options);
}

export function localShellTool<TContext = UnknownContext>(
  options: ActionToolOptions<TContext>,
): ActionTool<TContext> {
  return actionTool('local_shell_call', options);
}

export function applyPatchTool<TContext = UnknownContext>(
  options: ActionToolOptions<TContext>,
): ActionTool<TContext> {
  return actionTool('apply_patch_call', options);
}

export function computerTool<TContext = UnknownContext>(
  options: ActionToolOptions<TContext>,
): ActionTool<TContext> {
  return actionTool('computer_call', options);
}

export type ProtocolApprovalFunction<TContext = UnknownContext> =
  OnApprovalFunction<TContext>;

/**
 * A remote tool server the model talks to directly. The engine records its calls and answers its
 * approval requests.
 */
export type ProtocolServerTool<TContext = UnknownContext> = {
  type: 'protocol_server';
  name: string;
  serverLabel: string;
  serverUrl?: string;
  allowedTools?: string[];
  requireApproval:
    | 'never'
    | 'always'
    | { never?: string[]; always?: string[] };
  /**
   * Decides approval requests as soon as the server sends them.
   */
  onApproval?: ProtocolApprovalFunction<TContext>;
  /**
   * Pause the run with an interruption when no `onApproval` is given, instead of approving
   * automatically.
   */
  interruptOnApproval: boolean;
};

/**
 * Creates a remote tool server definition.
 */
export function protocolServerTool<TContext = UnknownContext>(options: {
  serverLabel: string;
  serverUrl?: string;
  allowedTools?: string[];
  requireApproval?: ProtocolServerTool<TContext>['requireApproval'];
  onApproval?: ProtocolApprovalFunction<TContext>;
  interruptOnApproval?: boolean;
}): ProtocolServerTool<TContext> {
  return {
    type: 'protocol_server',
    name: 'protocol_server',
    serverLabel: options.serverLabel,
    serverUrl: options.serverUrl,
    allowedTools: options.allowedTools,
    requireApproval: options.requireApproval ?? 'never',
    onApproval: options.onApproval,
    interruptOnApproval: options.interruptOnApproval ?? false,
  };
}

/**
 * A built-in hosted tool that will be executed directly by the model provider during the request
 * and won't result in local code executions.
 */
export type HostedTool = {
  type: 'hosted_tool';
  /**
   * A unique name for the tool.
   */
  name: string;
  /**
   * Additional configuration data that gets passed to the tool
   */
  providerData?: Record<string, unknown>;
};

export function hostedTool(options: {
  name: string;
  providerData?: Record<string, unknown>;
}): HostedTool {
  return { type: 'hosted_tool', ...options };
}

/**
 * A tool that can be called by the model.
 * @template TContext The context passed to the tool
 */
export type Tool<TContext = UnknownContext> =
  | FunctionTool<TContext>
  | ActionTool<TContext>
  | ProtocolServerTool<TContext>
  | HostedTool;

/**
 * The function to invoke when the tool is called.
 *
 * @param input The parsed arguments to the tool
 * @param context An instance of the current RunContext
 */
export type ToolExecuteFunction<TArgs, TContext = UnknownContext> = (
  input: TArgs,
  context: RunContext<TContext>,
  details?: ToolCallDetails,
) => Promise<unknown> | unknown;

type CommonToolOptions<TContext = UnknownContext> = {
  /**
   * The name of the tool. Must be unique within the agent.
   */
  name?: string;
  /**
   * The description of the tool. This is used to help the model understand when to use the tool.
   */
  description: string;
  /**
   * Turns an error raised by the tool into the output the model sees. Without it, a failing tool
   * stops the run. Errors raised while a returned `ToolStream` is read are handled the same way.
   */
  errorFunction?: ToolErrorFunction<TContext>;
  /**
   * Determines whether the tool should be exposed to the model for the current run.
   */
  isEnabled?: ToolEnabledOption<TContext>;
  /**
   * Overrides where the tool is reported to come from.
   */
  origin?: ToolOrigin;
  /**
   * Guardrails that validate or block tool invocation before it runs.
   */
  inputGuardrails?: (
    | ToolInputGuardrailDefinition<TContext>
    | { name: string; run: ToolInputGuardrailFunction<TContext> }
  )[];
  /**
   * Guardrails that validate or alter tool output after it runs.
   */
  outputGuardrails?: (
    | ToolOutputGuardrailDefinition<TContext>
    | { name: string; run: ToolOutputGuardrailFunction<TContext> }
  )[];
};

/**
 * Options for a tool whose arguments are parsed and validated by a Zod schema.
 */
export type ZodToolOptions<
  TSchema extends z.AnyZodObject,
  TContext = UnknownContext,
> = CommonToolOptions<TContext> & {
  parameters: TSchema;
  strict?: true;
  execute: ToolExecuteFunction<z.infer<TSchema>, TContext>;
  needsApproval?: boolean | ToolApprovalFunction<z.infer<TSchema>, TContext>;
};

/**
 * Options for a tool described by a plain JSON schema. Arguments are `JSON.parse`d only.
 */
export type JsonSchemaToolOptions<TContext = UnknownContext> =
  CommonToolOptions<TContext> & {
    parameters: JsonObjectSchema;
    strict?: boolean;
    execute: ToolExecuteFunction<unknown, TContext>;
    needsApproval?: boolean | ToolApprovalFunction<unknown, TContext>;
  };

export type ToolOptions<TContext = UnknownContext> =
  | ZodToolOptions<z.AnyZodObject, TContext>
  | JsonSchemaToolOptions<TContext>;

type BuildOptions<TArgs, TContext> = CommonToolOptions<TContext> & {
  execute: ToolExecuteFunction<TArgs, TContext>;
  needsApproval?: boolean | ToolApprovalFunction<TArgs, TContext>;
};

// Ends a failing stream with the error function's output as its final event.
async function* recoverToolStream<TContext>(
  stream: ToolStream,
  runContext: RunContext<TContext>,
  errorFunction: ToolErrorFunction<TContext>,
): AsyncGenerator<ToolStreamEvent> {
  try {
    yield* stream;
  } catch (error) {
    yield { type: 'final', output: await errorFunction(runContext, error) };
  }
}

function buildFunctionTool<TArgs, TContext>(
  options: BuildOptions<TArgs, TContext>,
  parameters: JsonObjectSchema,
  parser: (input: string) => TArgs,
  strict: boolean,
): FunctionTool<TContext> {
  const name = toFunctionToolName(options.name ?? options.execute.name);
  const toolErrorFunction = options.errorFunction;

  function parse(input: string): TArgs {
    try {
      return parser(input);
    } catch (error) {
      if (logger.dontLogToolData) {
        logger.debug(`Invalid JSON input for tool ${name}`);
      } else {
        logger.debug(`Invalid JSON input for tool ${name}: ${input}`);
      }
      const reason = error instanceof Error ? `: ${error.message}` : '';
      throw new ModelBehaviorError(
        `Invalid JSON input for tool ${name}${reason}`,
      );
    }
  }

  async function _invoke(
    runContext: RunContext<TContext>,
    input: string,
    details?: ToolCallDetails,
  ): Promise<unknown> {
    const parsed = parse(input);

    if (logger.dontLogToolData) {
      logger.debug(`Invoking tool ${name}`);
    } else {
      logger.debug(`Invoking tool ${name} with input ${input}`);
    }

    const result = await options.execute(parsed, runContext, details);

    if (logger.dontLogToolData) {
      logger.debug(`Tool ${name} completed`);
    } else if (!isToolStream(result)) {
      logger.debug(`Tool ${name} returned: ${toSmartString(result)}`);
    }

    return result;
  }

  async function invoke(
    runContext: RunContext<TContext>,
    input: string,
    details?: ToolCallDetails,
  ): Promise<unknown> {
    try {
      const result = await _invoke(runContext, input, details);
      if (toolErrorFunction && isToolStream(result)) {
        return recoverToolStream(result, runContext, toolErrorFunction);
      }
      return result;
    } catch (error) {
      if (toolErrorFunction) {
        logger.debug(`Tool ${name} failed, recording error output`);
        return toolErrorFunction(runContext, error);
      }
      throw error;
    }
  }

  const approvalOption = options.needsApproval;
  async function needsApproval(
    runContext: RunContext<TContext>,
    input: string,
    callId?: string,
  ): Promise<boolean> {
    if (typeof approvalOption !== 'function') {
      return approvalOption ?? false;
    }
    let parsed: TArgs;
    try {
      parsed = parser(input);
    } catch (_error) {
      // invoke() reports the invalid input
      return false;
    }
    return approvalOption(runContext, parsed, callId);
  }

  const enabledOption = options.isEnabled;
  const isEnabled: ToolEnabledFunction<TContext> =
    typeof enabledOption === 'function'
      ? async (runContext, agent) =>
          Boolean(await enabledOption({ runContext, agent }))
      : async () => enabledOption ?? true;

  return {
    type: 'function',
    name,
    description: options.description,
    parameters,
    strict,
    origin: options.origin ?? FUNCTION_TOOL_ORIGIN,
    invoke,
    needsApproval,
    isEnabled,
    inputGuardrails: resolveToolInputGuardrails(options.inputGuardrails),
    outputGuardrails: resolveToolOutputGuardrails(options.outputGuardrails),
  };
}

function isZodToolOptions<TContext>(
  options: ToolOptions<TContext>,
): options is ZodToolOptions<z.AnyZodObject, TContext> {
  return isZodObject(options.parameters);
}

/**
 * Exposes a function to the agent as a tool to be called
 *
 * @param options The options for the tool
 * @returns A new tool
 */
export function tool<
  TSchema extends z.AnyZodObject,
  TContext = UnknownContext,
>(options: ZodToolOptions<TSchema, TContext>): FunctionTool<TContext>;
export function tool<TContext = UnknownContext>(
  options: JsonSchemaToolOptions<TContext>,
): FunctionTool<TContext>;
export function tool<TContext = UnknownContext>(
  options: ToolOptions<TContext>,
): FunctionTool<TContext> {
  if (isZodToolOptions(options)) {
    const schema = options.parameters;
    const { schema: parameters } = getSchemaAndParserFromInputType(schema);
    return buildFunctionTool(
      options,
      parameters,
      (input) => schema.parse(JSON.parse(input)),
      true,
    );
  }
  const { schema: parameters, parser } = getSchemaAndParserFromInputType(
    options.parameters,
  );
  return buildFunctionTool(options, parameters, parser, options.strict ?? true);
}

/**
 * Name of the synthesized tool some providers emit to deliver structured output.
 */
export const JSON_TOOL_CALL_NAME = 'json_tool_call';

/**
 * Builds the ad-hoc tool that answers a `json_tool_call` by returning its parsed arguments.
 */
export function buildJsonToolCallTool<TContext>(): FunctionTool<TContext> {
  return {
    type: 'function',
    name: JSON_TOOL_CALL_NAME,
    description: JSON_TOOL_CALL_NAME,
    parameters: { type: 'object', properties: {} },
    strict: true,
    origin: FUNCTION_TOOL_ORIGIN,
    async invoke(_runContext, input) {
      const parsed: unknown = JSON.parse(input);
      return parsed;
    },
    async needsApproval() {
      return false;
    },
    async isEnabled() {
      return true;
    },
    inputGuardrails: [],
    outputGuardrails: [],
  };
}

/**
 * The outcome of running a function tool during a turn.
 */
export type FunctionToolResult<TContext = UnknownContext> =
  | {
      type: 'function_output';
      /**
       * The tool that was run.
       */
      tool: FunctionTool<TContext>;
      /**
       * The output of the tool.
       */
      output: unknown;
      /**
       * The run item representing the tool call output.
       */
      runItem: RunToolCallOutputItem;
      /**
       * Approvals a nested agent run is waiting for.
       */
      interruptions?: RunToolApprovalItem[];
    }
  | {
      type: 'function_approval';
      tool: FunctionTool<TContext>;
      /**
       * The item asking for approval.
       */
      runItem: RunToolApprovalItem;
    };

