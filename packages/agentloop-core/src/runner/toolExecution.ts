import type { Agent, ToolsToFinalOutputResult } from '../agent';
import { AgentLoopError, ToolCallError, UserError } from '../errors';
import { getTransferMessage, type HandoffInputData } from '../handoff';
import {
  FUNCTION_TOOL_ORIGIN,
  RunHandoffOutputItem,
  RunProtocolApprovalResponseItem,
  RunToolApprovalItem,
  RunToolCallOutputItem,
  type RunItem,
} from '../items';
import type { ToolEventDetails, ToolRef } from '../lifecycle';
import logger from '../logger';
import type { ModelResponse } from '../model';
import type { Runner } from '../run';
import type { RunContext } from '../runContext';
import type { RunState } from '../runState';
import {
  isToolStream,
  type FunctionToolResult,
  type NestedRunRecord,
  type ToolStream,
} from '../tool';
import type { AgentInputItem, UnknownContext } from '../types';
import type * as protocol from '../types/protocol';
import { toSmartString } from '../utils/smartString';
import {
  runToolInputGuardrails,
  runToolOutputGuardrails,
} from '../utils/toolGuardrails';
import { SingleStepResult } from './steps';
import type {
  ToolRunAction,
  ToolRunFunction,
  ToolRunHandoff,
  ToolRunProtocolApprovalRequest,
} from './types';

export const TOOL_APPROVAL_REJECTION_MESSAGE = 'Tool execution was not approved.';
export const MULTIPLE_HANDOFFS_MESSAGE =
  'Multiple handoffs detected, ignoring this one.';

/**
 * @internal
 * Wraps a tool output into the protocol item that is sent back to the model.
 */
export function getToolCallOutputItem(
  toolCall: protocol.FunctionCallItem,
  output: unknown,
): protocol.FunctionCallResultItem {
  return {
    type: 'function_call_result',
    name: toolCall.name,
    callId: toolCall.callId,
    status: 'completed',
    output: {
      type: 'text',
      text: toSmartString(output),
    },
  };
}

function getActionCallOutputItem(
  toolCall: protocol.ActionCallItem,
  output: string,
): protocol.ActionCallResultItem {
  return {
    type: 'action_call_output',
    callType: toolCall.type,
    callId: toolCall.callId,
    output,
  };
}

type FunctionToolCallDeps<TContext> = {
  agent: Agent<TContext>;
  runner: Runner;
  state: RunState<TContext>;
};

function toToolCallError<TContext>(
  error: unknown,
  state: RunState<TContext>,
): Error {
  if (error instanceof AgentLoopError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ToolCallError(
    `Failed to run function tools: ${cause.message}`,
    cause,
    state,
  );
}

/**
 * @internal
 * Runs every function tool call requested by the model concurrently and returns their outputs in
 * the order the model issued the calls.
 */
export async function executeFunctionToolCalls<TContext = UnknownContext>(
  agent: Agent<TContext>,
  toolRuns: ToolRunFunction<TContext>[],
  runner: Runner,
  state: RunState<TContext>,
): Promise<FunctionToolResult<TContext>[]> {
  const deps: FunctionToolCallDeps<TContext> = { agent, runner, state };

  try {
    return await Promise.all(
      toolRuns.map(async (toolRun) => {
        const approvalOutcome = await handleFunctionApproval(deps, toolRun);
        if (approvalOutcome !== 'approved') {
          return approvalOutcome;
        }
        return runApprovedFunctionTool(deps, toolRun);
      }),
    );
  } catch (error) {
    throw toToolCallError(error, state);
  }
}

function buildApprovalRequestResult<TContext>(
  deps: FunctionToolCallDeps<TContext>,
  toolRun: ToolRunFunction<TContext>,
): FunctionToolResult<TContext> {
  return {
    type: 'function_approval',
    tool: toolRun.tool,
    runItem: new RunToolApprovalItem(
      toolRun.toolCall,
      deps.agent,
      toolRun.tool.name,
      toolRun.tool.origin,
    ),
  };
}

function buildApprovalRejectionResult<TContext>(
  deps: FunctionToolCallDeps<TContext>,
  toolRun: ToolRunFunction<TContext>,
): FunctionToolResult<TContext> {
  const response = TOOL_APPROVAL_REJECTION_MESSAGE;
  logger.debug(
    `Tool execution for ${toolRun.toolCall.callId} was rejected by the user`,
  );
  return {
    type: 'function_output',
    tool: toolRun.tool,
    output: response,
    runItem: new RunToolCallOutputItem(
      getToolCallOutputItem(toolRun.toolCall, response),
      deps.agent,
      response,
      toolRun.tool.origin,
    ),
  };
}

async function handleFunctionApproval<TContext>(
  deps: FunctionToolCallDeps<TContext>,
  toolRun: ToolRunFunction<TContext>,
): Promise<'approved' | FunctionToolResult<TContext>> {
  const { state } = deps;
  const needsApproval = await toolRun.tool.needsApproval(
    state._context,
    toolRun.toolCall.arguments,
    toolRun.toolCall.callId,
  );

  if (!needsApproval) {
    return 'approved';
  }

  const approval = state._context.isToolApproved({
    toolName: toolRun.tool.name,
    callId: toolRun.toolCall.callId,
  });

  if (approval === false) {
    return buildApprovalRejectionResult(deps, toolRun);
  }

  if (approval !== true) {
    return buildApprovalRequestResult(deps, toolRun);
  }

  return 'approved';
}

/**
 * Drains a streaming tool. Deltas are forwarded as they arrive; the `final` event, or the
 * concatenated deltas when there is none, becomes the tool output.
 */
async function consumeToolStream(
  stream: ToolStream,
  onDelta: (delta: string) => void,
): Promise<unknown> {
  let text = '';
  let sawFinal = false;
  let finalOutput: unknown;
  for await (const event of stream) {
    if (event.type === 'delta') {
      text += event.delta;
      onDelta(event.delta);
    } else {
      sawFinal = true;
      finalOutput = event.output;
    }
  }
  return sawFinal ? finalOutput : text;
}

async function runApprovedFunctionTool<TContext>(
  deps: FunctionToolCallDeps<TContext>,
  toolRun: ToolRunFunction<TContext>,
): Promise<FunctionToolResult<TContext>> {
  const { agent, runner, state } = deps;
  const { tool, toolCall } = toolRun;

  const inputGuardrailResult = await runToolInputGuardrails({
    guardrails: tool.inputGuardrails,
    context: state._context,
    agent,
    toolCall,
    onResult: (result) => {
      state._toolInputGuardrailResults.push(result);
    },
  });

  emitToolStart(runner, state._context, agent, tool, toolCall);

  const nestedRun: NestedRunRecord = { interruptions: [] };
  let toolOutput: unknown;
  try {
    if (inputGuardrailResult.type === 'reject') {
      toolOutput = inputGuardrailResult.message;
    } else {
      const invoked = await tool.invoke(state._context, toolCall.arguments, {
        toolCall,
        nestedRun,
      });
      toolOutput = isToolStream(invoked)
        ? await consumeToolStream(invoked, (delta) =>
            emitToolDelta(runner, state._context, agent, tool, delta, toolCall),
          )
        : invoked;
      toolOutput = await runToolOutputGuardrails({
        guardrails: tool.outputGuardrails,
        context: state._context,
        agent,
        toolCall,
        toolOutput,
        onResult: (result) => {
          state._toolOutputGuardrailResults.push(result);
        },
      });
    }
  } catch (error) {
    emitToolEnd(runner, state._context, agent, tool, String(error), toolCall);
    throw error;
  }

  emitToolEnd(
    runner,
    state._context,
    agent,
    tool,
    toSmartString(toolOutput),
    toolCall,
  );

  const functionResult: FunctionToolResult<TContext> = {
    type: 'function_output',
    tool,
    output: toolOutput,
    runItem: new RunToolCallOutputItem(
      getToolCallOutputItem(toolCall, toolOutput),
      agent,
      toolOutput,
      tool.origin,
    ),
  };
  if (nestedRun.interruptions.length > 0) {
    functionResult.interruptions = nestedRun.interruptions;
  }
  return functionResult;
}

function emitToolStart<TContext>(
  runner: Runner,
  runContext: RunContext<TContext>,
  agent: Agent<TContext>,
  tool: ToolRef,
  toolCall: ToolEventDetails['toolCall'],
): void {
  runner.emit('agent_tool_start', runContext, agent, tool, { toolCall });
  agent.emit('agent_tool_start', runContext, tool, { toolCall });
}

function emitToolDelta<TContext>(
  runner: Runner,
  runContext: RunContext<TContext>,
  agent: Agent<TContext>,
  tool: ToolRef,
  delta: string,
  toolCall: ToolEventDetails['toolCall'],
): void {
  runner.emit('agent_tool_delta', runContext, agent, tool, delta, {
    toolCall,
  });
  agent.emit('agent_tool_delta', runContext, tool, delta, { toolCall });
}

function emitToolEnd<TContext>(
  runner: Runner,
  runContext: RunContext<TContext>,
  agent: Agent<TContext>,
  tool: ToolRef,
  output: string,
  toolCall: ToolEventDetails['toolCall'],
): void {
  runner.emit('agent_tool_end', runContext, agent, tool, output, { toolCall });
  agent.emit('agent_tool_end', runContext, tool, output, { toolCall });
}

type ApprovalResolution = 'approved' | 'rejected' | 'pending';

async function resolveActionApproval<TContext>(
  runContext: RunContext<TContext>,
  action: ToolRunAction<TContext>,
  approvalItem: RunToolApprovalItem,
): Promise<ApprovalResolution> {
  const { tool, toolCall } = action;
  const needsApproval = await tool.needsApproval(
    runContext,
    toolCall.action,
    toolCall.callId,
  );
  if (!needsApproval) {
    return 'approved';
  }

  if (
    tool.onApproval &&
    runContext.isToolApproved({
      toolName: tool.name,
      callId: toolCall.callId,
    }) === undefined
  ) {
    const decision = await tool.onApproval(runContext, approvalItem);
    if (decision.approve) {
      runContext.approveTool(approvalItem);
    } else {
      runContext.rejectTool(approvalItem);
    }
  }

  const approval = runContext.isToolApproved({
    toolName: tool.name,
    callId: toolCall.callId,
  });
  if (approval === true) {
    return 'approved';
  }
  if (approval === false) {
    return 'rejected';
  }
  return 'pending';
}

/**
 * @internal
 * Runs shell, patch and computer calls through the action tools that own them. Calls run
 * concurrently; the returned items keep the order of the calls.
 */
export async function executeActionCalls<TContext>(
  agent: Agent<TContext>,
  actions: ToolRunAction<TContext>[],
  runner: Runner,
  state: RunState<TContext>,
): Promise<RunItem[]> {
  const runContext = state._context;
  try {
    return await Promise.all(
      actions.map(async (action): Promise<RunItem> => {
        const { tool, toolCall } = action;
        const approvalItem = new RunToolApprovalItem(
          toolCall,
          agent,
          tool.name,
          tool.origin,
        );
        const resolution = await resolveActionApproval(
          runContext,
          action,
          approvalItem,
        );
        if (resolution === 'pending') {
          return approvalItem;
        }
        if (resolution === 'rejected') {
          return new RunToolCallOutputItem(
            getActionCallOutputItem(toolCall, TOOL_APPROVAL_REJECTION_MESSAGE),
            agent,
            TOOL_APPROVAL_REJECTION_MESSAGE,
            tool.origin,
          );
        }

        emitToolStart(runner, runContext, agent, tool, toolCall);
        let output: string;
        try {
          output = await tool.run(runContext, {
            callId: toolCall.callId,
            action: toolCall.action,
          });
        } catch (error) {
          emitToolEnd(runner, runContext, agent, tool, String(error), toolCall);
          throw error;
        }
        emitToolEnd(runner, runContext, agent, tool, output, toolCall);

        return new RunToolCallOutputItem(
          getActionCallOutputItem(toolCall, output),
          agent,
          output,
          tool.origin,
        );
      }),
    );
  } catch (error) {
    throw toToolCallError(error, state);
  }
}

export type ProtocolApprovalOutcome = {
  /**
   * Approval responses to record, in request order.
   */
  items: RunItem[];
  /**
   * Requests that are still waiting for a decision.
   */
  pending: RunToolApprovalItem[];
};

/**
 * @internal
 * Answers approval requests sent by remote tool servers. A registered `onApproval` callback
 * decides immediately. Servers configured to interrupt wait for a ledger decision. Otherwise the
 * request is approved with a warning.
 */
export async function handleProtocolApprovals<TContext>(
  requests: ToolRunProtocolApprovalRequest<TContext>[],
  agent: Agent<TContext>,
  state: RunState<TContext>,
): Promise<ProtocolApprovalOutcome> {
  const items: RunItem[] = [];
  const pending: RunToolApprovalItem[] = [];

  for (const { requestItem, serverTool } of requests) {
    const rawItem = requestItem.rawItem;
    if (rawItem.type !== 'protocol_approval_request') {
      continue;
    }

    let decision: { approve: boolean; reason?: string } | undefined;
    if (serverTool.onApproval) {
      decision = await serverTool.onApproval(state._context, requestItem);
    } else if (serverTool.interruptOnApproval) {
      const approval = state._context.isToolApproved({
        toolName: requestItem.toolName,
        callId: requestItem.callId,
      });
      if (approval === undefined) {
        pending.push(requestItem);
        continue;
      }
      decision = { approve: approval };
    } else {
      logger.warn(
        `No approval handler for protocol server "${serverTool.serverLabel}"; approving ${rawItem.name} automatically`,
      );
      decision = { approve: true };
    }

    const response: protocol.ProtocolApprovalResponseItem = {
      type: 'protocol_approval_response',
      approvalRequestId: rawItem.id,
      approve: decision.approve,
    };
    if (decision.reason !== undefined) {
      response.reason = decision.reason;
    }
    items.push(new RunProtocolApprovalResponseItem(response, agent));
  }

  return { items, pending };
}

/**
 * @internal
 * Drives handoff calls by invoking the downstream agent and capturing any generated items so the
 * run can continue under the new agent. Only the first handoff of a turn is honored.
 */
export async function executeHandoffCalls<TContext>(
  agent: Agent<TContext>,
  originalInput: string | AgentInputItem[],
  preStepItems: RunItem[],
  newStepItems: RunItem[],
  newResponse: ModelResponse,
  runHandoffs: ToolRunHandoff<TContext>[],
  runner: Runner,
  runContext: RunContext<TContext>,
): Promise<SingleStepResult<TContext>> {
  newStepItems = [...newStepItems];

  const [actualHandoff, ...ignoredHandoffs] = runHandoffs;
  if (!actualHandoff) {
    logger.warn(
      'Incorrectly called executeHandoffCalls with no handoffs. Moving on.',
    );
    return new SingleStepResult(
      originalInput,
      newResponse,
      preStepItems,
      newStepItems,
      { type: 'next_step_run_again' },
    );
  }

  for (const ignored of ignoredHandoffs) {
    newStepItems.push(
      new RunToolCallOutputItem(
        getToolCallOutputItem(ignored.toolCall, MULTIPLE_HANDOFFS_MESSAGE),
        agent,
        MULTIPLE_HANDOFFS_MESSAGE,
        FUNCTION_TOOL_ORIGIN,
      ),
    );
  }
  if (ignoredHandoffs.length > 0) {
    logger.debug(
      `Multiple handoffs requested by ${agent.name}; using ${actualHandoff.handoff.agentName}`,
    );
  }

  const handoff = actualHandoff.handoff;
  const newAgent = await handoff.onInvokeHandoff(
    runContext,
    actualHandoff.toolCall.arguments,
  );

  newStepItems.push(
    new RunHandoffOutputItem(
      getToolCallOutputItem(
        actualHandoff.toolCall,
        getTransferMessage(newAgent),
      ),
      agent,
      newAgent,
    ),
  );

  runner.emit('agent_handoff', runContext, agent, newAgent);
  agent.emit('agent_handoff', runContext, newAgent);

  const producedItems = [...newStepItems];
  const inputFilter = handoff.inputFilter ?? runner.config.handoffInputFilter;
  if (inputFilter) {
    logger.debug('Filtering inputs for handoff');
    const handoffInputData: HandoffInputData = {
      inputHistory: Array.isArray(originalInput)
        ? [...originalInput]
        : originalInput,
      preHandoffItems: [...preStepItems],
      newItems: [...newStepItems],
    };

    const filtered = inputFilter(handoffInputData);

    originalInput = filtered.inputHistory;
    preStepItems = filtered.preHandoffItems;
    newStepItems = filtered.newItems;
  }

  return new SingleStepResult(
    originalInput,
    newResponse,
    preStepItems,
    newStepItems,
    { type: 'next_step_handoff', newAgent },
    producedItems,
  );
}

const NOT_FINAL_OUTPUT: ToolsToFinalOutputResult = {
  isFinalOutput: false,
  isInterrupted: undefined,
};

/**
 * Collects approval interruptions from tool execution results and any additional run items
 * (e.g. action approval placeholders), including approvals nested agent runs are waiting for.
 */
export function collectInterruptions<TContext = UnknownContext>(
  toolResults: FunctionToolResult<TContext>[],
  additionalItems: RunItem[] = [],
): RunToolApprovalItem[] {
  const interruptions: RunToolApprovalItem[] = [];

  for (const result of toolResults) {
    if (result.type === 'function_approval') {
      interruptions.push(result.runItem);
    } else if (result.interruptions) {
      interruptions.push(...result.interruptions);
    }
  }

  for (const item of additionalItems) {
    if (item instanceof RunToolApprovalItem) {
      interruptions.push(item);
    }
  }

  return interruptions;
}

/**
 * @internal
 * Determines whether tool executions produced a final agent output according to the agent's
 * `toolUseBehavior`.
 */
export async function checkForFinalOutputFromTools<TContext>(
  agent: Agent<TContext>,
  toolResults: FunctionToolResult<TContext>[],
  state: RunState<TContext>,
): Promise<ToolsToFinalOutputResult> {
  if (toolResults.length === 0) {
    return NOT_FINAL_OUTPUT;
  }

  const toolUseBehavior = agent.toolUseBehavior;
  if (toolUseBehavior === 'run_llm_again') {
    return NOT_FINAL_OUTPUT;
  }

  if (toolUseBehavior === 'stop_on_first_tool') {
    const firstToolResult = toolResults[0];
    if (firstToolResult?.type === 'function_output') {
      return {
        isFinalOutput: true,
        isInterrupted: undefined,
        finalOutput: toSmartString(firstToolResult.output),
      };
    }
    return NOT_FINAL_OUTPUT;
  }

  if (typeof toolUseBehavior === 'object') {
    const stoppingTool = toolResults.find((r) =>
      toolUseBehavior.stopAtToolNames.includes(r.tool.name),
    );
    if (stoppingTool?.type === 'function_output') {
      return {
        isFinalOutput: true,
        isInterrupted: undefined,
        finalOutput: toSmartString(stoppingTool.output),
      };
    }
    return NOT_FINAL_OUTPUT;
  }

  if (typeof toolUseBehavior === 'function') {
    return toolUseBehavior(state._context, toolResults);
  }

  throw new UserError(
    `Invalid toolUseBehavior: ${String(toolUseBehavior)}`,
    'execute',
    state,
  );
}
