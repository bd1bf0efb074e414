import type { Agent } from '../agent';
import { ModelBehaviorError } from '../errors';
import type { Handoff } from '../handoff';
import {
  actionToolName,
  FUNCTION_TOOL_ORIGIN,
  RunHandoffCallItem,
  RunMessageOutputItem,
  RunProtocolListToolsItem,
  RunReasoningItem,
  RunToolApprovalItem,
  RunToolCallItem,
  type RunItem,
  type ToolOrigin,
} from '../items';
import logger from '../logger';
import type { ModelResponse } from '../model';
import {
  buildJsonToolCallTool,
  JSON_TOOL_CALL_NAME,
  type ActionTool,
  type FunctionTool,
  type ProtocolServerTool,
  type Tool,
} from '../tool';
import type * as protocol from '../types/protocol';
import type {
  ProcessedResponse,
  ToolRunAction,
  ToolRunFunction,
  ToolRunHandoff,
  ToolRunProtocolApprovalRequest,
} from './types';

function resolveFunctionOrHandoff<TContext>(
  toolCall: protocol.FunctionCallItem,
  handoffMap: Map<string, Handoff<TContext>>,
  functionMap: Map<string, FunctionTool<TContext>>,
  agent: Agent<TContext>,
):
  | { type: 'handoff'; handoff: Handoff<TContext> }
  | { type: 'function'; tool: FunctionTool<TContext> } {
  const handoff = handoffMap.get(toolCall.name);
  if (handoff) {
    return { type: 'handoff', handoff };
  }

  const functionTool = functionMap.get(toolCall.name);
  if (functionTool) {
    return { type: 'function', tool: functionTool };
  }

  // Some providers deliver structured output as a call to this ad-hoc tool.
  if (toolCall.name === JSON_TOOL_CALL_NAME && agent.outputType !== 'text') {
    return { type: 'function', tool: buildJsonToolCallTool<TContext>() };
  }

  throw new ModelBehaviorError(
    `Tool ${toolCall.name} not found in agent ${agent.name}.`,
  );
}

function hostedCallOrigin(output: protocol.HostedToolCallItem): ToolOrigin {
  return output.serverLabel
    ? { type: 'protocol_tool', serverName: output.serverLabel }
    : FUNCTION_TOOL_ORIGIN;
}

/**
 * Walks a raw model response and classifies each item so the runner can schedule follow-up work.
 * Returns both the serializable RunItems (for history) and the actionable tool metadata. Nothing
 * is executed here; an item that cannot be routed fails the whole response.
 */
export function processModelResponse<TContext>(
  modelResponse: ModelResponse,
  agent: Agent<TContext>,
  tools: Tool<TContext>[],
  handoffs: Handoff<TContext>[],
): ProcessedResponse<TContext> {
  const items: RunItem[] = [];
  const runHandoffs: ToolRunHandoff<TContext>[] = [];
  const runFunctions: ToolRunFunction<TContext>[] = [];
  const runActions: ToolRunAction<TContext>[] = [];
  const runProtocolApprovalRequests: ToolRunProtocolApprovalRequest<TContext>[] =
    [];
  const toolsUsed: string[] = [];

  const handoffMap = new Map(handoffs.map((h) => [h.toolName, h]));
  const functionMap = new Map(
    tools
      .filter((t): t is FunctionTool<TContext> => t.type === 'function')
      .map((t) => [t.name, t]),
  );
  const actionToolMap = new Map(
    tools
      .filter((t): t is ActionTool<TContext> => t.type === 'action')
      .map((t) => [t.callType, t]),
  );
  const protocolServerMap = new Map(
    tools
      .filter(
        (t): t is ProtocolServerTool<TContext> => t.type === 'protocol_server',
      )
      .map((t) => [t.serverLabel, t]),
  );

  for (const output of modelResponse.output) {
    switch (output.type) {
      case 'message':
        items.push(new RunMessageOutputItem(output, agent));
        break;
      case 'reasoning':
        items.push(new RunReasoningItem(output, agent));
        break;
      case 'hosted_tool_call':
        items.push(new RunToolCallItem(output, agent, hostedCallOrigin(output)));
        toolsUsed.push(output.name);
        break;
      case 'protocol_list_tools':
        items.push(new RunProtocolListToolsItem(output, agent));
        break;
      case 'protocol_approval_request': {
        const serverTool = protocolServerMap.get(output.serverLabel);
        if (!serverTool) {
          throw new ModelBehaviorError(
            `Protocol server (${output.serverLabel}) not found in agent ${agent.name}.`,
          );
        }
        const approvalItem = new RunToolApprovalItem(
          output,
          agent,
          output.name,
          { type: 'protocol_tool', serverName: output.serverLabel },
        );
        runProtocolApprovalRequests.push({
          requestItem: approvalItem,
          serverTool,
        });
        if (!serverTool.onApproval && serverTool.interruptOnApproval) {
          // Decided by the caller on resume.
          items.push(approvalItem);
        }
        break;
      }
      case 'shell_call':
      case 'local_shell_call':
      case 'apply_patch_call':
      case 'computer_call': {
        const actionTool = actionToolMap.get(output.type);
        if (!actionTool) {
          throw new ModelBehaviorError(
            `Model produced ${output.type} but agent ${agent.name} has no ${actionToolName(output.type)} tool.`,
          );
        }
        items.push(new RunToolCallItem(output, agent, actionTool.origin));
        toolsUsed.push(actionTool.name);
        runActions.push({ toolCall: output, tool: actionTool });
        break;
      }
      case 'function_call': {
        toolsUsed.push(output.name);
        const resolved = resolveFunctionOrHandoff(
          output,
          handoffMap,
          functionMap,
          agent,
        );
        if (resolved.type === 'handoff') {
          items.push(new RunHandoffCallItem(output, agent));
          runHandoffs.push({ toolCall: output, handoff: resolved.handoff });
        } else {
          items.push(new RunToolCallItem(output, agent, resolved.tool.origin));
          runFunctions.push({ toolCall: output, tool: resolved.tool });
        }
        break;
      }
      case 'unknown':
        logger.debug(`Skipping unknown output item from agent ${agent.name}`);
        break;
    }
  }

  return {
    newItems: items,
    handoffs: runHandoffs,
    functions: runFunctions,
    actions: runActions,
    protocolApprovalRequests: runProtocolApprovalRequests,
    toolsUsed,
    hasToolsOrApprovalsToRun(): boolean {
      return (
        runHandoffs.length > 0 ||
        runFunctions.length > 0 ||
        runProtocolApprovalRequests.length > 0 ||
        runActions.length > 0
      );
    },
  };
}
