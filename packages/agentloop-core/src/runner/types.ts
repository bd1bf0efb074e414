import type { Handoff } from '../handoff';
import type { RunItem, RunToolApprovalItem } from '../items';
import type { ActionTool, FunctionTool, ProtocolServerTool } from '../tool';
import type { UnknownContext } from '../types';
import type * as protocol from '../types/protocol';

// A handoff function call that still needs to be executed after the model turn.
export type ToolRunHandoff<TContext = UnknownContext> = {
  toolCall: protocol.FunctionCallItem;
  handoff: Handoff<TContext>;
};

// A function tool invocation emitted by the model along with the concrete tool to run.
export type ToolRunFunction<TContext = UnknownContext> = {
  toolCall: protocol.FunctionCallItem;
  tool: FunctionTool<TContext>;
};

// A shell, patch or computer call routed to the action tool that owns it.
export type ToolRunAction<TContext = UnknownContext> = {
  toolCall: protocol.ActionCallItem;
  tool: ActionTool<TContext>;
};

// An approval request sent by a remote tool server.
export type ToolRunProtocolApprovalRequest<TContext = UnknownContext> = {
  requestItem: RunToolApprovalItem;
  serverTool: ProtocolServerTool<TContext>;
};

/**
 * Everything the model produced in a single turn, classified. Downstream logic consumes this
 * structure to decide which follow-up work must run.
 */
export type ProcessedResponse<TContext = UnknownContext> = {
  newItems: RunItem[];
  handoffs: ToolRunHandoff<TContext>[];
  functions: ToolRunFunction<TContext>[];
  actions: ToolRunAction<TContext>[];
  protocolApprovalRequests: ToolRunProtocolApprovalRequest<TContext>[];
  toolsUsed: string[];
  hasToolsOrApprovalsToRun(): boolean;
};
