import { z } from 'zod';
import { toSmartString } from './utils/smartString';
import * as protocol from './types/protocol';

/**
 * Where a tool comes from. Carried on every tool item so consumers can tell a plain function
 * apart from a tool served by a remote protocol server or from another agent exposed as a tool.
 */
export const ToolOrigin = z.discriminatedUnion('type', [
  z.object({ type: z.literal('function') }),
  z.object({ type: z.literal('protocol_tool'), serverName: z.string() }),
  z.object({ type: z.literal('agent_as_tool'), agentName: z.string() }),
]);

export type ToolOrigin = z.infer<typeof ToolOrigin>;

export const FUNCTION_TOOL_ORIGIN: ToolOrigin = { type: 'function' };

/**
 * The part of an agent that run items hold on to. Items only ever need the agent's name, which is
 * also its identity inside a serialized run state.
 */
export type AgentRef = {
  readonly name: string;
};

function agentJSON(agent: AgentRef) {
  return { name: agent.name };
}

/**
 * Name of the tool an action call is routed to, e.g. `shell_call` -> `shell`.
 */
export function actionToolName(type: protocol.ActionCallType): string {
  return type.replace(/_call$/, '');
}

export class RunItemBase {
  public readonly type: string = 'base_item' as const;
  public rawItem?: protocol.ModelItem;

  toJSON() {
    return {
      type: this.type,
      rawItem: this.rawItem,
    };
  }
}

export class RunMessageOutputItem extends RunItemBase {
  public readonly type = 'message_output_item' as const;

  constructor(
    public rawItem: protocol.AssistantMessageItem,
    public agent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
    };
  }

  get content(): string {
    let content = '';
    for (const part of this.rawItem.content) {
      if (part.type === 'output_text') {
        content += part.text;
      }
    }
    return content;
  }
}

export class RunToolCallItem extends RunItemBase {
  public readonly type = 'tool_call_item' as const;

  constructor(
    public rawItem: protocol.ToolCallItem,
    public agent: AgentRef,
    public toolOrigin?: ToolOrigin,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
      toolOrigin: this.toolOrigin,
    };
  }
}

export class RunToolCallOutputItem extends RunItemBase {
  public readonly type = 'tool_call_output_item' as const;

  constructor(
    public rawItem: protocol.FunctionCallResultItem | protocol.ActionCallResultItem,
    public agent: AgentRef,
    public output: unknown,
    public toolOrigin?: ToolOrigin,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
      output: toSmartString(this.output),
      toolOrigin: this.toolOrigin,
    };
  }
}

export class RunReasoningItem extends RunItemBase {
  public readonly type = 'reasoning_item' as const;

  constructor(
    public rawItem: protocol.ReasoningItem,
    public agent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
    };
  }
}

export class RunHandoffCallItem extends RunItemBase {
  public readonly type = 'handoff_call_item' as const;

  constructor(
    public rawItem: protocol.FunctionCallItem,
    public agent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
    };
  }
}

export class RunHandoffOutputItem extends RunItemBase {
  public readonly type = 'handoff_output_item' as const;

  constructor(
    public rawItem: protocol.FunctionCallResultItem,
    public sourceAgent: AgentRef,
    public targetAgent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      sourceAgent: agentJSON(this.sourceAgent),
      targetAgent: agentJSON(this.targetAgent),
    };
  }
}

export type ApprovalRawItem =
  | protocol.FunctionCallItem
  | protocol.ActionCallItem
  | protocol.ProtocolApprovalRequestItem;

function defaultToolName(rawItem: ApprovalRawItem): string {
  if (rawItem.type === 'function_call') {
    return rawItem.name;
  }
  if (rawItem.type === 'protocol_approval_request') {
    return rawItem.name;
  }
  return actionToolName(rawItem.type);
}

export class RunToolApprovalItem extends RunItemBase {
  public readonly type = 'tool_approval_item' as const;
  /**
   * Name used for approval tracking in the run's approval ledger.
   */
  public readonly toolName: string;

  constructor(
    public rawItem: ApprovalRawItem,
    public agent: AgentRef,
    toolName?: string,
    public toolOrigin?: ToolOrigin,
  ) {
    super();
    this.toolName = toolName ?? defaultToolName(rawItem);
  }

  get name(): string {
    return this.toolName;
  }

  /**
   * The id decisions about this call are recorded under.
   */
  get callId(): string {
    return this.rawItem.type === 'protocol_approval_request'
      ? this.rawItem.id
      : this.rawItem.callId;
  }

  /**
   * Returns the arguments if the raw item has an arguments property otherwise this will be undefined.
   */
  get arguments(): string | undefined {
    return 'arguments' in this.rawItem ? this.rawItem.arguments : undefined;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
      toolName: this.toolName,
      toolOrigin: this.toolOrigin,
    };
  }
}

export class RunProtocolListToolsItem extends RunItemBase {
  public readonly type = 'protocol_list_tools_item' as const;

  constructor(
    public rawItem: protocol.ProtocolListToolsItem,
    public agent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
    };
  }
}

export class RunProtocolApprovalResponseItem extends RunItemBase {
  public readonly type = 'protocol_approval_response_item' as const;

  constructor(
    public rawItem: protocol.ProtocolApprovalResponseItem,
    public agent: AgentRef,
  ) {
    super();
  }

  toJSON() {
    return {
      ...super.toJSON(),
      agent: agentJSON(this.agent),
    };
  }
}

export type RunItem =
  | RunMessageOutputItem
  | RunToolCallItem
  | RunReasoningItem
  | RunHandoffCallItem
  | RunToolCallOutputItem
  | RunHandoffOutputItem
  | RunToolApprovalItem
  | RunProtocolListToolsItem
  | RunProtocolApprovalResponseItem;

/**
 * Extract all text output from a list of run items by concatenating the content of all
 * message output items.
 *
 * @param items - The list of run items to extract text from.
 * @returns A string of all the text output from the run items.
 */
export function extractAllTextOutput(items: RunItem[]) {
  return items
    .filter(
      (item): item is RunMessageOutputItem =>
        item.type === 'message_output_item',
    )
    .map((item) => item.content)
    .join('');
}
