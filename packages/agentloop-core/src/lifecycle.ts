import { EventEmitter } from 'node:events';
import type { AgentRef } from './items';
import type { RunContext } from './runContext';
import type { UnknownContext } from './types';
import type * as protocol from './types/protocol';

type EventMap = Record<string, unknown[]>;

/**
 * Minimal view of a tool that lifecycle listeners receive.
 */
export type ToolRef = {
  readonly type: string;
  readonly name: string;
};

export type ToolEventDetails = {
  toolCall: protocol.FunctionCallItem | protocol.ActionCallItem;
};

/**
 * Typed facade over a Node.js `EventEmitter`.
 */
export abstract class EventEmitterDelegate<TEvents extends EventMap> {
  protected abstract eventEmitter: EventEmitter;

  on<K extends keyof TEvents & string>(
    type: K,
    listener: (...args: TEvents[K]) => void,
  ): EventEmitter {
    this.eventEmitter.on(type, listener);
    return this.eventEmitter;
  }

  off<K extends keyof TEvents & string>(
    type: K,
    listener: (...args: TEvents[K]) => void,
  ): EventEmitter {
    this.eventEmitter.off(type, listener);
    return this.eventEmitter;
  }

  once<K extends keyof TEvents & string>(
    type: K,
    listener: (...args: TEvents[K]) => void,
  ): EventEmitter {
    this.eventEmitter.once(type, listener);
    return this.eventEmitter;
  }

  emit<K extends keyof TEvents & string>(type: K, ...args: TEvents[K]): boolean {
    return this.eventEmitter.emit(type, ...args);
  }
}

export type AgentHookEvents<TContext = UnknownContext> = {
  /**
   * @param context - The context of the run
   * @param agent - The agent that is starting
   */
  agent_start: [context: RunContext<TContext>, agent: AgentRef];
  /**
   * @param context - The context of the run
   * @param output - The output of the agent
   */
  agent_end: [context: RunContext<TContext>, output: string];
  /**
   * @param context - The context of the run
   * @param nextAgent - The agent that is receiving the handoff
   */
  agent_handoff: [context: RunContext<TContext>, nextAgent: AgentRef];
  /**
   * @param context - The context of the run
   * @param tool - The tool that is starting
   */
  agent_tool_start: [
    context: RunContext<TContext>,
    tool: ToolRef,
    details: ToolEventDetails,
  ];
  /**
   * @param context - The context of the run
   * @param tool - The tool that is streaming
   * @param delta - A chunk of incremental tool output
   */
  agent_tool_delta: [
    context: RunContext<TContext>,
    tool: ToolRef,
    delta: string,
    details: ToolEventDetails,
  ];
  /**
   * @param context - The context of the run
   * @param tool - The tool that is ending
   * @param result - The output of the tool
   */
  agent_tool_end: [
    context: RunContext<TContext>,
    tool: ToolRef,
    result: string,
    details: ToolEventDetails,
  ];
};

/**
 * Event emitter that every Agent instance inherits from and that emits events for the lifecycle
 * of the agent.
 */
export class AgentHooks<
  TContext = UnknownContext,
> extends EventEmitterDelegate<AgentHookEvents<TContext>> {
  protected eventEmitter = new EventEmitter();
}

export type RunHookEvents<TContext = UnknownContext> = {
  /**
   * @param context - The context of the run
   * @param agent - The agent that is starting
   */
  agent_start: [context: RunContext<TContext>, agent: AgentRef];
  /**
   * @param context - The context of the run
   * @param agent - The agent that is ending
   * @param output - The output of the agent
   */
  agent_end: [context: RunContext<TContext>, agent: AgentRef, output: string];
  /**
   * @param context - The context of the run
   * @param agent - The agent the model is answering for
   * @param delta - A chunk of streamed model text
   */
  model_delta: [context: RunContext<TContext>, agent: AgentRef, delta: string];
  /**
   * @param context - The context of the run
   * @param fromAgent - The agent that is handing off
   * @param toAgent - The next agent to run
   */
  agent_handoff: [
    context: RunContext<TContext>,
    fromAgent: AgentRef,
    toAgent: AgentRef,
  ];
  /**
   * @param context - The context of the run
   * @param agent - The agent that is starting a tool
   * @param tool - The tool that is starting
   */
  agent_tool_start: [
    context: RunContext<TContext>,
    agent: AgentRef,
    tool: ToolRef,
    details: ToolEventDetails,
  ];
  /**
   * @param context - The context of the run
   * @param agent - The agent whose tool is streaming
   * @param tool - The tool that is streaming
   * @param delta - A chunk of incremental tool output
   */
  agent_tool_delta: [
    context: RunContext<TContext>,
    agent: AgentRef,
    tool: ToolRef,
    delta: string,
    details: ToolEventDetails,
  ];
  /**
   * @param context - The context of the run
   * @param agent - The agent that is ending a tool
   * @param tool - The tool that is ending
   * @param result - The output of the tool
   */
  agent_tool_end: [
    context: RunContext<TContext>,
    agent: AgentRef,
    tool: ToolRef,
    result: string,
    details: ToolEventDetails,
  ];
};

/**
 * Event emitter that every Runner instance inherits from and that emits events for the lifecycle
 * of the overall run.
 */
export class RunHooks<
  TContext = UnknownContext,
> extends EventEmitterDelegate<RunHookEvents<TContext>> {
  protected eventEmitter = new EventEmitter();
}
