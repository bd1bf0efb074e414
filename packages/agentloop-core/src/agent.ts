import { z } from 'zod';
import { ModelBehaviorError, UserError } from './errors';
import {
  defineInputGuardrail,
  defineOutputGuardrail,
  type InputGuardrail,
  type InputGuardrailDefinition,
  type OutputGuardrail,
  type OutputGuardrailDefinition,
} from './guardrail';
import { getHandoff, Handoff } from './handoff';
import { AgentHooks } from './lifecycle';
import type { Model, ModelSettings } from './model';
import type { RunResult } from './result';
import { Runner, type RunConfig } from './run';
import type { RunContext } from './runContext';
import {
  tool,
  type FunctionTool,
  type FunctionToolResult,
  type Tool,
  type ToolApprovalFunction,
} from './tool';
import type { UnknownContext } from './types';
import { toSmartString } from './utils/smartString';
import type { AgentOutputType } from './utils/tools';
import { isZodObject } from './utils/typeGuards';

export type { AgentOutputType };

export type ToolsToFinalOutputResult =
  | {
      /**
       * Whether this is the final output. If `false`, the LLM will run again and receive the tool
       * call output
       */
      isFinalOutput: false;
      /**
       * Whether the agent was interrupted by a tool approval. If `true`, the LLM will run again
       * and receive the tool call output
       */
      isInterrupted: undefined;
    }
  | {
      isFinalOutput: true;
      isInterrupted: undefined;
      /**
       * The final output. Can be undefined if `isFinalOutput` is `false`, otherwise it must be a
       * string that will be processed based on the `outputType` of the agent.
       */
      finalOutput: string;
    };

/**
 * The type of the tool to final output function.
 */
export type ToolToFinalOutputFunction<TContext = UnknownContext> = (
  context: RunContext<TContext>,
  toolResults: FunctionToolResult<TContext>[],
) => ToolsToFinalOutputResult | Promise<ToolsToFinalOutputResult>;

/**
 * The behavior of the agent when a tool is called.
 */
export type ToolUseBehaviorFlags = 'run_llm_again' | 'stop_on_first_tool';

export type ToolUseBehavior<TContext = UnknownContext> =
  | ToolUseBehaviorFlags
  | {
      /**
       * List of tool names that will stop the agent from running further. The final output will
       * be the output of the first tool in the list that was called.
       */
      stopAtToolNames: string[];
    }
  | ToolToFinalOutputFunction<TContext>;

/**
 * Instructions for an agent, either static or computed for each turn.
 */
export type AgentInstructions<TContext = UnknownContext> =
  | string
  | ((
      runContext: RunContext<TContext>,
      agent: Agent<TContext>,
    ) => Promise<string> | string);

/**
 * Configuration for an agent.
 */
export type AgentConfiguration<TContext = UnknownContext> = {
  name: string;

  /**
   * The instructions for the agent. Will be used as the "system prompt" when this agent is
   * invoked. Describes what the agent should do, and how it responds.
   */
  instructions: AgentInstructions<TContext>;

  /**
   * A description of the agent. This is used when the agent is used as a handoff, so that an LLM
   * knows what it does and when to invoke it.
   */
  handoffDescription: string;

  /**
   * Handoffs are sub-agents that the agent can delegate to. You can provide a list of handoffs,
   * and the agent can choose to delegate to them if relevant. Allows for separation of concerns
   * and modularity.
   */
  handoffs: (Agent<TContext> | Handoff<TContext>)[];

  /**
   * The model implementation to use when invoking the LLM. When omitted, the runner's model is
   * used.
   */
  model?: string | Model;

  /**
   * Configures model-specific tuning parameters (e.g. temperature, top_p, etc.)
   */
  modelSettings: ModelSettings;

  /**
   * A list of tools the agent can use.
   */
  tools: Tool<TContext>[];

  /**
   * A list of checks that run against the run input before the first model call. A tripped
   * guardrail stops the run.
   */
  inputGuardrails: InputGuardrail<TContext>[];

  /**
   * A list of checks that run on the final output of the agent, after generating a response. Runs
   * only if the agent produces a final output.
   */
  outputGuardrails: OutputGuardrail<TContext>[];

  /**
   * The type of the output object. If not provided, the output will be a string.
   */
  outputType: AgentOutputType;

  /**
   * This lets you configure how tool use is handled.
   * - run_llm_again: The default behavior. Tools are run, and then the LLM receives the results
   *   and gets to respond.
   * - stop_on_first_tool: The output of the first tool call is used as the final output. This
   *   means that the LLM does not process the result of the tool call.
   * - A list of tool names: The agent will stop running if any of the tools in the list are
   *   called. The final output will be the output of the first matching tool call. The LLM does
   *   not process the result of the tool call.
   * - A function: if you pass a function, it will be called with the run context and the list of
   *   tool results. It must return a `ToolsToFinalOutputResult`, which determines whether the
   *   tool call resulted in a final output.
   *
   * NOTE: This configuration is specific to `FunctionTools`. Hosted tools, such as file search,
   * web search, etc. are always processed by the LLM
   */
  toolUseBehavior: ToolUseBehavior<TContext>;

  /**
   * Whether to reset the tool choice to the default value after a tool has been called. Defaults
   * to `true`. This ensures that the agent doesn't enter an infinite loop of tool usage.
   */
  resetToolChoice: boolean;
};

export type AgentOptions<TContext = UnknownContext> = Partial<
  AgentConfiguration<TContext>
> & {
  name: string;
};

/**
 * Options for exposing an agent as a tool of another agent.
 */
export type AgentAsToolOptions<TContext = UnknownContext> = {
  /**
   * The name of the tool. Defaults to the agent name.
   */
  toolName?: string;
  /**
   * The description of the tool, which should indicate what the tool does and when to use it.
   */
  toolDescription?: string;
  /**
   * A function that extracts the output text from the agent. If not provided, the final output
   * of the nested run is used.
   */
  customOutputExtractor?: (
    output: RunResult<TContext>,
  ) => string | Promise<string>;
  /**
   * Whether the nested agent call needs approval before it runs.
   */
  needsApproval?: boolean | ToolApprovalFunction<{ input: string }, TContext>;
  /**
   * Run configuration for the nested run.
   */
  runConfig?: Partial<RunConfig>;
  /**
   * Maximum number of turns the nested run may take.
   */
  maxTurns?: number;
};

const AgentToolInput = z.object({
  input: z.string(),
});

/**
 * Formats the error message for a final output that does not match the declared output type.
 */
export function formatFinalOutputTypeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const issues = error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    return `Invalid output type: final assistant output failed schema validation. Issues: ${issues}`;
  }
  if (error instanceof SyntaxError) {
    return `Invalid output type: final assistant output is not valid JSON. ${error.message}`;
  }
  return 'Invalid output type: final assistant output does not match the declared output type.';
}

/**
 * The class representing an AI agent configured with instructions, tools, guardrails, handoffs
 * and more.
 *
 * We strongly recommend passing `instructions`, which is the "system prompt" for the agent. In
 * addition, you can pass `handoffDescription`, which is a human-readable description of the
 * agent, used when the agent is used inside tools/handoffs.
 *
 * Agents are generic on the context type. The context is a (mutable) object you create. It is
 * passed to tool functions, handoffs, guardrails, etc.
 */
export class Agent<TContext = UnknownContext>
  extends AgentHooks<TContext>
  implements AgentConfiguration<TContext>
{
  name: string;
  instructions: AgentInstructions<TContext>;
  handoffDescription: string;
  handoffs: (Agent<TContext> | Handoff<TContext>)[];
  model?: string | Model;
  modelSettings: ModelSettings;
  tools: Tool<TContext>[];
  inputGuardrails: InputGuardrailDefinition<TContext>[];
  outputGuardrails: OutputGuardrailDefinition<TContext>[];
  outputType: AgentOutputType;
  toolUseBehavior: ToolUseBehavior<TContext>;
  resetToolChoice: boolean;

  constructor(config: AgentOptions<TContext>) {
    super();
    if (typeof config.name !== 'string' || config.name.trim() === '') {
      throw new UserError('Agent must have a name.');
    }
    this.name = config.name;
    this.instructions = config.instructions ?? '';
    this.handoffDescription = config.handoffDescription ?? '';
    this.handoffs = config.handoffs ?? [];
    this.model = config.model;
    this.modelSettings = config.modelSettings ?? {};
    this.tools = config.tools ?? [];
    this.inputGuardrails = (config.inputGuardrails ?? []).map((guardrail) =>
      defineInputGuardrail(guardrail),
    );
    this.outputGuardrails = (config.outputGuardrails ?? []).map((guardrail) =>
      defineOutputGuardrail(guardrail),
    );
    this.outputType = config.outputType ?? 'text';
    this.toolUseBehavior = config.toolUseBehavior ?? 'run_llm_again';
    this.resetToolChoice = config.resetToolChoice ?? true;
  }

  /**
   * Output schema name.
   */
  get outputSchemaName(): string {
    if (this.outputType === 'text') {
      return 'text';
    } else if (isZodObject(this.outputType)) {
      return 'ZodOutput';
    } else if (typeof this.outputType === 'object') {
      return this.outputType.name;
    }

    throw new Error(`Unknown output type: ${String(this.outputType)}`);
  }

  /**
   * Makes a copy of the agent, with the given arguments changed. For example, you could do:
   *
   * ```
   * const newAgent = agent.clone({ instructions: 'New instructions' })
   * ```
   *
   * @param config - A partial configuration to change.
   * @returns A new agent with the given changes.
   */
  clone(config: Partial<AgentConfiguration<TContext>>): Agent<TContext> {
    return new Agent<TContext>({
      ...this,
      ...config,
    });
  }

  /**
   * Transform this agent into a tool, callable by other agents.
   *
   * This is different from handoffs in two ways:
   * 1. In handoffs, the new agent receives the conversation history. In this tool, the new agent
   *    receives generated input.
   * 2. In handoffs, the new agent takes over the conversation. In this tool, the new agent is
   *    called as a tool, and the conversation is continued by the original agent.
   *
   * The nested run shares the caller's run context, so approvals recorded on the outer run apply
   * to it. Approvals the nested run waits for are surfaced on the outer run.
   *
   * @param options - Options for the tool.
   * @returns A tool that runs the agent and returns the output text.
   */
  asTool(options: AgentAsToolOptions<TContext> = {}): FunctionTool<TContext> {
    const {
      toolName,
      toolDescription,
      customOutputExtractor,
      needsApproval,
      runConfig,
      maxTurns,
    } = options;

    return tool<typeof AgentToolInput, TContext>({
      name: toolName ?? this.name,
      description: toolDescription ?? '',
      parameters: AgentToolInput,
      strict: true,
      needsApproval,
      origin: { type: 'agent_as_tool', agentName: this.name },
      execute: async (data, runContext, details) => {
        const runner = new Runner(runConfig ?? {});
        const result = await runner.run(this, data.input, {
          context: runContext,
          maxTurns,
        });

        if (details?.nestedRun) {
          details.nestedRun.agentName = this.name;
          details.nestedRun.finalOutput = result.finalOutput;
          details.nestedRun.interruptions.push(...result.interruptions);
        }

        if (result.interruptions.length > 0) {
          return '';
        }

        if (typeof customOutputExtractor === 'function') {
          return customOutputExtractor(result);
        }
        return toSmartString(result.finalOutput);
      },
    });
  }

  /**
   * Returns the system prompt for the agent.
   *
   * If the agent has a function as its instructions, this function will be called with the
   * runContext and the agent instance.
   */
  async getSystemPrompt(
    runContext: RunContext<TContext>,
  ): Promise<string | undefined> {
    if (typeof this.instructions === 'function') {
      return await this.instructions(runContext, this);
    }

    return this.instructions;
  }

  /**
   * Returns all tools the agent may use in this run. Function tools that are disabled for the
   * current context are left out.
   */
  async getAllTools(runContext: RunContext<TContext>): Promise<Tool<TContext>[]> {
    const enabled = await Promise.all(
      this.tools.map(async (candidate) =>
        candidate.type === 'function'
          ? candidate.isEnabled(runContext, this)
          : true,
      ),
    );
    return this.tools.filter((_candidate, index) => enabled[index]);
  }

  /**
   * Returns the handoffs the agent can use, in declaration order.
   */
  getEnabledHandoffs(): Handoff<TContext>[] {
    return this.handoffs.map((h) => getHandoff(h));
  }

  /**
   * Processes the final output of the agent.
   *
   * @param output - The final textual output of the agent.
   * @returns The parsed output.
   */
  processFinalOutput(output: string): unknown {
    if (this.outputType === 'text') {
      return output;
    }

    const outputType = this.outputType;
    try {
      const parsed: unknown = JSON.parse(output);
      if (isZodObject(outputType)) {
        return outputType.parse(parsed);
      }
      return parsed;
    } catch (error) {
      throw new ModelBehaviorError(formatFinalOutputTypeError(error));
    }
  }

  /**
   * Returns a JSON representation of the agent, which is serializable.
   *
   * @returns A JSON object containing the agent's name.
   */
  toJSON() {
    return {
      name: this.name,
    };
  }
}
