import type { z } from 'zod';
import type { Agent } from './agent';
import { ModelBehaviorError, UserError } from './errors';
import type { RunItem } from './items';
import logger from './logger';
import type { RunContext } from './runContext';
import type {
  AgentInputItem,
  JsonObjectSchema,
  UnknownContext,
} from './types';
import {
  getSchemaAndParserFromInputType,
  toFunctionToolName,
} from './utils/tools';

/**
 * Data passed to the handoff input filter.
 */
export type HandoffInputData = {
  /**
   * The input history before `Runner.run()` was called.
   */
  inputHistory: string | AgentInputItem[];

  /**
   * The items generated before the agent turn where the handoff was invoked.
   */
  preHandoffItems: RunItem[];

  /**
   * The new items generated during the current agent turn, including the item that triggered the
   * handoff and the tool output message representing the response from the handoff output.
   */
  newItems: RunItem[];
};

export type HandoffInputFilter = (input: HandoffInputData) => HandoffInputData;

/**
 * Generates the message that will be given as tool output to the model that requested the
 * handoff.
 *
 * @param agent The agent to transfer to
 * @returns The message that will be given as tool output to the model that requested the handoff
 */
export function getTransferMessage(agent: { name: string }) {
  return JSON.stringify({ assistant: agent.name });
}

/**
 * The default name of the tool that represents the handoff.
 *
 * @param agent The agent to transfer to
 * @returns The name of the tool that represents the handoff
 */
function defaultHandoffToolName(agent: { name: string }) {
  return `transfer_to_${toFunctionToolName(agent.name)}`;
}

/**
 * Generates the description of the tool that represents the handoff.
 *
 * @param agent The agent to transfer to
 * @returns The description of the tool that represents the handoff
 */
function defaultHandoffToolDescription(agent: {
  name: string;
  handoffDescription?: string;
}) {
  return `Handoff to the ${agent.name} agent to handle the request. ${
    agent.handoffDescription ?? ''
  }`.trim();
}

const EMPTY_HANDOFF_SCHEMA: JsonObjectSchema = {
  type: 'object',
  properties: {},
  required: [],
  additionalProperties: false,
};

/**
 * A handoff is when an agent delegates a task to another agent.
 *
 * For example, in a customer support scenario you might have a "triage agent" that determines
 * which agent should handle the user's request, and sub-agents that specialize in different areas
 * like billing, account management, etc.
 */
export class Handoff<TContext = UnknownContext> {
  /**
   * The name of the tool that represents the handoff.
   */
  public toolName: string;

  /**
   * The description of the tool that represents the handoff.
   */
  public toolDescription: string;

  /**
   * The JSON schema for the handoff input. Can be empty if the handoff does not take an input
   */
  public inputJsonSchema: JsonObjectSchema = EMPTY_HANDOFF_SCHEMA;

  /**
   * Whether the input JSON schema is in strict mode. We **strongly** recommend setting this to
   * true, as it increases the likelihood of correct JSON input.
   */
  public strictJsonSchema: boolean = true;

  /**
   * The function that invokes the handoff. The parameters passed are:
   * 1. The handoff run context
   * 2. The arguments from the LLM, as a JSON string. Empty string if inputJsonSchema is empty.
   *
   * Must return an agent
   */
  public onInvokeHandoff: (
    context: RunContext<TContext>,
    args: string,
  ) => Promise<Agent<TContext>> | Agent<TContext>;

  /**
   * The name of the agent that is being handed off to.
   */
  public agentName: string;

  /**
   * A function that filters the inputs that are passed to the next agent. By default, the new
   * agent sees the entire conversation history.
   */
  public inputFilter?: HandoffInputFilter;

  /**
   * The agent that is being handed off to.
   */
  public agent: Agent<TContext>;

  constructor(
    agent: Agent<TContext>,
    onInvokeHandoff: (
      context: RunContext<TContext>,
      args: string,
    ) => Promise<Agent<TContext>> | Agent<TContext>,
  ) {
    this.agentName = agent.name;
    this.onInvokeHandoff = onInvokeHandoff;
    this.toolName = defaultHandoffToolName(agent);
    this.toolDescription = defaultHandoffToolDescription(agent);
    this.agent = agent;
  }
}

/**
 * Configuration for a handoff.
 */
export type HandoffConfig<
  TContext = UnknownContext,
  TInput extends z.AnyZodObject = z.AnyZodObject,
> = {
  /**
   * Optional override for the name of the tool that represents the handoff.
   */
  toolNameOverride?: string;

  /**
   * Optional override for the description of the tool that represents the handoff.
   */
  toolDescriptionOverride?: string;

  /**
   * A function that filters the inputs that are passed to the next agent.
   */
  inputFilter?: HandoffInputFilter;
} & (
  | {
      inputType?: undefined;
      /**
       * A function that runs when the handoff is invoked
       */
      onHandoff?: (context: RunContext<TContext>) => Promise<void> | void;
    }
  | {
      /**
       * The type of the input to the handoff
       */
      inputType: TInput;
      /**
       * A function that runs when the handoff is invoked, with the validated input
       */
      onHandoff: (
        context: RunContext<TContext>,
        input: z.infer<TInput>,
      ) => Promise<void> | void;
    }
);

/**
 * Creates a handoff from an agent. Handoffs are automatically created when you pass an agent
 * into the `handoffs` option of the `Agent` constructor. Alternatively, you can use this function
 * to create a handoff manually, giving you more control over configuration.
 *
 * @param agent - The agent to handoff to
 * @param config - Configuration for the handoff
 * @returns A new handoff object
 */
export function handoff<
  TContext = UnknownContext,
  TInput extends z.AnyZodObject = z.AnyZodObject,
>(
  agent: Agent<TContext>,
  config: HandoffConfig<TContext, TInput> = {},
): Handoff<TContext> {
  let parseInput: ((input: string) => z.infer<TInput>) | undefined;
  let inputJsonSchema: JsonObjectSchema | undefined;

  const inputType = config.inputType;
  if (inputType) {
    inputJsonSchema = getSchemaAndParserFromInputType(inputType).schema;
    parseInput = (input: string) => inputType.parse(JSON.parse(input));
  }

  async function onInvokeHandoff(
    context: RunContext<TContext>,
    inputJsonString?: string,
  ): Promise<Agent<TContext>> {
    if (config.inputType) {
      if (!parseInput) {
        throw new UserError('Handoff input parser is not configured');
      }
      if (!inputJsonString) {
        throw new ModelBehaviorError(
          `Handoff function expected non empty input but got: ${inputJsonString}`,
        );
      }
      let parsed: z.infer<TInput>;
      try {
        parsed = parseInput(inputJsonString);
      } catch (error) {
        if (!logger.dontLogModelData) {
          logger.debug(`Invalid JSON when parsing: ${inputJsonString}`);
        }
        throw new ModelBehaviorError(
          `Invalid JSON provided for handoff: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
      await config.onHandoff(context, parsed);
    } else {
      await config.onHandoff?.(context);
    }

    return agent;
  }

  const handoffObject = new Handoff<TContext>(agent, onInvokeHandoff);
  if (inputJsonSchema) {
    handoffObject.inputJsonSchema = inputJsonSchema;
  }

  if (config.toolNameOverride) {
    handoffObject.toolName = config.toolNameOverride;
  }

  if (config.toolDescriptionOverride) {
    handoffObject.toolDescription = config.toolDescriptionOverride;
  }

  if (config.inputFilter) {
    handoffObject.inputFilter = config.inputFilter;
  }

  return handoffObject;
}

/**
 * Returns a handoff for the given agent. If the agent is already wrapped into a handoff,
 * it will be returned as is. Otherwise, a new handoff instance will be created.
 *
 * @template TContext The context of the handoff
 */
export function getHandoff<TContext>(
  agent: Agent<TContext> | Handoff<TContext>,
): Handoff<TContext> {
  if (agent instanceof Handoff) {
    return agent;
  }

  return handoff(agent);
}
