import type { AgentRef } from './items';
import type { ModelResponse } from './model';
import type { RunContext } from './runContext';
import type { AgentInputItem, UnknownContext } from './types';

/**
 * The output of a guardrail function.
 */
export type GuardrailFunctionOutput = {
  /**
   * Whether the guardrail tripped. A tripped guardrail stops the run.
   */
  tripwireTriggered: boolean;
  /**
   * Optional information about the checks the guardrail performed.
   */
  outputInfo?: unknown;
};

export type InputGuardrailFunctionArgs<TContext = UnknownContext> = {
  agent: AgentRef;
  input: string | AgentInputItem[];
  context: RunContext<TContext>;
};

export type InputGuardrailFunction<TContext = UnknownContext> = (
  args: InputGuardrailFunctionArgs<TContext>,
) => Promise<GuardrailFunctionOutput> | GuardrailFunctionOutput;

/**
 * A guardrail that checks the input of a run before the first model call.
 */
export type InputGuardrail<TContext = UnknownContext> = {
  name: string;
  execute: InputGuardrailFunction<TContext>;
};

export type InputGuardrailResult = {
  guardrail: { type: 'input'; name: string };
  output: GuardrailFunctionOutput;
};

export type InputGuardrailDefinition<TContext = UnknownContext> =
  InputGuardrail<TContext> & {
    type: 'input';
    run: (
      args: InputGuardrailFunctionArgs<TContext>,
    ) => Promise<InputGuardrailResult>;
  };

export function defineInputGuardrail<TContext = UnknownContext>({
  name,
  execute,
}: InputGuardrail<TContext>): InputGuardrailDefinition<TContext> {
  return {
    type: 'input',
    name,
    execute,
    async run(args) {
      return {
        guardrail: { type: 'input', name },
        output: await execute(args),
      };
    },
  };
}

export type OutputGuardrailFunctionArgs<TContext = UnknownContext> = {
  agent: AgentRef;
  agentOutput: unknown;
  context: RunContext<TContext>;
  details: {
    modelResponse?: ModelResponse;
    output: AgentInputItem[];
  };
};

export type OutputGuardrailFunction<TContext = UnknownContext> = (
  args: OutputGuardrailFunctionArgs<TContext>,
) => Promise<GuardrailFunctionOutput> | GuardrailFunctionOutput;

/**
 * A guardrail that checks the final output of an agent.
 */
export type OutputGuardrail<TContext = UnknownContext> = {
  name: string;
  execute: OutputGuardrailFunction<TContext>;
};

export type OutputGuardrailResult = {
  guardrail: { type: 'output'; name: string };
  agentOutput: unknown;
  output: GuardrailFunctionOutput;
};

export type OutputGuardrailDefinition<TContext = UnknownContext> =
  OutputGuardrail<TContext> & {
    type: 'output';
    run: (
      args: OutputGuardrailFunctionArgs<TContext>,
    ) => Promise<OutputGuardrailResult>;
  };

export function defineOutputGuardrail<TContext = UnknownContext>({
  name,
  execute,
}: OutputGuardrail<TContext>): OutputGuardrailDefinition<TContext> {
  return {
    type: 'output',
    name,
    execute,
    async run(args) {
      return {
        guardrail: { type: 'output', name },
        agentOutput: args.agentOutput,
        output: await execute(args),
      };
    },
  };
}
