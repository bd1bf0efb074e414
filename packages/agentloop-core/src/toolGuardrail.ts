import type { AgentRef } from './items';
import type { RunContext } from './runContext';
import type { UnknownContext } from './types';
import type * as protocol from './types/protocol';

/**
 * What happens to a tool call after a guardrail looked at it.
 *
 * - `allow`: the call proceeds unchanged.
 * - `rejectContent`: the call is blocked and `message` is recorded as the tool output the model
 *   sees.
 * - `throwException`: the whole run stops with a tripwire error.
 */
export type ToolGuardrailBehavior =
  | { type: 'allow' }
  | { type: 'rejectContent'; message: string }
  | { type: 'throwException' };

export type ToolGuardrailFunctionOutput = {
  /**
   * Optional information about the checks the guardrail performed.
   */
  outputInfo?: unknown;
  behavior?: ToolGuardrailBehavior;
};

export type ToolInputGuardrailFunctionArgs<TContext = UnknownContext> = {
  context: RunContext<TContext>;
  agent: AgentRef;
  toolCall: protocol.FunctionCallItem;
};

export type ToolOutputGuardrailFunctionArgs<TContext = UnknownContext> =
  ToolInputGuardrailFunctionArgs<TContext> & {
    output: unknown;
  };

export type ToolInputGuardrailFunction<TContext = UnknownContext> = (
  args: ToolInputGuardrailFunctionArgs<TContext>,
) => Promise<ToolGuardrailFunctionOutput> | ToolGuardrailFunctionOutput;

export type ToolOutputGuardrailFunction<TContext = UnknownContext> = (
  args: ToolOutputGuardrailFunctionArgs<TContext>,
) => Promise<ToolGuardrailFunctionOutput> | ToolGuardrailFunctionOutput;

export type ToolInputGuardrailDefinition<TContext = UnknownContext> = {
  type: 'tool_input';
  name: string;
  run: ToolInputGuardrailFunction<TContext>;
};

export type ToolOutputGuardrailDefinition<TContext = UnknownContext> = {
  type: 'tool_output';
  name: string;
  run: ToolOutputGuardrailFunction<TContext>;
};

export type ToolInputGuardrailResult = {
  guardrail: { type: 'tool_input'; name: string };
  output: ToolGuardrailFunctionOutput & { behavior: ToolGuardrailBehavior };
};

export type ToolOutputGuardrailResult = {
  guardrail: { type: 'tool_output'; name: string };
  output: ToolGuardrailFunctionOutput & { behavior: ToolGuardrailBehavior };
};

/**
 * Shorthands for building guardrail results.
 */
export const ToolGuardrailFunctionOutputFactory = {
  allow(outputInfo?: unknown): ToolGuardrailFunctionOutput {
    return { outputInfo, behavior: { type: 'allow' } };
  },
  rejectContent(message: string, outputInfo?: unknown): ToolGuardrailFunctionOutput {
    return { outputInfo, behavior: { type: 'rejectContent', message } };
  },
  throwException(outputInfo?: unknown): ToolGuardrailFunctionOutput {
    return { outputInfo, behavior: { type: 'throwException' } };
  },
};

export function defineToolInputGuardrail<TContext = UnknownContext>(args: {
  name: string;
  run: ToolInputGuardrailFunction<TContext>;
}): ToolInputGuardrailDefinition<TContext> {
  return { type: 'tool_input', ...args };
}

export function defineToolOutputGuardrail<TContext = UnknownContext>(args: {
  name: string;
  run: ToolOutputGuardrailFunction<TContext>;
}): ToolOutputGuardrailDefinition<TContext> {
  return { type: 'tool_output', ...args };
}

export function resolveToolInputGuardrails<TContext = UnknownContext>(
  guardrails?: (
    | ToolInputGuardrailDefinition<TContext>
    | { name: string; run: ToolInputGuardrailFunction<TContext> }
  )[],
): ToolInputGuardrailDefinition<TContext>[] {
  return (guardrails ?? []).map((guardrail) =>
    defineToolInputGuardrail<TContext>({
      name: guardrail.name,
      run: guardrail.run,
    }),
  );
}

export function resolveToolOutputGuardrails<TContext = UnknownContext>(
  guardrails?: (
    | ToolOutputGuardrailDefinition<TContext>
    | { name: string; run: ToolOutputGuardrailFunction<TContext> }
  )[],
): ToolOutputGuardrailDefinition<TContext>[] {
  return (guardrails ?? []).map((guardrail) =>
    defineToolOutputGuardrail<TContext>({
      name: guardrail.name,
      run: guardrail.run,
    }),
  );
}
