import type {
  ToolGuardrailBehavior,
  ToolGuardrailFunctionOutput,
  ToolInputGuardrailDefinition,
  ToolInputGuardrailResult,
  ToolOutputGuardrailDefinition,
  ToolOutputGuardrailResult,
} from '../toolGuardrail';
import type { AgentRef } from '../items';
import type { RunContext } from '../runContext';
import type * as protocol from '../types/protocol';
import {
  ToolInputGuardrailTripwireTriggered,
  ToolOutputGuardrailTripwireTriggered,
} from '../errors';
import logger from '../logger';

function normalizeBehavior(
  output: ToolGuardrailFunctionOutput,
): ToolGuardrailBehavior {
  return output.behavior ?? { type: 'allow' };
}

/**
 * A guardrail that fails to evaluate blocks the call it was checking. The error text becomes the
 * model-visible output.
 */
function failedGuardrailBehavior(
  name: string,
  error: unknown,
): ToolGuardrailBehavior {
  const details = error instanceof Error ? error.message : String(error);
  logger.warn(`Tool guardrail ${name} failed: ${details}`);
  return {
    type: 'rejectContent',
    message: `Tool guardrail "${name}" failed to evaluate: ${details}`,
  };
}

export async function runToolInputGuardrails<TContext>({
  guardrails,
  context,
  agent,
  toolCall,
  onResult,
}: {
  guardrails?: ToolInputGuardrailDefinition<TContext>[];
  context: RunContext<TContext>;
  agent: AgentRef;
  toolCall: protocol.FunctionCallItem;
  onResult?: (result: ToolInputGuardrailResult) => void;
}): Promise<{ type: 'allow' } | { type: 'reject'; message: string }> {
  const list = guardrails ?? [];
  for (const guardrail of list) {
    let output: ToolGuardrailFunctionOutput;
    try {
      output = await guardrail.run({
        context,
        agent,
        toolCall,
      });
    } catch (error) {
      output = { behavior: failedGuardrailBehavior(guardrail.name, error) };
    }
    const behavior = normalizeBehavior(output);
    const result: ToolInputGuardrailResult = {
      guardrail: { type: 'tool_input', name: guardrail.name },
      output: { ...output, behavior },
    };
    onResult?.(result);
    if (behavior.type === 'rejectContent') {
      return { type: 'reject', message: behavior.message };
    }
    if (behavior.type === 'throwException') {
      throw new ToolInputGuardrailTripwireTriggered(
        `Tool input guardrail triggered: ${guardrail.name}`,
        result,
      );
    }
  }
  return { type: 'allow' };
}

export async function runToolOutputGuardrails<TContext>({
  guardrails,
  context,
  agent,
  toolCall,
  toolOutput,
  onResult,
}: {
  guardrails?: ToolOutputGuardrailDefinition<TContext>[];
  context: RunContext<TContext>;
  agent: AgentRef;
  toolCall: protocol.FunctionCallItem;
  toolOutput: unknown;
  onResult?: (result: ToolOutputGuardrailResult) => void;
}): Promise<unknown> {
  const list = guardrails ?? [];
  let finalOutput = toolOutput;
  for (const guardrail of list) {
    let output: ToolGuardrailFunctionOutput;
    try {
      output = await guardrail.run({
        context,
        agent,
        toolCall,
        output: toolOutput,
      });
    } catch (error) {
      output = { behavior: failedGuardrailBehavior(guardrail.name, error) };
    }
    const behavior = normalizeBehavior(output);
    const result: ToolOutputGuardrailResult = {
      guardrail: { type: 'tool_output', name: guardrail.name },
      output: { ...output, behavior },
    };
    onResult?.(result);
    if (behavior.type === 'rejectContent') {
      finalOutput = behavior.message;
      break;
    }
    if (behavior.type === 'throwException') {
      throw new ToolOutputGuardrailTripwireTriggered(
        `Tool output guardrail triggered: ${guardrail.name}`,
        result,
      );
    }
  }
  return finalOutput;
}
