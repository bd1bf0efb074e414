import {
  GuardrailExecutionError,
  InputGuardrailTripwireTriggered,
  OutputGuardrailTripwireTriggered,
} from '../errors';
import {
  defineInputGuardrail,
  defineOutputGuardrail,
  type GuardrailFunctionOutput,
  type InputGuardrail,
  type InputGuardrailResult,
  type OutputGuardrail,
  type OutputGuardrailFunctionArgs,
  type OutputGuardrailResult,
} from '../guardrail';
import logger from '../logger';
import type { RunState } from '../runState';
import { getTurnInput } from './items';

type GuardrailResultLike = {
  guardrail: { name: string };
  output: GuardrailFunctionOutput;
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function runGuardrailsWithTripwire<
  TContext,
  TArgs,
  TResult extends GuardrailResultLike,
>(options: {
  guardrails: { name: string; run: (args: TArgs) => Promise<TResult> }[];
  guardrailArgs: TArgs;
  resultsTarget: TResult[];
  onTripwire: (result: TResult) => never;
  isTripwireError: (error: unknown) => boolean;
  onError: (error: Error) => never;
  state: RunState<TContext>;
}): Promise<TResult[]> {
  const {
    guardrails,
    guardrailArgs,
    resultsTarget,
    onTripwire,
    isTripwireError,
    onError,
  } = options;

  try {
    const results = await Promise.all(
      guardrails.map(async (guardrail) => {
        const result = await guardrail.run(guardrailArgs);
        logger.debug(
          `Guardrail ${guardrail.name} finished (tripwire: ${result.output.tripwireTriggered})`,
        );
        return result;
      }),
    );
    resultsTarget.push(...results);
    for (const result of results) {
      if (result.output.tripwireTriggered) {
        onTripwire(result);
      }
    }
    return results;
  } catch (error) {
    if (isTripwireError(error)) {
      throw error;
    }
    return onError(toError(error));
  }
}

/**
 * @internal
 * Runs the runner's and the current agent's input guardrails against the original input. A
 * guardrail that fails to evaluate rolls the turn back so the run can be retried.
 */
export async function runInputGuardrails<TContext>(
  state: RunState<TContext>,
  runnerGuardrails: InputGuardrail<TContext>[],
): Promise<InputGuardrailResult[]> {
  const guardrails = runnerGuardrails
    .map((guardrail) => defineInputGuardrail(guardrail))
    .concat(state._currentAgent.inputGuardrails);
  if (guardrails.length === 0) {
    return [];
  }
  return await runGuardrailsWithTripwire({
    state,
    guardrails,
    guardrailArgs: {
      agent: state._currentAgent,
      input: state._originalInput,
      context: state._context,
    },
    resultsTarget: state._inputGuardrailResults,
    onTripwire: (result: InputGuardrailResult) => {
      throw new InputGuardrailTripwireTriggered(
        `Input guardrail triggered: ${JSON.stringify(result.output.outputInfo)}`,
        result,
        state,
      );
    },
    isTripwireError: (error) =>
      error instanceof InputGuardrailTripwireTriggered,
    onError: (error) => {
      state._currentTurn--;
      throw new GuardrailExecutionError(
        `Input guardrail failed to complete: ${error.message}`,
        error,
        state,
      );
    },
  });
}

/**
 * @internal
 * Runs the runner's and the current agent's output guardrails against the final output.
 */
export async function runOutputGuardrails<TContext>(
  state: RunState<TContext>,
  runnerGuardrails: OutputGuardrail<TContext>[],
  output: string,
): Promise<OutputGuardrailResult[]> {
  const guardrails = runnerGuardrails
    .map((guardrail) => defineOutputGuardrail(guardrail))
    .concat(state._currentAgent.outputGuardrails);
  if (guardrails.length === 0) {
    return [];
  }
  const guardrailArgs: OutputGuardrailFunctionArgs<TContext> = {
    agent: state._currentAgent,
    agentOutput: state._currentAgent.processFinalOutput(output),
    context: state._context,
    details: {
      modelResponse: state._lastTurnResponse,
      output: getTurnInput([], state._generatedItems),
    },
  };
  return await runGuardrailsWithTripwire({
    state,
    guardrails,
    guardrailArgs,
    resultsTarget: state._outputGuardrailResults,
    onTripwire: (result: OutputGuardrailResult) => {
      throw new OutputGuardrailTripwireTriggered(
        `Output guardrail triggered: ${JSON.stringify(result.output.outputInfo)}`,
        result,
        state,
      );
    },
    isTripwireError: (error) =>
      error instanceof OutputGuardrailTripwireTriggered,
    onError: (error) => {
      throw new GuardrailExecutionError(
        `Output guardrail failed to complete: ${error.message}`,
        error,
        state,
      );
    },
  });
}
