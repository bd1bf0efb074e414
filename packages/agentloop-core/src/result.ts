import type { Agent } from './agent';
import type { InputGuardrailResult, OutputGuardrailResult } from './guardrail';
import type { RunItem, RunToolApprovalItem } from './items';
import type { ModelResponse } from './model';
import type { RunContext } from './runContext';
import type { RunState } from './runState';
import type { AgentInputItem, UnknownContext } from './types';
import type { Usage } from './usage';

/**
 * The result of an agent run. Everything it exposes is read from the run state it wraps.
 */
export class RunResult<TContext = UnknownContext> {
  public readonly state: RunState<TContext>;

  constructor(state: RunState<TContext>) {
    this.state = state;
  }

  /**
   * The history of the agent run. This includes the input items and the new items generated
   * during the agent run.
   *
   * This can be used as inputs for the next agent run.
   */
  get history(): AgentInputItem[] {
    return this.state.history;
  }

  /**
   * The original input items i.e. the items before run() was called. This may be mutated version
   * of the input, if there are handoff input filters that mutate the input.
   */
  get input(): string | AgentInputItem[] {
    return this.state._originalInput;
  }

  /**
   * The run items generated during the agent run. This associates the model data with the
   * agents.
   *
   * For the model data that can be used as inputs for the next agent run, use the `output`
   * property.
   */
  get newItems(): RunItem[] {
    return this.state._generatedItems;
  }

  /**
   * The raw LLM responses generated by the model during the agent run.
   */
  get rawResponses(): ModelResponse[] {
    return this.state._modelResponses;
  }

  /**
   * The last response ID generated by the model during the agent run.
   */
  get lastResponseId(): string | undefined {
    return this.rawResponses.at(-1)?.responseId;
  }

  /**
   * The last agent that was run
   */
  get lastAgent(): Agent<TContext> {
    return this.state._currentAgent;
  }

  /**
   * Guardrail results for the input messages.
   */
  get inputGuardrailResults(): InputGuardrailResult[] {
    return this.state._inputGuardrailResults;
  }

  /**
   * Guardrail results for the final output of the agent.
   */
  get outputGuardrailResults(): OutputGuardrailResult[] {
    return this.state._outputGuardrailResults;
  }

  /**
   * Any interruptions that occurred during the agent run for example for tool approvals.
   */
  get interruptions(): RunToolApprovalItem[] {
    return this.state.getInterruptions();
  }

  /**
   * The run context, carrying the caller's context object, usage and approval decisions.
   */
  get context(): RunContext<TContext> {
    return this.state._context;
  }

  /**
   * Usage accumulated over every model call of the run.
   */
  get usage(): Usage {
    return this.state._context.usage;
  }

  /**
   * The final output of the agent. Structured outputs are parsed according to the last agent's
   * output type. `undefined` if the run was interrupted.
   */
  get finalOutput(): unknown {
    if (this.state._currentStep?.type === 'next_step_final_output') {
      return this.state._currentAgent.processFinalOutput(
        this.state._currentStep.output,
      );
    }
    return undefined;
  }

  /**
   * The model-ready items generated during the run, without the original input.
   */
  get output(): AgentInputItem[] {
    return this.history.slice(
      typeof this.input === 'string' ? 1 : this.input.length,
    );
  }

  /**
   * Returns the run state to continue from, e.g. after approving or rejecting the interruptions.
   */
  toState(): RunState<TContext> {
    return this.state;
  }
}
