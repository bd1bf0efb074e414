import type { Agent } from '../agent';
import type { RunItem, RunToolApprovalItem } from '../items';
import type { ModelResponse } from '../model';
import type { AgentInputItem, UnknownContext } from '../types';

export type NextStepHandoff<TContext = UnknownContext> = {
  type: 'next_step_handoff';
  newAgent: Agent<TContext>;
};

export type NextStepFinalOutput = {
  type: 'next_step_final_output';
  output: string;
};

export type NextStepRunAgain = {
  type: 'next_step_run_again';
};

export type NextStepInterruption = {
  type: 'next_step_interruption';
  data: { interruptions: RunToolApprovalItem[] };
};

export type NextStep<TContext = UnknownContext> =
  | NextStepHandoff<TContext>
  | NextStepFinalOutput
  | NextStepRunAgain
  | NextStepInterruption;

export class SingleStepResult<TContext = UnknownContext> {
  /**
   * The items this step produced, before a handoff input filter reshaped them.
   */
  public readonly producedItems: RunItem[];

  constructor(
    public originalInput: string | AgentInputItem[],
    public modelResponse: ModelResponse,
    public preStepItems: RunItem[],
    public newStepItems: RunItem[],
    public nextStep: NextStep<TContext>,
    producedItems?: RunItem[],
  ) {
    this.producedItems = producedItems ?? newStepItems;
  }

  get generatedItems(): RunItem[] {
    return this.preStepItems.concat(this.newStepItems);
  }
}
