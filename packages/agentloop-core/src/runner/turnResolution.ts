import type { Agent } from '../agent';
import {
  RunMessageOutputItem,
  RunToolApprovalItem,
  type RunItem,
} from '../items';
import type { ModelResponse } from '../model';
import type { Runner } from '../run';
import type { RunState } from '../runState';
import type { FunctionToolResult } from '../tool';
import type { AgentInputItem } from '../types';
import { SingleStepResult } from './steps';
import {
  checkForFinalOutputFromTools,
  collectInterruptions,
  executeActionCalls,
  executeFunctionToolCalls,
  executeHandoffCalls,
  handleProtocolApprovals,
} from './toolExecution';
import type { ProcessedResponse } from './types';

function getLastTextFromMessages(items: RunItem[]): string | undefined {
  const messages = items.filter(
    (item): item is RunMessageOutputItem => item.type === 'message_output_item',
  );
  const lastMessage = messages.at(-1);
  if (!lastMessage) {
    return undefined;
  }
  const textParts = lastMessage.rawItem.content.filter(
    (part) => part.type === 'output_text',
  );
  const lastText = textParts.at(-1);
  return lastText?.type === 'output_text' ? lastText.text : undefined;
}

function approvalIdentity(item: RunToolApprovalItem): string {
  return `${item.rawItem.type}:${item.callId}`;
}

/**
 * Appends items while skipping instances already present and approval requests already waiting
 * for the same call.
 */
function createAppender(existingItems: RunItem[], target: RunItem[]) {
  const seenItems = new Set<RunItem>(existingItems);
  const seenApprovals = new Set<string>(
    existingItems
      .filter(
        (item): item is RunToolApprovalItem =>
          item.type === 'tool_approval_item',
      )
      .map(approvalIdentity),
  );
  return (item: RunItem) => {
    if (seenItems.has(item)) {
      return;
    }
    if (item instanceof RunToolApprovalItem) {
      const identity = approvalIdentity(item);
      if (seenApprovals.has(identity)) {
        return;
      }
      seenApprovals.add(identity);
    }
    seenItems.add(item);
    target.push(item);
  };
}

/**
 * Tool outputs are recorded once the call finished. A nested agent run that paused for approval
 * has not finished, so its placeholder output is left out and the call runs again on resume.
 */
function completedFunctionItems<TContext>(
  functionResults: FunctionToolResult<TContext>[],
): RunItem[] {
  return functionResults
    .filter(
      (result) =>
        result.type === 'function_approval' ||
        (result.interruptions?.length ?? 0) === 0,
    )
    .map((result) => result.runItem);
}

function collectCompletedCallIds(items: RunItem[]): Set<string> {
  const completed = new Set<string>();
  for (const item of items) {
    if (
      item.type !== 'tool_call_output_item' &&
      item.type !== 'handoff_output_item'
    ) {
      continue;
    }
    completed.add(item.rawItem.callId);
  }
  return completed;
}

function collectAnsweredApprovalRequests(items: RunItem[]): Set<string> {
  const answered = new Set<string>();
  for (const item of items) {
    if (item.type === 'protocol_approval_response_item') {
      answered.add(item.rawItem.approvalRequestId);
    }
  }
  return answered;
}

type TurnFinalizationParams<TContext> = {
  agent: Agent<TContext>;
  state: RunState<TContext>;
  functionResults: FunctionToolResult<TContext>[];
  interruptions: RunToolApprovalItem[];
  originalInput: string | AgentInputItem[];
  newResponse: ModelResponse;
  preStepItems: RunItem[];
  newItems: RunItem[];
};

// Pending approvals pause the turn before the tool use behavior is consulted.
async function maybeCompleteTurnFromToolResults<TContext>({
  agent,
  state,
  functionResults,
  interruptions,
  originalInput,
  newResponse,
  preStepItems,
  newItems,
}: TurnFinalizationParams<TContext>): Promise<SingleStepResult<TContext> | null> {
  if (interruptions.length > 0) {
    return new SingleStepResult(
      originalInput,
      newResponse,
      preStepItems,
      newItems,
      { type: 'next_step_interruption', data: { interruptions } },
    );
  }

  const toolOutcome = await checkForFinalOutputFromTools(
    agent,
    functionResults,
    state,
  );

  if (toolOutcome.isFinalOutput) {
    return new SingleStepResult(
      originalInput,
      newResponse,
      preStepItems,
      newItems,
      { type: 'next_step_final_output', output: toolOutcome.finalOutput },
    );
  }

  return null;
}

/**
 * @internal
 * Continues a turn that was previously interrupted waiting for tool approval. Executes the calls
 * that have not produced an output yet and returns the resulting step transition. No model call
 * is made.
 */
export async function resolveInterruptedTurn<TContext>(
  agent: Agent<TContext>,
  originalInput: string | AgentInputItem[],
  originalPreStepItems: RunItem[],
  newResponse: ModelResponse,
  processedResponse: ProcessedResponse<TContext>,
  runner: Runner,
  state: RunState<TContext>,
): Promise<SingleStepResult<TContext>> {
  const completedCallIds = collectCompletedCallIds(originalPreStepItems);
  const answeredRequests = collectAnsweredApprovalRequests(
    originalPreStepItems,
  );

  const functionRuns = processedResponse.functions.filter(
    (run) => !completedCallIds.has(run.toolCall.callId),
  );
  const actionRuns = processedResponse.actions.filter(
    (run) => !completedCallIds.has(run.toolCall.callId),
  );
  const protocolRequests = processedResponse.protocolApprovalRequests.filter(
    (request) => !answeredRequests.has(request.requestItem.callId),
  );

  const [functionResults, actionItems, protocolOutcome] = await Promise.all([
    executeFunctionToolCalls(agent, functionRuns, runner, state),
    executeActionCalls(agent, actionRuns, runner, state),
    handleProtocolApprovals(protocolRequests, agent, state),
  ]);

  // Approval placeholders are re-added below for the calls that are still waiting.
  const preStepItems = originalPreStepItems.filter(
    (item) => item.type !== 'tool_approval_item',
  );
  const newItems: RunItem[] = [];
  const appendIfNew = createAppender(preStepItems, newItems);

  for (const item of completedFunctionItems(functionResults)) {
    appendIfNew(item);
  }
  for (const item of actionItems) {
    appendIfNew(item);
  }
  for (const item of protocolOutcome.items) {
    appendIfNew(item);
  }
  for (const item of protocolOutcome.pending) {
    appendIfNew(item);
  }

  const interruptions = [
    ...collectInterruptions(functionResults, actionItems),
    ...protocolOutcome.pending,
  ];

  const pendingHandoffs = processedResponse.handoffs.filter(
    (run) => !completedCallIds.has(run.toolCall.callId),
  );
  if (interruptions.length === 0 && pendingHandoffs.length > 0) {
    return await executeHandoffCalls(
      agent,
      originalInput,
      preStepItems,
      newItems,
      newResponse,
      pendingHandoffs,
      runner,
      state._context,
    );
  }

  const completedStep = await maybeCompleteTurnFromToolResults({
    agent,
    state,
    functionResults,
    interruptions,
    originalInput,
    newResponse,
    preStepItems,
    newItems,
  });
  if (completedStep) {
    return completedStep;
  }

  return new SingleStepResult(
    originalInput,
    newResponse,
    preStepItems,
    newItems,
    { type: 'next_step_run_again' },
  );
}

/**
 * @internal
 * Executes every follow-up action the model requested, appends their outputs to the run history
 * and determines the next step for the agent loop.
 */
export async function resolveTurnAfterModelResponse<TContext>(
  agent: Agent<TContext>,
  originalInput: string | AgentInputItem[],
  preStepItems: RunItem[],
  newResponse: ModelResponse,
  processedResponse: ProcessedResponse<TContext>,
  runner: Runner,
  state: RunState<TContext>,
): Promise<SingleStepResult<TContext>> {
  const newItems: RunItem[] = [];
  const appendIfNew = createAppender(preStepItems, newItems);

  for (const item of processedResponse.newItems) {
    appendIfNew(item);
  }

  const [functionResults, actionItems, protocolOutcome] = await Promise.all([
    executeFunctionToolCalls(
      agent,
      processedResponse.functions,
      runner,
      state,
    ),
    executeActionCalls(agent, processedResponse.actions, runner, state),
    handleProtocolApprovals(
      processedResponse.protocolApprovalRequests,
      agent,
      state,
    ),
  ]);

  for (const item of completedFunctionItems(functionResults)) {
    appendIfNew(item);
  }
  for (const item of actionItems) {
    appendIfNew(item);
  }
  for (const item of protocolOutcome.items) {
    appendIfNew(item);
  }

  const interruptions = [
    ...collectInterruptions(functionResults, actionItems),
    ...protocolOutcome.pending,
  ];

  // A handoff waits until every approval requested in the same turn is decided.
  if (interruptions.length === 0 && processedResponse.handoffs.length > 0) {
    return await executeHandoffCalls(
      agent,
      originalInput,
      preStepItems,
      newItems,
      newResponse,
      processedResponse.handoffs,
      runner,
      state._context,
    );
  }

  const completedStep = await maybeCompleteTurnFromToolResults({
    agent,
    state,
    functionResults,
    interruptions,
    originalInput,
    newResponse,
    preStepItems,
    newItems,
  });
  if (completedStep) {
    return completedStep;
  }

  // Any tool activity means the model has to see the results before it can answer.
  if (processedResponse.hasToolsOrApprovalsToRun()) {
    return new SingleStepResult(
      originalInput,
      newResponse,
      preStepItems,
      newItems,
      { type: 'next_step_run_again' },
    );
  }

  const potentialFinalOutput = getLastTextFromMessages(newItems);
  if (potentialFinalOutput === undefined) {
    return new SingleStepResult(
      originalInput,
      newResponse,
      preStepItems,
      newItems,
      { type: 'next_step_run_again' },
    );
  }

  // Throws when structured output does not match the agent's output type.
  agent.processFinalOutput(potentialFinalOutput);

  return new SingleStepResult(
    originalInput,
    newResponse,
    preStepItems,
    newItems,
    { type: 'next_step_final_output', output: potentialFinalOutput },
  );
}
