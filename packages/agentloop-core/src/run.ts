import type { Agent } from './agent';
import { runDefaults } from './config';
import {
  MaxTurnsExceededError,
  ModelBehaviorError,
  UserError,
  isConversationLockedError,
} from './errors';
import type { Handoff, HandoffInputFilter } from './handoff';
import type { InputGuardrail, OutputGuardrail } from './guardrail';
import { RunHooks } from './lifecycle';
import logger from './logger';
import type { Session, SessionInputCallback } from './memory/session';
import type {
  Model,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelSettings,
  ResponseStreamEvent,
} from './model';
import { RunResult } from './result';
import { RunContext } from './runContext';
import { RunState } from './runState';
import { ServerConversationTracker } from './runner/conversationTracker';
import { runInputGuardrails, runOutputGuardrails } from './runner/guardrails';
import { getTurnInput } from './runner/items';
import { processModelResponse } from './runner/modelOutputs';
import {
  maybeResetToolChoice,
  mergeModelSettings,
  selectModel,
} from './runner/modelSettings';
import {
  prepareInputItemsWithSession,
  saveInputToSession,
  saveRunItemsToSession,
} from './runner/sessionPersistence';
import type { SingleStepResult } from './runner/steps';
import {
  resolveInterruptedTurn,
  resolveTurnAfterModelResponse,
} from './runner/turnResolution';
import type { Tool } from './tool';
import type { AgentInputItem, UnknownContext } from './types';
import { Usage } from './usage';
import { serializeHandoff, serializeTool } from './utils/serialize';
import { convertAgentOutputTypeToSerializable } from './utils/tools';

/**
 * The instruction sent with a forced final turn when the caller does not supply one.
 */
export const DEFAULT_MAX_TURNS_RESUME_INSTRUCTION =
  'You reached the maximum number of turns.\n' +
  'Return a final answer to the query using ONLY the information already gathered in the conversation so far.';

/**
 * Configures settings for the entire agent run.
 */
export type RunConfig = {
  /**
   * The model to use when an agent does not set one. A string is resolved through the
   * `modelProvider`.
   */
  model?: string | Model;

  /**
   * The model provider to use when looking up string model names.
   */
  modelProvider?: ModelProvider;

  /**
   * Configure global model settings. Any non-null values will override the agent-specific model
   * settings.
   */
  modelSettings?: ModelSettings;

  /**
   * A global input filter to apply to all handoffs. If `Handoff.inputFilter` is set, then that
   * will take precedence. The input filter allows you to edit the inputs that are sent to the new
   * agent.
   */
  handoffInputFilter?: HandoffInputFilter;

  /**
   * A list of input guardrails to run on the initial run input.
   */
  inputGuardrails?: InputGuardrail[];

  /**
   * A list of output guardrails to run on the final output of the run.
   */
  outputGuardrails?: OutputGuardrail[];

  /**
   * Customizes how session history is combined with the current turn's input.
   * When omitted, history items are appended before the new input.
   */
  sessionInputCallback?: SessionInputCallback;

  /**
   * The default turn budget of runs started by this runner.
   */
  maxTurns?: number;
};

/**
 * Options for a single call to `Runner.run()`.
 */
export type RunOptions<TContext = UnknownContext> = {
  context?: TContext | RunContext<TContext>;
  maxTurns?: number;
  signal?: AbortSignal;
  previousResponseId?: string;
  conversationId?: string;
  session?: Session;
  sessionInputCallback?: SessionInputCallback;
  /**
   * Stream model responses where the model supports it. Text deltas are emitted as
   * `model_delta` events on the runner.
   */
  stream?: boolean;
};

// Per-run collaborators shared by the turn loop and the forced final turn.
type RunLoopContext = {
  tracker?: ServerConversationTracker;
  session?: Session;
  signal?: AbortSignal;
  stream: boolean;
  persistInput: () => Promise<void>;
};

type PreparedModelCall<TContext> = {
  model: Model;
  modelSettings: ModelSettings;
  systemInstructions?: string;
  tools: Tool<TContext>[];
  handoffs: Handoff<TContext>[];
};

/**
 * Executes an agent workflow with the shared default `Runner` instance.
 *
 * @param agent - The entry agent to invoke.
 * @param input - A string utterance, structured input items, or a resumed `RunState`.
 * @param options - Context, session handling and turn limits of the run.
 */
export async function run<TContext = UnknownContext>(
  agent: Agent<TContext>,
  input: string | AgentInputItem[] | RunState<TContext>,
  options?: RunOptions<TContext>,
): Promise<RunResult<TContext>> {
  return await getDefaultRunner().run(agent, input, options);
}

/**
 * Orchestrates agent execution, including guardrails, tool calls and session persistence. Reuse a
 * `Runner` instance when you want consistent configuration across multiple runs.
 */
export class Runner extends RunHooks<UnknownContext> {
  public readonly config: RunConfig;

  /**
   * Creates a runner with optional defaults that apply to every subsequent run invocation.
   *
   * @param config - Overrides for models, guardrails or session behavior.
   */
  constructor(config: Partial<RunConfig> = {}) {
    super();
    this.config = {
      model: config.model,
      modelProvider: config.modelProvider,
      modelSettings: config.modelSettings,
      handoffInputFilter: config.handoffInputFilter,
      inputGuardrails: config.inputGuardrails,
      outputGuardrails: config.outputGuardrails,
      sessionInputCallback: config.sessionInputCallback,
      maxTurns: config.maxTurns,
    };
  }

  /**
   * Run a workflow starting at the given agent. The agent will run in a loop until a final
   * output is generated. The loop runs like so:
   * 1. The agent is invoked with the given input.
   * 2. If there is a final output (i.e. the agent produces something of type
   *    `agent.outputType`, the loop terminates.
   * 3. If there's a handoff, we run the loop again, with the new agent.
   * 4. Else, we run tool calls (if any), and re-run the loop.
   *
   * In three cases, the run stops early:
   * 1. If the maxTurns is exceeded, a MaxTurnsExceededError is raised. Its `resume()` forces one
   *    more model call without tools.
   * 2. If a guardrail tripwire is triggered, a GuardrailTripwireTriggered error is raised.
   * 3. If a tool call needs approval, the run returns with `interruptions`. Approve or reject them
   *    on `result.state` and pass the state back to `run()`.
   *
   * Note that only the first agent's input guardrails are run.
   *
   * @param agent - The starting agent to run.
   * @param input - The initial input to the agent, or the state of an interrupted run.
   * @param options - Options for the run, including the execution context and the maximum number
   * of turns.
   * @returns The result of the run.
   */
  async run<TContext = UnknownContext>(
    agent: Agent<TContext>,
    input: string | AgentInputItem[] | RunState<TContext>,
    options: RunOptions<TContext> = {},
  ): Promise<RunResult<TContext>> {
    const isResumedState = input instanceof RunState;
    const conversationId =
      options.conversationId ??
      (isResumedState ? input._conversationId : undefined);
    const previousResponseId =
      options.previousResponseId ??
      (isResumedState ? input._previousResponseId : undefined);
    const serverManagesConversation =
      Boolean(conversationId) || Boolean(previousResponseId);
    const session = options.session;
    const sessionInputCallback =
      options.sessionInputCallback ?? this.config.sessionInputCallback;

    let state: RunState<TContext>;
    let pendingSessionInput: AgentInputItem[] | undefined;
    if (isResumedState) {
      state = input;
    } else {
      const prepared = await prepareInputItemsWithSession(
        input,
        session,
        sessionInputCallback,
        { includeHistoryInPreparedInput: !serverManagesConversation },
      );
      pendingSessionInput = prepared.sessionItems;
      state = new RunState(
        options.context instanceof RunContext
          ? options.context
          : new RunContext<TContext>(options.context),
        prepared.preparedInput,
        agent,
        options.maxTurns ?? this.config.maxTurns ?? runDefaults.maxTurns,
      );
    }

    const tracker = serverManagesConversation
      ? new ServerConversationTracker({ conversationId, previousResponseId })
      : undefined;
    if (tracker && isResumedState) {
      tracker.primeFromState({
        originalInput: state._originalInput,
        generatedItems: state._generatedItems,
        modelResponses: state._modelResponses,
      });
    }

    // The server keeps the transcript of server-managed conversations.
    const persistedSession = serverManagesConversation ? undefined : session;
    const loop: RunLoopContext = {
      tracker,
      session: persistedSession,
      signal: options.signal,
      stream: options.stream ?? false,
      persistInput: async () => {
        const items = pendingSessionInput;
        pendingSessionInput = undefined;
        await saveInputToSession(persistedSession, items);
      },
    };

    try {
      return await this.#runLoop(state, loop);
    } finally {
      if (tracker) {
        state._conversationId = tracker.conversationId;
        state._previousResponseId = tracker.previousResponseId;
      }
    }
  }

  // --------------------------------------------------------------
  //  Internals
  // --------------------------------------------------------------

  async #runLoop<TContext>(
    state: RunState<TContext>,
    loop: RunLoopContext,
  ): Promise<RunResult<TContext>> {
    while (true) {
      // if we don't have a current step, we treat this as a new run
      state._currentStep = state._currentStep ?? {
        type: 'next_step_run_again',
      };

      if (state._currentStep.type === 'next_step_interruption') {
        logger.debug('Continuing from interruption');
        if (!state._lastTurnResponse || !state._lastProcessedResponse) {
          throw new UserError(
            'No model response found in previous state',
            'resume',
            state,
          );
        }

        const turnResult = await resolveInterruptedTurn(
          state._currentAgent,
          state._originalInput,
          state._generatedItems,
          state._lastTurnResponse,
          state._lastProcessedResponse,
          this,
          state,
        );
        await this.#applyTurnResult(
          state,
          turnResult,
          state._lastProcessedResponse.toolsUsed,
          loop,
        );

        if (turnResult.nextStep.type === 'next_step_interruption') {
          // still waiting for a decision, return instead of looping forever
          return new RunResult(state);
        }
      } else if (state._currentStep.type === 'next_step_run_again') {
        if (state._currentTurn >= state._maxTurns) {
          throw new MaxTurnsExceededError(
            `Max turns (${state._maxTurns}) exceeded`,
            state,
            (extraInstruction) =>
              this.#forceFinalOutput(state, loop, extraInstruction),
          );
        }
        state._currentTurn++;

        logger.debug(
          `Running agent ${state._currentAgent.name} (turn ${state._currentTurn})`,
        );

        if (state._currentTurn === 1) {
          await runInputGuardrails(state, this.config.inputGuardrails ?? []);
        }

        if (state._noActiveAgentRun) {
          state._currentAgent.emit(
            'agent_start',
            state._context,
            state._currentAgent,
          );
          this.emit('agent_start', state._context, state._currentAgent);
        }

        const preparedCall = await this.#prepareModelCall(state);
        await loop.persistInput();

        const response = await this.#callModel(
          state,
          loop,
          preparedCall,
          preparedCall.modelSettings,
          () =>
            loop.tracker
              ? loop.tracker.prepareInput(
                  state._originalInput,
                  state._generatedItems,
                )
              : getTurnInput(state._originalInput, state._generatedItems),
          {
            tools: preparedCall.tools.map((tool) => serializeTool(tool)),
            handoffs: preparedCall.handoffs.map((handoff) =>
              serializeHandoff(handoff),
            ),
          },
        );

        const processedResponse = processModelResponse(
          response,
          state._currentAgent,
          preparedCall.tools,
          preparedCall.handoffs,
        );
        state._lastProcessedResponse = processedResponse;

        const turnResult = await resolveTurnAfterModelResponse(
          state._currentAgent,
          state._originalInput,
          state._generatedItems,
          response,
          processedResponse,
          this,
          state,
        );
        await this.#applyTurnResult(
          state,
          turnResult,
          processedResponse.toolsUsed,
          loop,
        );
      }

      const currentStep = state._currentStep;
      if (currentStep.type === 'next_step_final_output') {
        await this.#completeRun(state, currentStep.output);
        return new RunResult(state);
      } else if (currentStep.type === 'next_step_handoff') {
        state._currentAgent = currentStep.newAgent;
        state._noActiveAgentRun = true;

        // we've processed the handoff, so we need to run the loop again
        state._currentStep = { type: 'next_step_run_again' };
      } else if (currentStep.type === 'next_step_interruption') {
        // interrupted. Don't run any guardrails
        return new RunResult(state);
      } else {
        logger.debug('Running next loop');
      }
    }
  }

  /**
   * Calls the model one last time with tool use disabled after the turn budget ran out.
   */
  async #forceFinalOutput<TContext>(
    state: RunState<TContext>,
    loop: RunLoopContext,
    extraInstruction: string = DEFAULT_MAX_TURNS_RESUME_INSTRUCTION,
  ): Promise<RunResult<TContext>> {
    state._currentTurn++;
    logger.debug(
      `Forcing a final answer from agent ${state._currentAgent.name} (turn ${state._currentTurn})`,
    );

    const preparedCall = await this.#prepareModelCall(state);
    const instruction: AgentInputItem = {
      type: 'message',
      role: 'user',
      content: extraInstruction,
    };

    const response = await this.#callModel(
      state,
      loop,
      preparedCall,
      { ...preparedCall.modelSettings, toolChoice: 'none' },
      () => [
        ...(loop.tracker
          ? loop.tracker.prepareInput(
              state._originalInput,
              state._generatedItems,
            )
          : getTurnInput(state._originalInput, state._generatedItems)),
        instruction,
      ],
      { tools: [], handoffs: [] },
    );

    const processedResponse = processModelResponse(
      response,
      state._currentAgent,
      [],
      [],
    );
    state._lastProcessedResponse = processedResponse;

    const turnResult = await resolveTurnAfterModelResponse(
      state._currentAgent,
      state._originalInput,
      state._generatedItems,
      response,
      processedResponse,
      this,
      state,
    );
    await this.#applyTurnResult(
      state,
      turnResult,
      processedResponse.toolsUsed,
      loop,
    );

    const currentStep = state._currentStep;
    if (currentStep?.type !== 'next_step_final_output') {
      throw new ModelBehaviorError(
        'Model did not return a final answer after the maximum number of turns',
        state,
      );
    }
    await this.#completeRun(state, currentStep.output);
    return new RunResult(state);
  }

  async #applyTurnResult<TContext>(
    state: RunState<TContext>,
    turnResult: SingleStepResult<TContext>,
    toolsUsed: string[],
    loop: RunLoopContext,
  ): Promise<void> {
    state._toolUseTracker.addToolUse(state._currentAgent, toolsUsed);
    state._originalInput = turnResult.originalInput;
    state._generatedItems = turnResult.generatedItems;
    state._currentStep = turnResult.nextStep;
    await saveRunItemsToSession(loop.session, turnResult.producedItems);
  }

  async #completeRun<TContext>(
    state: RunState<TContext>,
    output: string,
  ): Promise<void> {
    await runOutputGuardrails(state, this.config.outputGuardrails ?? [], output);
    this.emit('agent_end', state._context, state._currentAgent, output);
    state._currentAgent.emit('agent_end', state._context, output);
  }

  /**
   * Sends one request to the model and records the response on the state. A request rejected
   * because the server-side conversation is locked is retried once with the same input.
   */
  async #callModel<TContext>(
    state: RunState<TContext>,
    loop: RunLoopContext,
    preparedCall: PreparedModelCall<TContext>,
    modelSettings: ModelSettings,
    buildInput: () => AgentInputItem[],
    serialized: Pick<ModelRequest, 'tools' | 'handoffs'>,
  ): Promise<ModelResponse> {
    const { tracker } = loop;
    const send = async (): Promise<ModelResponse> => {
      const input = buildInput();
      tracker?.markInputAsSent(input);
      const request: ModelRequest = {
        systemInstructions: preparedCall.systemInstructions,
        input,
        previousResponseId: tracker?.previousResponseId,
        conversationId: tracker?.conversationId,
        modelSettings,
        tools: serialized.tools,
        outputType: convertAgentOutputTypeToSerializable(
          state._currentAgent.outputType,
        ),
        handoffs: serialized.handoffs,
        signal: loop.signal,
      };
      try {
        if (loop.stream && preparedCall.model.getStreamedResponse) {
          return await this.#streamModelResponse(
            state,
            preparedCall.model.getStreamedResponse(request),
          );
        }
        return await preparedCall.model.getResponse(request);
      } catch (error) {
        state._context.usage.add(Usage.failedRequest());
        if (tracker && isConversationLockedError(error)) {
          tracker.rewindInput(input);
        }
        throw error;
      }
    };

    let response: ModelResponse;
    try {
      response = await send();
    } catch (error) {
      if (!tracker || !isConversationLockedError(error)) {
        throw error;
      }
      logger.warn('Conversation is locked by another request, retrying once');
      response = await send();
    }

    state._lastTurnResponse = response;
    state._modelResponses.push(response);
    state._context.usage.add(response.usage);
    state._noActiveAgentRun = false;

    // After each turn record the items echoed by the server so future requests only
    // include the incremental inputs that have not yet been acknowledged.
    tracker?.trackServerItems(response);
    return response;
  }

  async #streamModelResponse<TContext>(
    state: RunState<TContext>,
    stream: AsyncIterable<ResponseStreamEvent>,
  ): Promise<ModelResponse> {
    let finalResponse: ModelResponse | undefined;
    for await (const event of stream) {
      if (event.type === 'output_text_delta') {
        this.emit(
          'model_delta',
          state._context,
          state._currentAgent,
          event.delta,
        );
      } else {
        finalResponse = event.response;
      }
    }
    if (!finalResponse) {
      throw new ModelBehaviorError(
        'Model did not produce a final response!',
        state,
      );
    }
    return finalResponse;
  }

  async #resolveModel<TContext>(agent: Agent<TContext>): Promise<Model> {
    const selected = selectModel(agent.model, this.config.model);
    if (selected !== undefined && typeof selected !== 'string') {
      return selected;
    }
    if (!this.config.modelProvider) {
      throw new UserError(
        `Agent ${agent.name} has no model and the runner has no model provider to resolve one`,
      );
    }
    return await this.config.modelProvider.getModel(selected);
  }

  async #prepareModelCall<TContext>(
    state: RunState<TContext>,
  ): Promise<PreparedModelCall<TContext>> {
    const agent = state._currentAgent;
    const model = await this.#resolveModel(agent);
    const modelSettings = maybeResetToolChoice(
      agent,
      state._toolUseTracker,
      mergeModelSettings(agent.modelSettings, this.config.modelSettings),
    );
    const [systemInstructions, tools] = await Promise.all([
      agent.getSystemPrompt(state._context),
      agent.getAllTools(state._context),
    ]);

    return {
      model,
      modelSettings,
      systemInstructions,
      tools,
      handoffs: agent.getEnabledHandoffs(),
    };
  }
}

let _defaultRunner: Runner | undefined = undefined;

function getDefaultRunner() {
  if (_defaultRunner) {
    return _defaultRunner;
  }
  _defaultRunner = new Runner();
  return _defaultRunner;
}

/**
 * Replaces the runner used by the top-level `run()` function, e.g. to set a model provider for
 * the whole process.
 */
export function setDefaultRunner(runner: Runner): void {
  _defaultRunner = runner;
}
