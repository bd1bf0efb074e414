import type {
  InputGuardrailResult,
  OutputGuardrailResult,
} from './guardrail';
import type { RunResult } from './result';
import type { RunState } from './runState';
import type {
  ToolInputGuardrailResult,
  ToolOutputGuardrailResult,
} from './toolGuardrail';
import type { UnknownContext } from './types';

/**
 * The stage of a run an error was raised in.
 */
export type RunPhase =
  | 'run'
  | 'decode'
  | 'execute'
  | 'guardrail'
  | 'resume'
  | 'snapshot';

/**
 * Details about the run at the time an error was raised.
 */
export interface ErrorContext {
  /** Name of the agent that was active when the error occurred */
  agentName: string;
  /** Current turn number in the run */
  turnNumber: number;
  /** Timestamp when the error occurred */
  timestamp: Date;
  runStateSnapshot?: {
    maxTurns: number;
    generatedItemsCount: number;
    modelResponsesCount: number;
  };
}

/**
 * Recovery action that can be suggested to resolve an error.
 */
export interface RecoveryAction {
  type: 'retry' | 'fallback' | 'skip' | 'restart' | 'manual';
  description: string;
}

/**
 * Base class for all errors thrown by the library.
 */
export abstract class AgentLoopError<
  TContext = UnknownContext,
> extends Error {
  state?: RunState<TContext>;
  /** The stage of the run that failed. */
  readonly phase: RunPhase;
  context?: ErrorContext;
  /** Suggested recovery actions for this error */
  suggestions: RecoveryAction[] = [];

  constructor(
    message: string,
    phase: RunPhase,
    state?: RunState<TContext>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.phase = phase;
    this.state = state;
    if (state) {
      this.context = {
        agentName: state._currentAgent.name,
        turnNumber: state._currentTurn,
        timestamp: new Date(),
        runStateSnapshot: {
          maxTurns: state._maxTurns,
          generatedItemsCount: state._generatedItems.length,
          modelResponsesCount: state._modelResponses.length,
        },
      };
    }
  }

  addSuggestion(suggestion: RecoveryAction): void {
    this.suggestions.push(suggestion);
  }

  /**
   * Gets a formatted string with error details and suggestions for debugging.
   */
  getDebugInfo(): string {
    const parts = [
      `Error: ${this.message}`,
      `Type: ${this.name}`,
      `Phase: ${this.phase}`,
    ];

    if (this.context) {
      parts.push(
        `Context:`,
        `  Agent: ${this.context.agentName}`,
        `  Turn: ${this.context.turnNumber}`,
        `  Timestamp: ${this.context.timestamp.toISOString()}`,
      );
      const snapshot = this.context.runStateSnapshot;
      if (snapshot) {
        parts.push(
          `  Run state:`,
          `    Turn ${this.context.turnNumber}/${snapshot.maxTurns}`,
          `    Generated items: ${snapshot.generatedItemsCount}`,
          `    Model responses: ${snapshot.modelResponsesCount}`,
        );
      }
    }

    if (this.suggestions.length > 0) {
      parts.push(`Suggestions:`);
      this.suggestions.forEach((suggestion, index) => {
        parts.push(
          `  ${index + 1}. ${suggestion.description} (${suggestion.type})`,
        );
      });
    }

    return parts.join('\n');
  }
}

/**
 * System error thrown when the library encounters an error that is not caused by the user's
 * misconfiguration.
 */
export class SystemError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  constructor(message: string, state?: RunState<TContext>) {
    super(message, 'run', state);
    this.addSuggestion({
      type: 'manual',
      description: 'Check the debug logs and report this issue if it persists',
    });
  }
}

/**
 * Error thrown when the maximum number of turns is exceeded.
 *
 * When raised by a `Runner`, the error carries a one-shot `resume()` that asks the model for a
 * final answer with tool use disabled instead of failing the run.
 */
export class MaxTurnsExceededError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  #resume?: (extraInstruction?: string) => Promise<RunResult<TContext>>;
  #resumed = false;

  constructor(
    message: string,
    state?: RunState<TContext>,
    resume?: (extraInstruction?: string) => Promise<RunResult<TContext>>,
  ) {
    super(message, 'run', state);
    this.#resume = resume;
    this.addSuggestion({
      type: 'fallback',
      description:
        'Call resume() with an instruction to force a final answer, or raise maxTurns',
    });
  }

  /**
   * Whether `resume()` can still be called.
   */
  get canResume(): boolean {
    return typeof this.#resume === 'function' && !this.#resumed;
  }

  /**
   * Calls the model exactly once more with tools disabled and the given instruction appended to
   * the conversation, returning the forced final answer. Without an instruction a default one
   * asking for an answer from the information gathered so far is used.
   */
  async resume(extraInstruction?: string): Promise<RunResult<TContext>> {
    if (!this.#resume) {
      throw new UserError(
        'This error was not raised by a runner and cannot be resumed',
        'resume',
        this.state,
      );
    }
    if (this.#resumed) {
      throw new UserError(
        'resume() can only be called once per max turns error',
        'resume',
        this.state,
      );
    }
    this.#resumed = true;
    return this.#resume(extraInstruction);
  }
}

/**
 * Error thrown when the model does something unexpected, e.g. calling a tool that doesn't exist,
 * or returning output that does not match the declared schema.
 */
export class ModelBehaviorError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  constructor(message: string, state?: RunState<TContext>) {
    super(message, 'decode', state);
  }
}

/**
 * Error thrown when the error is caused by the library user's misconfiguration.
 */
export class UserError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  constructor(
    message: string,
    phase: RunPhase = 'run',
    state?: RunState<TContext>,
  ) {
    super(message, phase, state);
  }
}

/**
 * Error thrown when a guardrail execution fails.
 */
export class GuardrailExecutionError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  error: Error;
  constructor(message: string, error: Error, state?: RunState<TContext>) {
    super(message, 'guardrail', state, { cause: error });
    this.error = error;
  }
}

/**
 * Error thrown when a tool call fails.
 */
export class ToolCallError<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  error: Error;
  constructor(message: string, error: Error, state?: RunState<TContext>) {
    super(message, 'execute', state, { cause: error });
    this.error = error;
  }
}

/**
 * Error thrown when an input guardrail tripwire is triggered.
 */
export class InputGuardrailTripwireTriggered<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  result: InputGuardrailResult;
  constructor(
    message: string,
    result: InputGuardrailResult,
    state?: RunState<TContext>,
  ) {
    super(message, 'guardrail', state);
    this.result = result;
  }
}

/**
 * Error thrown when an output guardrail tripwire is triggered.
 */
export class OutputGuardrailTripwireTriggered<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  result: OutputGuardrailResult;
  constructor(
    message: string,
    result: OutputGuardrailResult,
    state?: RunState<TContext>,
  ) {
    super(message, 'guardrail', state);
    this.result = result;
  }
}

/**
 * Error thrown when a tool input guardrail asks for the whole run to stop.
 */
export class ToolInputGuardrailTripwireTriggered<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  result: ToolInputGuardrailResult;
  constructor(
    message: string,
    result: ToolInputGuardrailResult,
    state?: RunState<TContext>,
  ) {
    super(message, 'execute', state);
    this.result = result;
  }
}

/**
 * Error thrown when a tool output guardrail asks for the whole run to stop.
 */
export class ToolOutputGuardrailTripwireTriggered<
  TContext = UnknownContext,
> extends AgentLoopError<TContext> {
  result: ToolOutputGuardrailResult;
  constructor(
    message: string,
    result: ToolOutputGuardrailResult,
    state?: RunState<TContext>,
  ) {
    super(message, 'execute', state);
    this.result = result;
  }
}

/**
 * Raised by model adapters when the provider rejects a request because another request is
 * currently writing to the same server-managed conversation. Runners retry such a call once.
 */
export class ConversationLockedError extends Error {
  readonly code = 'conversation_locked';

  constructor(message = 'Conversation is locked by another request') {
    super(message);
    this.name = 'ConversationLockedError';
  }
}

/**
 * Detects a transient conversation lock, whether raised as `ConversationLockedError` or as any
 * provider error carrying the `conversation_locked` code.
 */
export function isConversationLockedError(error: unknown): boolean {
  if (error instanceof ConversationLockedError) {
    return true;
  }
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'conversation_locked';
}
