import { UserError } from '../errors';
import logger from '../logger';
import type { Session, SessionInputCallback } from '../memory/session';
import type { RunItem } from '../items';
import type { AgentInputItem } from '../types';
import { extractOutputItemsFromRunItems, toAgentInputList } from './items';

export type PreparedInputWithSessionResult = {
  /**
   * The input the run starts with.
   */
  preparedInput: string | AgentInputItem[];
  /**
   * The new input items that still have to be written to the session.
   */
  sessionItems?: AgentInputItem[];
};

/**
 * Builds the input of a run from the stored session history and the caller's new input. When the
 * server manages the conversation the history is already there and only the new input is used.
 */
export async function prepareInputItemsWithSession(
  input: string | AgentInputItem[],
  session?: Session,
  sessionInputCallback?: SessionInputCallback,
  options: { includeHistoryInPreparedInput?: boolean } = {},
): Promise<PreparedInputWithSessionResult> {
  if (!session) {
    return { preparedInput: input, sessionItems: undefined };
  }

  const includeHistory = options.includeHistoryInPreparedInput ?? true;
  const newInputItems = toAgentInputList(input);
  if (!includeHistory) {
    return { preparedInput: newInputItems, sessionItems: newInputItems };
  }

  const history = await session.getItems();
  if (!sessionInputCallback) {
    return {
      preparedInput: [...history, ...newInputItems],
      sessionItems: newInputItems,
    };
  }

  const combined = await sessionInputCallback([...history], [...newInputItems]);
  if (!Array.isArray(combined)) {
    throw new UserError(
      'Session input callback must return an array of AgentInputItem objects.',
    );
  }
  // Only the items the callback did not take from the history are new.
  const historyItems = new Set(history);
  return {
    preparedInput: combined,
    sessionItems: combined.filter((item) => !historyItems.has(item)),
  };
}

/**
 * Writes the new input of a run to the session.
 */
export async function saveInputToSession(
  session: Session | undefined,
  items: AgentInputItem[] | undefined,
): Promise<void> {
  if (!session || !items || items.length === 0) {
    return;
  }
  await session.addItems(items.map((item) => structuredClone(item)));
}

/**
 * Writes the items a turn produced to the session. Approval placeholders are never written; the
 * tool output that follows the decision is.
 */
export async function saveRunItemsToSession(
  session: Session | undefined,
  turnItems: RunItem[],
): Promise<void> {
  if (!session) {
    return;
  }
  const newItems = extractOutputItemsFromRunItems(turnItems);
  if (newItems.length === 0) {
    return;
  }
  if (!logger.dontLogModelData) {
    logger.debug(
      `Saving ${newItems.length} items to session: ${newItems.map((item) => item.type).join(', ')}`,
    );
  }
  await session.addItems(newItems.map((item) => structuredClone(item)));
}
