import type { AgentInputItem } from '../types';

/**
 * Interface representing a persistent conversation history store. Runs read the stored history
 * before the first turn and append every item they produce.
 */
export interface Session {
  /**
   * Ensure and return the identifier for this session.
   */
  getSessionId(): Promise<string>;

  /**
   * Retrieve items from the conversation history.
   *
   * @param limit - The maximum number of items to return. When provided the most recent `limit`
   * items are returned in chronological order.
   */
  getItems(limit?: number): Promise<AgentInputItem[]>;

  /**
   * Append new items to the conversation history.
   */
  addItems(items: AgentInputItem[]): Promise<void>;

  /**
   * Remove and return the most recent item from the conversation history if it exists.
   */
  popItem(): Promise<AgentInputItem | undefined>;

  /**
   * Remove all items that belong to the session and reset its state.
   */
  clearSession(): Promise<void>;
}

/**
 * Combines the stored history with the new input of a run. The returned list becomes the model
 * input of the first turn.
 */
export type SessionInputCallback = (
  historyItems: AgentInputItem[],
  newItems: AgentInputItem[],
) => AgentInputItem[] | Promise<AgentInputItem[]>;
