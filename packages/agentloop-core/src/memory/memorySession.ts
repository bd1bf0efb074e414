import { randomUUID } from 'node:crypto';

import type { AgentInputItem } from '../types';
import type { Session } from './session';
import { logger, type Logger } from '../logger';

export type MemorySessionOptions = {
  sessionId?: string;
  initialItems?: AgentInputItem[];
  logger?: Logger;
};

/**
 * In-memory session store for tests and short-lived processes. Items are copied on the way in and
 * out.
 */
export class MemorySession implements Session {
  private readonly sessionId: string;
  private readonly logger: Logger;

  private items: AgentInputItem[];

  constructor(options: MemorySessionOptions = {}) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.items = options.initialItems
      ? options.initialItems.map(cloneAgentItem)
      : [];
    this.logger = options.logger ?? logger;
  }

  async getSessionId(): Promise<string> {
    return this.sessionId;
  }

  async getItems(limit?: number): Promise<AgentInputItem[]> {
    if (limit !== undefined && limit <= 0) {
      return [];
    }
    const start =
      limit === undefined ? 0 : Math.max(this.items.length - limit, 0);
    const items = this.items.slice(start).map(cloneAgentItem);
    this.logDebug('Getting items from', items);
    return items;
  }

  async addItems(items: AgentInputItem[]): Promise<void> {
    if (items.length === 0) {
      return;
    }
    const cloned = items.map(cloneAgentItem);
    this.logDebug('Adding items to', cloned);
    this.items = [...this.items, ...cloned];
  }

  async popItem(): Promise<AgentInputItem | undefined> {
    const item = this.items.at(-1);
    if (item === undefined) {
      return undefined;
    }
    const cloned = cloneAgentItem(item);
    this.logDebug('Popping item from', [cloned]);
    this.items = this.items.slice(0, -1);
    return cloned;
  }

  async clearSession(): Promise<void> {
    this.logger.debug(`Clearing memory session (${this.sessionId})`);
    this.items = [];
  }

  private logDebug(action: string, items: AgentInputItem[]) {
    if (this.logger.dontLogModelData) {
      this.logger.debug(
        `${action} memory session (${this.sessionId}): ${items.length} item(s)`,
      );
      return;
    }
    this.logger.debug(
      `${action} memory session (${this.sessionId}): ${JSON.stringify(items)}`,
    );
  }
}

function cloneAgentItem<T extends AgentInputItem>(item: T): T {
  return structuredClone(item);
}
