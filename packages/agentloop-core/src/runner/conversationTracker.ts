import type { RunItem } from '../items';
import logger from '../logger';
import type { ModelResponse } from '../model';
import type { AgentInputItem } from '../types';
import { toAgentInputList } from './items';

/**
 * Keys an item is known by on the server. Items returned by the server are matched by `id`, tool
 * calls and their outputs by call id, so copies restored from a serialized run state still match.
 */
function serverKeys(item: AgentInputItem): string[] {
  const keys: string[] = [];
  if (typeof item.id === 'string') {
    keys.push(`id:${item.id}`);
  }
  switch (item.type) {
    case 'function_call':
    case 'shell_call':
    case 'local_shell_call':
    case 'apply_patch_call':
    case 'computer_call':
      keys.push(`call:${item.callId}`);
      break;
    case 'function_call_result':
    case 'action_call_output':
      keys.push(`output:${item.callId}`);
      break;
    case 'protocol_approval_response':
      keys.push(`approval:${item.approvalRequestId}`);
      break;
  }
  return keys;
}

/**
 * Keeps track of what a server-managed conversation already holds so every request only carries
 * the items the server has not seen yet.
 */
export class ServerConversationTracker {
  /**
   * Server-side conversation the run appends to.
   */
  public conversationId?: string;

  /**
   * Response the next request chains from. Only used without a conversation id.
   */
  public previousResponseId?: string;

  private sentInitialInput = false;
  private primed = false;
  // Object identity of items sent or received in this process.
  private sentItems = new WeakSet<object>();
  private serverItems = new WeakSet<object>();
  // Keys of items sent or received, for copies that lost their identity.
  private sentItemKeys = new Set<string>();
  private serverItemKeys = new Set<string>();
  // Initial input items, and those of them that have not been delivered yet.
  private initialItems = new WeakSet<AgentInputItem>();
  private remainingInitialInput: AgentInputItem[] | null = null;

  constructor({
    conversationId,
    previousResponseId,
  }: {
    conversationId?: string;
    previousResponseId?: string;
  }) {
    this.conversationId = conversationId;
    this.previousResponseId = previousResponseId;
  }

  /**
   * Pre-populates the tracker from an existing run state when resuming a server-managed run.
   * Priming again is a no-op.
   */
  primeFromState({
    originalInput,
    generatedItems,
    modelResponses,
  }: {
    originalInput: string | AgentInputItem[];
    generatedItems: RunItem[];
    modelResponses: ModelResponse[];
  }) {
    if (this.primed || this.sentInitialInput) {
      return;
    }
    this.primed = true;

    for (const item of toAgentInputList(originalInput)) {
      this.markSent(item);
    }
    this.sentInitialInput = true;
    this.remainingInitialInput = null;

    for (const response of modelResponses) {
      for (const item of response.output) {
        this.markServer(item);
      }
    }

    const latestResponse = modelResponses.at(-1);
    if (!this.conversationId && latestResponse?.responseId) {
      this.previousResponseId = latestResponse.responseId;
    }

    for (const item of generatedItems) {
      if (this.isKnownToServer(item.rawItem)) {
        this.markSent(item.rawItem);
      }
    }
  }

  /**
   * Records the items returned by the server so later requests skip them, and chains the next
   * request from this response when no conversation id is used.
   */
  trackServerItems(modelResponse: ModelResponse | undefined) {
    if (!modelResponse) {
      return;
    }
    for (const item of modelResponse.output) {
      this.markServer(item);
    }
    if (!this.conversationId && modelResponse.responseId) {
      this.previousResponseId = modelResponse.responseId;
    }
  }

  /**
   * Returns the items that still need to be delivered for the current turn: the original input
   * until it was sent, plus generated items the server has not seen.
   */
  prepareInput(
    originalInput: string | AgentInputItem[],
    generatedItems: RunItem[],
  ): AgentInputItem[] {
    const inputItems: AgentInputItem[] = [];

    if (!this.sentInitialInput) {
      const initialItems = toAgentInputList(originalInput);
      inputItems.push(...initialItems);
      for (const item of initialItems) {
        this.initialItems.add(item);
      }
      this.remainingInitialInput = initialItems;
      this.sentInitialInput = true;
    } else if (this.remainingInitialInput) {
      inputItems.push(...this.remainingInitialInput);
    }

    for (const item of generatedItems) {
      if (item.type === 'tool_approval_item') {
        continue;
      }
      const rawItem = item.rawItem;
      if (this.sentItems.has(rawItem) || this.isKnownToServer(rawItem)) {
        continue;
      }
      if (serverKeys(rawItem).some((key) => this.sentItemKeys.has(key))) {
        continue;
      }
      inputItems.push(rawItem);
    }

    return inputItems;
  }

  /**
   * Marks items as delivered so later turns do not resend them.
   */
  markInputAsSent(items: AgentInputItem[]) {
    if (items.length === 0) {
      return;
    }
    const delivered = new Set<AgentInputItem>(items);
    for (const item of delivered) {
      this.markSent(item);
    }

    if (this.remainingInitialInput) {
      this.remainingInitialInput = this.remainingInitialInput.filter(
        (item) => !delivered.has(item),
      );
      if (this.remainingInitialInput.length === 0) {
        this.remainingInitialInput = null;
      }
    }
  }

  /**
   * Undoes `markInputAsSent` for a request the server rejected, so the same items go out again
   * on the retry. Items the server returned itself stay known.
   */
  rewindInput(items: AgentInputItem[]) {
    if (items.length === 0) {
      return;
    }
    logger.debug(`Rewinding ${items.length} conversation items for a retry`);
    const initialToResend: AgentInputItem[] = [];
    for (const item of items) {
      this.sentItems.delete(item);
      for (const key of serverKeys(item)) {
        this.sentItemKeys.delete(key);
      }
      if (this.initialItems.has(item)) {
        initialToResend.push(item);
      }
    }
    if (initialToResend.length > 0) {
      const remaining = this.remainingInitialInput ?? [];
      this.remainingInitialInput = [
        ...remaining,
        ...initialToResend.filter((item) => !remaining.includes(item)),
      ];
    }
  }

  private markSent(item: AgentInputItem) {
    this.sentItems.add(item);
    for (const key of serverKeys(item)) {
      this.sentItemKeys.add(key);
    }
  }

  private markServer(item: AgentInputItem) {
    this.serverItems.add(item);
    for (const key of serverKeys(item)) {
      this.serverItemKeys.add(key);
    }
  }

  private isKnownToServer(item: AgentInputItem): boolean {
    if (this.serverItems.has(item)) {
      return true;
    }
    return serverKeys(item).some((key) => this.serverItemKeys.has(key));
  }
}
