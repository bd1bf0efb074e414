import type { RunItem } from '../items';
import type { AgentInputItem } from '../types';

// Normalizes user-provided input into the structure the model expects. Strings become user messages,
// arrays are kept as-is so downstream loops can treat both scenarios uniformly.
export function toAgentInputList(
  originalInput: string | AgentInputItem[],
): AgentInputItem[] {
  if (typeof originalInput === 'string') {
    return [{ type: 'message', role: 'user', content: originalInput }];
  }

  return [...originalInput];
}

// Extracts model-ready output items from run items, excluding approval placeholders.
export function extractOutputItemsFromRunItems(
  items: RunItem[],
): AgentInputItem[] {
  const output: AgentInputItem[] = [];
  for (const item of items) {
    if (item.type === 'tool_approval_item') {
      continue;
    }
    output.push(item.rawItem);
  }
  return output;
}

/**
 * Constructs the model input array for the current turn by combining the original turn input with
 * any new run items (excluding tool approval placeholders).
 */
export function getTurnInput(
  originalInput: string | AgentInputItem[],
  generatedItems: RunItem[],
): AgentInputItem[] {
  const outputItems = extractOutputItemsFromRunItems(generatedItems);
  return [...toAgentInputList(originalInput), ...outputItems];
}
