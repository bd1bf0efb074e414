import type { Agent } from '../agent';
import type { Model, ModelSettings } from '../model';
import type { AgentToolUseTracker } from './toolUseTracker';

/**
 * Resolves the effective model for the next turn. The agent's own model wins over the runner
 * default.
 */
export function selectModel(
  agentModel: string | Model | undefined,
  runConfigModel: string | Model | undefined,
): string | Model | undefined {
  return agentModel ?? runConfigModel;
}

/**
 * Merges run level settings over the agent's own settings.
 */
export function mergeModelSettings(
  agentSettings: ModelSettings,
  runSettings: ModelSettings | undefined,
): ModelSettings {
  if (!runSettings) {
    return { ...agentSettings };
  }
  return {
    ...agentSettings,
    ...runSettings,
    providerData:
      agentSettings.providerData || runSettings.providerData
        ? { ...agentSettings.providerData, ...runSettings.providerData }
        : undefined,
  };
}

/**
 * Resets the tool choice when the agent is configured to prefer a fresh tool selection after
 * any tool usage. This prevents the provider from reusing stale tool hints across turns.
 */
export function maybeResetToolChoice<TContext>(
  agent: Agent<TContext>,
  toolUseTracker: AgentToolUseTracker,
  modelSettings: ModelSettings,
): ModelSettings {
  if (agent.resetToolChoice && toolUseTracker.hasUsedTools(agent)) {
    return { ...modelSettings, toolChoice: undefined };
  }
  return modelSettings;
}
