import type { AgentRef } from '../items';

export class AgentToolUseTracker {
  #agentToTools = new Map<AgentRef, string[]>();

  addToolUse(agent: AgentRef, toolNames: string[]): void {
    if (toolNames.length === 0 && !this.#agentToTools.has(agent)) {
      return;
    }
    const existing = this.#agentToTools.get(agent);
    if (existing && existing.length > 0 && toolNames.length === 0) {
      return;
    }
    this.#agentToTools.set(agent, toolNames);
  }

  hasUsedTools(agent: AgentRef): boolean {
    return this.#agentToTools.has(agent);
  }

  toJSON(): Record<string, string[]> {
    return Object.fromEntries(
      Array.from(this.#agentToTools.entries()).map(([agent, toolNames]) => {
        return [agent.name, toolNames];
      }),
    );
  }
}
