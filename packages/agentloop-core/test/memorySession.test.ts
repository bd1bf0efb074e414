import { describe, expect, it } from 'vitest';
import { MemorySession } from '../src/memory/memorySession';
import type { AgentInputItem } from '../src/types';

function userMessage(content: string): AgentInputItem {
  return { type: 'message', role: 'user', content };
}

describe('MemorySession', () => {
  it('uses the given session id', async () => {
    const session = new MemorySession({ sessionId: 'session-1' });
    expect(await session.getSessionId()).toBe('session-1');
  });

  it('generates a session id when none is given', async () => {
    const session = new MemorySession();
    expect(typeof (await session.getSessionId())).toBe('string');
    expect((await session.getSessionId()).length).toBeGreaterThan(0);
  });

  it('returns the most recent items in chronological order', async () => {
    const session = new MemorySession({
      initialItems: [userMessage('one'), userMessage('two')],
    });
    await session.addItems([userMessage('three')]);

    expect(await session.getItems()).toEqual([
      userMessage('one'),
      userMessage('two'),
      userMessage('three'),
    ]);
    expect(await session.getItems(2)).toEqual([
      userMessage('two'),
      userMessage('three'),
    ]);
    expect(await session.getItems(0)).toEqual([]);
  });

  it('copies items on the way in and out', async () => {
    const item = userMessage('original');
    const session = new MemorySession();
    await session.addItems([item]);

    const [stored] = await session.getItems();
    expect(stored).toEqual(item);
    expect(stored).not.toBe(item);
  });

  it('pops the last item and clears the session', async () => {
    const session = new MemorySession({
      initialItems: [userMessage('one'), userMessage('two')],
    });

    expect(await session.popItem()).toEqual(userMessage('two'));
    expect(await session.getItems()).toEqual([userMessage('one')]);

    await session.clearSession();
    expect(await session.getItems()).toEqual([]);
    expect(await session.popItem()).toBeUndefined();
  });
});
