import { afterEach, describe, expect, it, vi } from 'vitest';
import { Agent } from '../src/agent';
import { ConversationLockedError } from '../src/errors';
import {
  RunToolApprovalItem,
  RunToolCallItem,
  RunToolCallOutputItem,
} from '../src/items';
import logger from '../src/logger';
import { Runner } from '../src/run';
import { ServerConversationTracker } from '../src/runner/conversationTracker';
import type { AgentInputItem } from '../src/types';
import {
  FakeModel,
  echoTool,
  fakeFunctionCall,
  fakeModelMessage,
  fakeResponse,
} from './stubs';

const agent = new Agent({ name: 'Tracked', tools: [echoTool] });

function userMessage(content: string): AgentInputItem {
  return { type: 'message', role: 'user', content };
}

describe('ServerConversationTracker', () => {
  it('sends the initial input until it was delivered', () => {
    const tracker = new ServerConversationTracker({ conversationId: 'conv_1' });
    const hello = userMessage('hello');

    expect(tracker.prepareInput([hello], [])).toEqual([hello]);
    expect(tracker.prepareInput([hello], [])).toEqual([hello]);

    tracker.markInputAsSent([hello]);
    expect(tracker.prepareInput([hello], [])).toEqual([]);
  });

  it('sends rewound items again', () => {
    const tracker = new ServerConversationTracker({ conversationId: 'conv_1' });
    const hello = userMessage('hello');
    const input = tracker.prepareInput([hello], []);
    tracker.markInputAsSent(input);

    tracker.rewindInput(input);

    expect(tracker.prepareInput([hello], [])).toEqual([hello]);
  });

  it('skips items the server returned and sends new tool output', () => {
    const tracker = new ServerConversationTracker({ conversationId: 'conv_1' });
    const call = fakeFunctionCall('echo', { text: 'a' }, 'call_1');
    tracker.markInputAsSent(tracker.prepareInput('hello', []));
    tracker.trackServerItems(fakeResponse([call], 'resp_1'));

    const output = new RunToolCallOutputItem(
      {
        type: 'function_call_result',
        name: 'echo',
        callId: 'call_1',
        status: 'completed',
        output: { type: 'text', text: 'echo: a' },
      },
      agent,
      'echo: a',
    );
    const generated = [new RunToolCallItem(call, agent), output];

    expect(tracker.prepareInput('hello', generated)).toEqual([output.rawItem]);
    expect(tracker.previousResponseId).toBeUndefined();
  });

  it('never sends approval placeholders', () => {
    const tracker = new ServerConversationTracker({ conversationId: 'conv_1' });
    tracker.markInputAsSent(tracker.prepareInput('hello', []));
    const approval = new RunToolApprovalItem(
      fakeFunctionCall('echo', { text: 'a' }, 'call_1'),
      agent,
    );

    expect(tracker.prepareInput('hello', [approval])).toEqual([]);
  });

  it('chains responses when no conversation id is used', () => {
    const tracker = new ServerConversationTracker({
      previousResponseId: 'resp_0',
    });

    tracker.trackServerItems(fakeResponse([], 'resp_1'));

    expect(tracker.previousResponseId).toBe('resp_1');
  });

  it('primes from a restored state once and matches copies by call id', () => {
    const tracker = new ServerConversationTracker({});
    const call = fakeFunctionCall('echo', { text: 'a' }, 'call_1');
    const restoredCall = structuredClone(call);
    const output = new RunToolCallOutputItem(
      {
        type: 'function_call_result',
        name: 'echo',
        callId: 'call_1',
        status: 'completed',
        output: { type: 'text', text: 'echo: a' },
      },
      agent,
      'echo: a',
    );
    const generated = [new RunToolCallItem(restoredCall, agent), output];

    tracker.primeFromState({
      originalInput: 'hello',
      generatedItems: generated,
      modelResponses: [fakeResponse([call], 'resp_1')],
    });
    tracker.primeFromState({
      originalInput: 'hello',
      generatedItems: [],
      modelResponses: [fakeResponse([], 'resp_2')],
    });

    expect(tracker.previousResponseId).toBe('resp_1');
    expect(tracker.prepareInput('hello', generated)).toEqual([output.rawItem]);
  });
});

describe('server-managed runs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends only the new tool output on the second turn', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'a' }, 'call_1')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const runner = new Runner({ model });

    const result = await runner.run(agent, 'Hi', { conversationId: 'conv_1' });

    expect(result.finalOutput).toBe('done');
    expect(model.requests[0]?.input).toEqual([userMessage('Hi')]);
    expect(model.requests[1]?.input).toEqual([
      {
        type: 'function_call_result',
        name: 'echo',
        callId: 'call_1',
        status: 'completed',
        output: { type: 'text', text: 'echo: a' },
      },
    ]);
    expect(model.requests[1]?.conversationId).toBe('conv_1');
    expect(model.requests[1]?.previousResponseId).toBeUndefined();
    expect(result.state._conversationId).toBe('conv_1');
  });

  it('chains previous response ids across turns', async () => {
    const model = new FakeModel([
      fakeResponse(
        [fakeFunctionCall('echo', { text: 'a' }, 'call_1')],
        'resp_1',
      ),
      fakeResponse([fakeModelMessage('done')], 'resp_2'),
    ]);
    const runner = new Runner({ model });

    const result = await runner.run(agent, 'Hi', {
      previousResponseId: 'resp_0',
    });

    expect(
      model.requests.map((request) => request.previousResponseId),
    ).toEqual(['resp_0', 'resp_1']);
    expect(result.state._previousResponseId).toBe('resp_2');
  });

  it('retries a locked conversation once with the same input', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const model = new FakeModel([
      new ConversationLockedError(),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const runner = new Runner({ model });

    const result = await runner.run(agent, 'Hi', { conversationId: 'conv_1' });

    expect(result.finalOutput).toBe('done');
    expect(model.requests).toHaveLength(2);
    expect(model.requests[1]?.input).toEqual(model.requests[0]?.input);
    expect(model.requests[1]?.input).toEqual([userMessage('Hi')]);
    expect(result.context.usage.requests).toBe(2);
    expect(warn).toHaveBeenCalledWith(
      'Conversation is locked by another request, retrying once',
    );
  });

  it('recognizes provider errors carrying the lock code', async () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const providerError = Object.assign(new Error('busy'), {
      code: 'conversation_locked',
    });
    const model = new FakeModel([
      providerError,
      fakeResponse([fakeModelMessage('done')]),
    ]);

    const result = await new Runner({ model }).run(agent, 'Hi', {
      conversationId: 'conv_1',
    });

    expect(result.finalOutput).toBe('done');
    expect(model.requests).toHaveLength(2);
  });

  it('gives up after the second lock', async () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const model = new FakeModel([
      new ConversationLockedError(),
      new ConversationLockedError('still locked'),
    ]);

    await expect(
      new Runner({ model }).run(agent, 'Hi', { conversationId: 'conv_1' }),
    ).rejects.toThrow('still locked');
    expect(model.requests).toHaveLength(2);
  });

  it('does not retry locks outside server-managed conversations', async () => {
    const model = new FakeModel([
      new ConversationLockedError(),
      fakeResponse([fakeModelMessage('done')]),
    ]);

    await expect(new Runner({ model }).run(agent, 'Hi')).rejects.toThrow(
      ConversationLockedError,
    );
    expect(model.requests).toHaveLength(1);
  });
});
