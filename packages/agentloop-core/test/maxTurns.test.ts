import { afterEach, describe, expect, it } from 'vitest';
import { Agent } from '../src/agent';
import {
  MaxTurnsExceededError,
  UserError,
} from '../src/errors';
import { runDefaults } from '../src/config';
import { DEFAULT_MAX_TURNS_RESUME_INSTRUCTION, Runner } from '../src/run';
import {
  FakeModel,
  echoTool,
  fakeFunctionCall,
  fakeModelMessage,
  fakeResponse,
} from './stubs';

function createLoopingModel() {
  return new FakeModel([
    fakeResponse([fakeFunctionCall('echo', { text: 'a' }, 'call_1')]),
    fakeResponse([fakeFunctionCall('echo', { text: 'b' }, 'call_2')]),
  ]);
}

async function exceedMaxTurns(runner: Runner, agent: Agent) {
  try {
    await runner.run(agent, 'Go', { maxTurns: 2 });
  } catch (error) {
    if (error instanceof MaxTurnsExceededError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the run to exceed its turns');
}

describe('max turns', () => {
  afterEach(() => {
    delete process.env.AGENTLOOP_DEFAULT_MAX_TURNS;
  });

  it('fails once the turn budget is spent', async () => {
    const model = createLoopingModel();
    const agent = new Agent({ name: 'Looper', tools: [echoTool] });
    const runner = new Runner({ model });

    const error = await exceedMaxTurns(runner, agent);

    expect(error.message).toBe('Max turns (2) exceeded');
    expect(error.phase).toBe('run');
    expect(error.canResume).toBe(true);
    expect(error.context?.turnNumber).toBe(2);
    expect(model.requests).toHaveLength(2);
  });

  it('forces a final answer with tools disabled on resume', async () => {
    const model = createLoopingModel();
    const agent = new Agent({ name: 'Looper', tools: [echoTool] });
    const runner = new Runner({ model });
    const error = await exceedMaxTurns(runner, agent);

    model.queue(fakeResponse([fakeModelMessage('final answer')]));
    const result = await error.resume('answer now');

    expect(result.finalOutput).toBe('final answer');
    expect(result.context.usage.requests).toBe(3);
    expect(error.canResume).toBe(false);

    const forced = model.requests[2];
    expect(forced?.modelSettings.toolChoice).toBe('none');
    expect(forced?.tools).toEqual([]);
    expect(forced?.handoffs).toEqual([]);
    expect(forced?.input).toHaveLength(6);
    expect(forced?.input.at(-1)).toEqual({
      type: 'message',
      role: 'user',
      content: 'answer now',
    });
    expect(result.history).not.toContainEqual({
      type: 'message',
      role: 'user',
      content: 'answer now',
    });
  });

  it('uses the default instruction when none is given', async () => {
    const model = createLoopingModel();
    const agent = new Agent({ name: 'Looper', tools: [echoTool] });
    const error = await exceedMaxTurns(new Runner({ model }), agent);

    model.queue(fakeResponse([fakeModelMessage('final answer')]));
    await error.resume();

    expect(model.requests[2]?.input.at(-1)).toEqual({
      type: 'message',
      role: 'user',
      content: DEFAULT_MAX_TURNS_RESUME_INSTRUCTION,
    });
  });

  it('can only be resumed once', async () => {
    const model = createLoopingModel();
    const agent = new Agent({ name: 'Looper', tools: [echoTool] });
    const error = await exceedMaxTurns(new Runner({ model }), agent);

    model.queue(fakeResponse([fakeModelMessage('final answer')]));
    await error.resume('answer now');

    await expect(error.resume('again')).rejects.toThrow(
      new UserError('resume() can only be called once per max turns error'),
    );
    expect(model.requests).toHaveLength(3);
  });

  it('fails when the forced answer is not final', async () => {
    const model = createLoopingModel();
    const agent = new Agent({ name: 'Looper', tools: [echoTool] });
    const error = await exceedMaxTurns(new Runner({ model }), agent);

    model.queue(fakeResponse([]));

    await expect(error.resume('answer now')).rejects.toThrow(
      'Model did not return a final answer after the maximum number of turns',
    );
  });

  it('cannot resume an error that was not raised by a runner', async () => {
    const error = new MaxTurnsExceededError('Max turns (1) exceeded');

    expect(error.canResume).toBe(false);
    await expect(error.resume()).rejects.toThrow(UserError);
  });

  it('reads the default budget from the environment', () => {
    expect(runDefaults.maxTurns).toBe(10);
    process.env.AGENTLOOP_DEFAULT_MAX_TURNS = '3';
    expect(runDefaults.maxTurns).toBe(3);
    process.env.AGENTLOOP_DEFAULT_MAX_TURNS = 'lots';
    expect(runDefaults.maxTurns).toBe(10);
  });
});
