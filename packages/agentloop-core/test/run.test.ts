import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { Agent } from '../src/agent';
import {
  InputGuardrailTripwireTriggered,
  ModelBehaviorError,
  OutputGuardrailTripwireTriggered,
  ToolCallError,
  UserError,
} from '../src/errors';
import { handoff } from '../src/handoff';
import { RunHandoffOutputItem, RunMessageOutputItem } from '../src/items';
import { MemorySession } from '../src/memory/memorySession';
import { run, Runner, setDefaultRunner } from '../src/run';
import { tool } from '../src/tool';
import {
  echoTool,
  FakeModel,
  FakeModelProvider,
  FakeStreamingModel,
  fakeFunctionCall,
  fakeModelMessage,
  fakeResponse,
} from './stubs';

describe('Runner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the final output of a single turn', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('Hello')])]);
    const agent = new Agent({ name: 'Greeter', instructions: 'Be kind' });

    const result = await new Runner({ model }).run(agent, 'Hi');

    expect(result.finalOutput).toBe('Hello');
    expect(result.lastAgent).toBe(agent);
    expect(result.state._currentTurn).toBe(1);
    expect(result.usage.requests).toBe(1);
    expect(result.newItems).toHaveLength(1);
    expect(result.newItems[0]).toBeInstanceOf(RunMessageOutputItem);
    expect(result.history).toEqual([
      { type: 'message', role: 'user', content: 'Hi' },
      fakeModelMessage('Hello'),
    ]);
    expect(result.output).toEqual([fakeModelMessage('Hello')]);
    expect(model.requests[0]?.systemInstructions).toBe('Be kind');
    expect(model.requests[0]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Hi' },
    ]);
  });

  it('runs tools and calls the model again with their output', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'ping' }, 'call_1')]),
      fakeResponse([fakeModelMessage('pong')]),
    ]);
    const agent = new Agent({ name: 'Echoer', tools: [echoTool] });

    const result = await new Runner({ model }).run(agent, 'Go');

    expect(result.finalOutput).toBe('pong');
    expect(result.state._currentTurn).toBe(2);
    expect(result.usage.requests).toBe(2);
    expect(model.requests[1]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Go' },
      fakeFunctionCall('echo', { text: 'ping' }, 'call_1'),
      {
        type: 'function_call_result',
        name: 'echo',
        callId: 'call_1',
        status: 'completed',
        output: { type: 'text', text: 'echo: ping' },
      },
    ]);
    expect(model.requests[0]?.tools).toEqual([
      {
        type: 'function',
        name: 'echo',
        description: 'Echoes the given text',
        parameters: expect.objectContaining({ type: 'object' }),
        strict: true,
      },
    ]);
  });

  it('counts one turn per model call', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'a' }, 'call_1')]),
      fakeResponse([fakeFunctionCall('echo', { text: 'b' }, 'call_2')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const agent = new Agent({ name: 'Echoer', tools: [echoTool] });

    const result = await new Runner({ model }).run(agent, 'Go', {
      maxTurns: 3,
    });

    expect(result.state._currentTurn).toBe(3);
    expect(model.requests).toHaveLength(3);
  });

  it('resets the tool choice after a tool was used', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'a' }, 'call_1')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const agent = new Agent({
      name: 'Echoer',
      tools: [echoTool],
      modelSettings: { toolChoice: 'required', temperature: 0.2 },
    });

    await new Runner({ model }).run(agent, 'Go');

    expect(model.requests[0]?.modelSettings).toEqual({
      toolChoice: 'required',
      temperature: 0.2,
    });
    expect(model.requests[1]?.modelSettings).toEqual({
      toolChoice: undefined,
      temperature: 0.2,
    });
  });

  it('lets run level model settings override the agent', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('ok')])]);
    const agent = new Agent({
      name: 'Tuned',
      modelSettings: { temperature: 0.2, maxTokens: 50 },
    });

    await new Runner({ model, modelSettings: { temperature: 0.9 } }).run(
      agent,
      'Go',
    );

    expect(model.requests[0]?.modelSettings).toEqual({
      temperature: 0.9,
      maxTokens: 50,
      providerData: undefined,
    });
  });

  it('resolves string model names through the model provider', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('ok')])]);
    const provider = new FakeModelProvider(model);
    const agent = new Agent({ name: 'Named', model: 'small-model' });

    const result = await new Runner({ modelProvider: provider }).run(
      agent,
      'Go',
    );

    expect(result.finalOutput).toBe('ok');
    expect(provider.requestedNames).toEqual(['small-model']);
  });

  it('fails when no model can be resolved', async () => {
    const agent = new Agent({ name: 'Lost' });
    await expect(new Runner().run(agent, 'Go')).rejects.toThrow(
      new UserError(
        'Agent Lost has no model and the runner has no model provider to resolve one',
      ),
    );
  });

  it('uses the default runner for run()', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('default')])]);
    setDefaultRunner(new Runner({ model }));
    const agent = new Agent({ name: 'Default' });

    const result = await run(agent, 'Go');

    expect(result.finalOutput).toBe('default');
  });

  it('keeps looping when the model produced neither text nor tools', async () => {
    const model = new FakeModel([
      fakeResponse([{ type: 'reasoning', content: [] }]),
      fakeResponse([fakeModelMessage('finally')]),
    ]);
    const agent = new Agent({ name: 'Thinker' });

    const result = await new Runner({ model }).run(agent, 'Go');

    expect(result.finalOutput).toBe('finally');
    expect(model.requests).toHaveLength(2);
  });

  it('parses structured output', async () => {
    const model = new FakeModel([
      fakeResponse([fakeModelMessage('{"city":"Paris"}')]),
    ]);
    const agent = new Agent({
      name: 'Structured',
      outputType: z.object({ city: z.string() }),
    });

    const result = await new Runner({ model }).run(agent, 'Where?');

    expect(result.finalOutput).toEqual({ city: 'Paris' });
    expect(model.requests[0]?.outputType).toEqual(
      expect.objectContaining({ type: 'json_schema', name: 'output' }),
    );
  });

  it('rejects structured output that does not match the schema', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('not json')])]);
    const agent = new Agent({
      name: 'Structured',
      outputType: z.object({ city: z.string() }),
    });

    await expect(new Runner({ model }).run(agent, 'Where?')).rejects.toThrow(
      ModelBehaviorError,
    );
  });

  it('propagates tool failures as tool call errors', async () => {
    const failing = tool({
      name: 'explode',
      description: 'Always fails',
      parameters: z.object({}),
      execute: async () => {
        throw new Error('boom');
      },
    });
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('explode', {}, 'call_1')]),
    ]);
    const agent = new Agent({ name: 'Risky', tools: [failing] });

    const error = await new Runner({ model })
      .run(agent, 'Go')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolCallError);
    if (error instanceof ToolCallError) {
      expect(error.message).toBe('Failed to run function tools: boom');
      expect(error.error.message).toBe('boom');
      expect(error.phase).toBe('execute');
    }
  });

  it('records the error function output instead of failing', async () => {
    const failing = tool({
      name: 'explode',
      description: 'Always fails',
      parameters: z.object({}),
      execute: async () => {
        throw new Error('boom');
      },
      errorFunction: (_context, error) =>
        `failed: ${error instanceof Error ? error.message : String(error)}`,
    });
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('explode', {}, 'call_1')]),
      fakeResponse([fakeModelMessage('recovered')]),
    ]);
    const agent = new Agent({ name: 'Risky', tools: [failing] });

    const result = await new Runner({ model }).run(agent, 'Go');

    expect(result.finalOutput).toBe('recovered');
    expect(result.history[2]).toEqual({
      type: 'function_call_result',
      name: 'explode',
      callId: 'call_1',
      status: 'completed',
      output: { type: 'text', text: 'failed: boom' },
    });
  });

  it('stops on the first tool when configured', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'stop' }, 'call_1')]),
    ]);
    const agent = new Agent({
      name: 'Stopper',
      tools: [echoTool],
      toolUseBehavior: 'stop_on_first_tool',
    });

    const result = await new Runner({ model }).run(agent, 'Go');

    expect(result.finalOutput).toBe('echo: stop');
    expect(model.requests).toHaveLength(1);
  });

  it('stops at the named tools', async () => {
    const other = tool({
      name: 'other',
      description: 'Other tool',
      parameters: z.object({}),
      execute: async () => 'other output',
    });
    const model = new FakeModel([
      fakeResponse([
        fakeFunctionCall('other', {}, 'call_1'),
        fakeFunctionCall('echo', { text: 'named' }, 'call_2'),
      ]),
    ]);
    const agent = new Agent({
      name: 'Stopper',
      tools: [other, echoTool],
      toolUseBehavior: { stopAtToolNames: ['echo'] },
    });

    const result = await new Runner({ model }).run(agent, 'Go');

    expect(result.finalOutput).toBe('echo: named');
  });

  it('hands off to another agent', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('transfer_to_Billing', {}, 'call_1')]),
      fakeResponse([fakeModelMessage('Billing here')]),
    ]);
    const billing = new Agent({ name: 'Billing', instructions: 'Billing' });
    const triage = new Agent({
      name: 'Triage',
      instructions: 'Triage',
      handoffs: [billing],
    });
    const handoffs: string[] = [];
    const runner = new Runner({ model });
    runner.on('agent_handoff', (_context, from, to) => {
      handoffs.push(`${from.name}->${to.name}`);
    });

    const result = await runner.run(triage, 'Refund please');

    expect(result.finalOutput).toBe('Billing here');
    expect(result.lastAgent).toBe(billing);
    expect(handoffs).toEqual(['Triage->Billing']);
    expect(result.newItems[1]).toBeInstanceOf(RunHandoffOutputItem);
    expect(result.history[2]).toEqual({
      type: 'function_call_result',
      name: 'transfer_to_Billing',
      callId: 'call_1',
      status: 'completed',
      output: { type: 'text', text: '{"assistant":"Billing"}' },
    });
    expect(model.requests[1]?.systemInstructions).toBe('Billing');
  });

  it('honors only the first of several handoffs', async () => {
    const model = new FakeModel([
      fakeResponse([
        fakeFunctionCall('transfer_to_First', {}, 'call_1'),
        fakeFunctionCall('transfer_to_Second', {}, 'call_2'),
      ]),
      fakeResponse([fakeModelMessage('First here')]),
    ]);
    const first = new Agent({ name: 'First' });
    const second = new Agent({ name: 'Second' });
    const triage = new Agent({ name: 'Triage', handoffs: [first, second] });

    const result = await new Runner({ model }).run(triage, 'Go');

    expect(result.lastAgent).toBe(first);
    const outputs = result.history.filter(
      (item) => item.type === 'function_call_result',
    );
    expect(outputs).toEqual([
      {
        type: 'function_call_result',
        name: 'transfer_to_Second',
        callId: 'call_2',
        status: 'completed',
        output: {
          type: 'text',
          text: 'Multiple handoffs detected, ignoring this one.',
        },
      },
      {
        type: 'function_call_result',
        name: 'transfer_to_First',
        callId: 'call_1',
        status: 'completed',
        output: { type: 'text', text: '{"assistant":"First"}' },
      },
    ]);
  });

  it('passes handoff input to the handoff callback and applies its filter', async () => {
    const model = new FakeModel([
      fakeResponse([
        fakeModelMessage('routing', 'msg_route'),
        fakeFunctionCall('transfer_to_Support', { reason: 'login' }, 'call_1'),
      ]),
      fakeResponse([fakeModelMessage('Support here')]),
    ]);
    const support = new Agent({ name: 'Support' });
    const reasons: string[] = [];
    const triage = new Agent({
      name: 'Triage',
      handoffs: [
        handoff(support, {
          inputType: z.object({ reason: z.string() }),
          onHandoff: (_context, input) => {
            reasons.push(input.reason);
          },
          inputFilter: (data) => ({
            ...data,
            preHandoffItems: [],
            newItems: [],
          }),
        }),
      ],
    });

    await new Runner({ model }).run(triage, 'Cannot log in');

    expect(reasons).toEqual(['login']);
    expect(model.requests[1]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Cannot log in' },
    ]);
  });

  it('emits lifecycle events on the runner and the agent', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'x' }, 'call_1')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const agent = new Agent({ name: 'Echoer', tools: [echoTool] });
    const runner = new Runner({ model });
    const events: string[] = [];
    runner.on('agent_start', (_context, started) =>
      events.push(`run:start:${started.name}`),
    );
    runner.on('agent_tool_start', (_context, _agent, started) =>
      events.push(`run:tool_start:${started.name}`),
    );
    runner.on('agent_tool_end', (_context, _agent, ended, output) =>
      events.push(`run:tool_end:${ended.name}:${output}`),
    );
    runner.on('agent_end', (_context, _agent, output) =>
      events.push(`run:end:${output}`),
    );
    agent.on('agent_start', () => events.push('agent:start'));
    agent.on('agent_end', (_context, output) =>
      events.push(`agent:end:${output}`),
    );

    await runner.run(agent, 'Go');

    expect(events).toEqual([
      'agent:start',
      'run:start:Echoer',
      'run:tool_start:echo',
      'run:tool_end:echo:echo: x',
      'run:end:done',
      'agent:end:done',
    ]);
  });

  it('stops when an input guardrail trips', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('never')])]);
    const agent = new Agent({
      name: 'Guarded',
      inputGuardrails: [
        {
          name: 'no_secrets',
          execute: ({ input }) => ({
            tripwireTriggered:
              typeof input === 'string' && input.includes('password'),
            outputInfo: { reason: 'secret' },
          }),
        },
      ],
    });

    const error = await new Runner({ model })
      .run(agent, 'my password is test-secret')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InputGuardrailTripwireTriggered);
    if (error instanceof InputGuardrailTripwireTriggered) {
      expect(error.message).toBe(
        'Input guardrail triggered: {"reason":"secret"}',
      );
      expect(error.result.guardrail.name).toBe('no_secrets');
    }
    expect(model.requests).toHaveLength(0);
  });

  it('runs runner input guardrails only on the first turn', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'x' }, 'call_1')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const check = vi.fn(() => ({ tripwireTriggered: false }));
    const agent = new Agent({ name: 'Echoer', tools: [echoTool] });

    const result = await new Runner({
      model,
      inputGuardrails: [{ name: 'check', execute: check }],
    }).run(agent, 'Go');

    expect(check).toHaveBeenCalledTimes(1);
    expect(result.inputGuardrailResults).toEqual([
      {
        guardrail: { type: 'input', name: 'check' },
        output: { tripwireTriggered: false },
      },
    ]);
  });

  it('stops when an output guardrail trips', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('rude')])]);
    const agent = new Agent({
      name: 'Polite',
      outputGuardrails: [
        {
          name: 'politeness',
          execute: ({ agentOutput }) => ({
            tripwireTriggered: agentOutput === 'rude',
          }),
        },
      ],
    });

    await expect(new Runner({ model }).run(agent, 'Go')).rejects.toThrow(
      OutputGuardrailTripwireTriggered,
    );
  });

  it('persists input and generated items to the session', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'x' }, 'call_1')]),
      fakeResponse([fakeModelMessage('done')]),
    ]);
    const session = new MemorySession({
      initialItems: [{ type: 'message', role: 'user', content: 'Earlier' }],
    });
    const agent = new Agent({ name: 'Echoer', tools: [echoTool] });

    await new Runner({ model }).run(agent, 'Now', { session });

    expect(model.requests[0]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Earlier' },
      { type: 'message', role: 'user', content: 'Now' },
    ]);
    const stored = await session.getItems();
    expect(stored.map((item) => item.type)).toEqual([
      'message',
      'message',
      'function_call',
      'function_call_result',
      'message',
    ]);
  });

  it('persists handoff items to the session when a filter drops them', async () => {
    const model = new FakeModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'x' }, 'call_e')]),
      fakeResponse([fakeFunctionCall('transfer_to_Target', {}, 'call_h')]),
      fakeResponse([fakeModelMessage('target done')]),
    ]);
    const session = new MemorySession();
    const target = new Agent({ name: 'Target' });
    const agent = new Agent({
      name: 'Echoer',
      tools: [echoTool],
      handoffs: [
        handoff(target, {
          inputFilter: (data) => ({
            ...data,
            preHandoffItems: [],
            newItems: [],
          }),
        }),
      ],
    });

    const result = await new Runner({ model }).run(agent, 'Go', { session });

    expect(result.finalOutput).toBe('target done');
    const stored = await session.getItems();
    expect(
      stored.map((item) =>
        'callId' in item ? `${item.type}:${item.callId}` : item.type,
      ),
    ).toEqual([
      'message',
      'function_call:call_e',
      'function_call_result:call_e',
      'function_call:call_h',
      'function_call_result:call_h',
      'message',
    ]);
  });

  it('combines history and new input with the session input callback', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('done')])]);
    const session = new MemorySession({
      initialItems: [
        { type: 'message', role: 'user', content: 'Old 1' },
        { type: 'message', role: 'user', content: 'Old 2' },
      ],
    });
    const agent = new Agent({ name: 'Brief' });

    await new Runner({ model }).run(agent, 'New', {
      session,
      sessionInputCallback: (history, newItems) => [
        ...history.slice(-1),
        ...newItems,
      ],
    });

    expect(model.requests[0]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Old 2' },
      { type: 'message', role: 'user', content: 'New' },
    ]);
    expect((await session.getItems()).length).toBe(4);
  });

  it('does not write to the session when the server keeps the conversation', async () => {
    const model = new FakeModel([fakeResponse([fakeModelMessage('done')])]);
    const session = new MemorySession({
      initialItems: [{ type: 'message', role: 'user', content: 'Earlier' }],
    });
    const agent = new Agent({ name: 'Remote' });

    await new Runner({ model }).run(agent, 'Now', {
      session,
      conversationId: 'conv_1',
    });

    expect(model.requests[0]?.input).toEqual([
      { type: 'message', role: 'user', content: 'Now' },
    ]);
    expect(await session.getItems()).toEqual([
      { type: 'message', role: 'user', content: 'Earlier' },
    ]);
  });

  it('runs an agent exposed as a tool with the shared context', async () => {
    const innerModel = new FakeModel([
      fakeResponse([fakeModelMessage('Bonjour')]),
    ]);
    const translator = new Agent({
      name: 'Translator',
      model: innerModel,
    });
    const outerModel = new FakeModel([
      fakeResponse([
        fakeFunctionCall('translate', { input: 'Hello' }, 'call_1'),
      ]),
      fakeResponse([fakeModelMessage('It is Bonjour')]),
    ]);
    const orchestrator = new Agent({
      name: 'Orchestrator',
      model: outerModel,
      tools: [translator.asTool({ toolName: 'translate' })],
    });

    const result = await new Runner().run(orchestrator, 'Translate Hello');

    expect(result.finalOutput).toBe('It is Bonjour');
    expect(result.history[2]).toEqual({
      type: 'function_call_result',
      name: 'translate',
      callId: 'call_1',
      status: 'completed',
      output: { type: 'text', text: 'Bonjour' },
    });
    expect(result.newItems[1]?.type).toBe('tool_call_output_item');
    const outputItem = result.newItems[1];
    if (outputItem?.type === 'tool_call_output_item') {
      expect(outputItem.toolOrigin).toEqual({
        type: 'agent_as_tool',
        agentName: 'Translator',
      });
    }
    // the nested run shares the run context, so its request is counted too
    expect(result.usage.requests).toBe(3);
  });

  it('streams model text when asked to', async () => {
    const model = new FakeStreamingModel([
      fakeResponse([fakeFunctionCall('echo', { text: 'a' }, 'call_1')]),
      fakeResponse([fakeModelMessage('streamed')]),
    ]);
    const agent = new Agent({ name: 'Streamer', tools: [echoTool] });
    const runner = new Runner({ model });
    const deltas: string[] = [];
    runner.on('model_delta', (_context, _agent, delta) => {
      deltas.push(delta);
    });

    const result = await runner.run(agent, 'Go', { stream: true });

    expect(result.finalOutput).toBe('streamed');
    expect(deltas).toEqual(['streamed']);
    expect(model.streamedRequests).toBe(2);
    expect(result.usage.requests).toBe(2);
  });

  it('does not stream unless asked to', async () => {
    const model = new FakeStreamingModel([
      fakeResponse([fakeModelMessage('plain')]),
    ]);

    const result = await new Runner({ model }).run(
      new Agent({ name: 'Plain' }),
      'Go',
    );

    expect(result.finalOutput).toBe('plain');
    expect(model.streamedRequests).toBe(0);
  });
});
