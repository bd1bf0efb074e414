import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Agent } from '../src/agent';
import { ModelBehaviorError } from '../src/errors';
import { handoff } from '../src/handoff';
import {
  RunHandoffCallItem,
  RunMessageOutputItem,
  RunToolApprovalItem,
  RunToolCallItem,
} from '../src/items';
import { processModelResponse } from '../src/runner/modelOutputs';
import {
  hostedTool,
  protocolServerTool,
  shellTool,
  tool,
  JSON_TOOL_CALL_NAME,
} from '../src/tool';
import {
  echoTool,
  fakeFunctionCall,
  fakeModelMessage,
  fakeResponse,
} from './stubs';

const target = new Agent({ name: 'Target' });

describe('processModelResponse', () => {
  it('classifies messages, function calls and handoffs', () => {
    const agent = new Agent({
      name: 'Router',
      tools: [echoTool],
      handoffs: [target],
    });
    const handoffs = agent.getEnabledHandoffs();
    const response = fakeResponse([
      fakeModelMessage('thinking out loud'),
      fakeFunctionCall('echo', { text: 'hi' }, 'call_1'),
      fakeFunctionCall('transfer_to_Target', {}, 'call_2'),
    ]);

    const processed = processModelResponse(
      response,
      agent,
      [echoTool],
      handoffs,
    );

    expect(processed.newItems).toHaveLength(3);
    expect(processed.newItems[0]).toBeInstanceOf(RunMessageOutputItem);
    expect(processed.newItems[1]).toBeInstanceOf(RunToolCallItem);
    expect(processed.newItems[2]).toBeInstanceOf(RunHandoffCallItem);
    expect(processed.functions.map((run) => run.toolCall.callId)).toEqual([
      'call_1',
    ]);
    expect(processed.handoffs.map((run) => run.handoff.agentName)).toEqual([
      'Target',
    ]);
    expect(processed.toolsUsed).toEqual(['echo', 'transfer_to_Target']);
    expect(processed.hasToolsOrApprovalsToRun()).toBe(true);
  });

  it('prefers a handoff over a function tool with the same name', () => {
    const clash = tool({
      name: 'transfer_to_Target',
      description: 'not a handoff',
      parameters: z.object({}),
      execute: async () => 'tool',
    });
    const agent = new Agent({ name: 'Router', handoffs: [target] });
    const processed = processModelResponse(
      fakeResponse([fakeFunctionCall('transfer_to_Target', {}, 'call_1')]),
      agent,
      [clash],
      agent.getEnabledHandoffs(),
    );

    expect(processed.handoffs).toHaveLength(1);
    expect(processed.functions).toHaveLength(0);
  });

  it('fails the response on an unknown tool', () => {
    const agent = new Agent({ name: 'Solo' });
    expect(() =>
      processModelResponse(
        fakeResponse([fakeFunctionCall('missing', {}, 'call_1')]),
        agent,
        [],
        [],
      ),
    ).toThrow(new ModelBehaviorError('Tool missing not found in agent Solo.'));
  });

  it('routes the json tool call only for structured output agents', () => {
    const structured = new Agent({
      name: 'Structured',
      outputType: z.object({ answer: z.string() }),
    });
    const processed = processModelResponse(
      fakeResponse([
        fakeFunctionCall(JSON_TOOL_CALL_NAME, { answer: 'yes' }, 'call_1'),
      ]),
      structured,
      [],
      [],
    );
    expect(processed.functions[0]?.tool.name).toBe(JSON_TOOL_CALL_NAME);

    const plain = new Agent({ name: 'Plain' });
    expect(() =>
      processModelResponse(
        fakeResponse([fakeFunctionCall(JSON_TOOL_CALL_NAME, {}, 'call_1')]),
        plain,
        [],
        [],
      ),
    ).toThrow(ModelBehaviorError);
  });

  it('routes action calls to the tool that owns them', () => {
    const shell = shellTool({ run: async () => 'ok' });
    const agent = new Agent({ name: 'Ops', tools: [shell] });
    const processed = processModelResponse(
      fakeResponse([
        { type: 'shell_call', callId: 'sh_1', action: { commands: ['ls'] } },
      ]),
      agent,
      [shell],
      [],
    );

    expect(processed.actions).toHaveLength(1);
    expect(processed.actions[0]?.tool).toBe(shell);
    expect(processed.toolsUsed).toEqual(['shell']);
  });

  it('fails an action call without a matching tool', () => {
    const agent = new Agent({ name: 'Ops' });
    expect(() =>
      processModelResponse(
        fakeResponse([
          { type: 'computer_call', callId: 'c_1', action: { type: 'click' } },
        ]),
        agent,
        [],
        [],
      ),
    ).toThrow(
      'Model produced computer_call but agent Ops has no computer tool.',
    );
  });

  it('records hosted tool calls with their origin', () => {
    const agent = new Agent({ name: 'Searcher' });
    const processed = processModelResponse(
      fakeResponse([
        {
          type: 'hosted_tool_call',
          name: 'lookup',
          serverLabel: 'docs',
          status: 'completed',
        },
      ]),
      agent,
      [hostedTool({ name: 'lookup' })],
      [],
    );

    const [item] = processed.newItems;
    expect(item).toBeInstanceOf(RunToolCallItem);
    if (item instanceof RunToolCallItem) {
      expect(item.toolOrigin).toEqual({
        type: 'protocol_tool',
        serverName: 'docs',
      });
    }
    expect(processed.hasToolsOrApprovalsToRun()).toBe(false);
  });

  it('records protocol approval requests when the server interrupts on approval', () => {
    const server = protocolServerTool({
      serverLabel: 'docs',
      requireApproval: 'always',
      interruptOnApproval: true,
    });
    const agent = new Agent({ name: 'Searcher', tools: [server] });
    const processed = processModelResponse(
      fakeResponse([
        {
          type: 'protocol_approval_request',
          id: 'apr_1',
          serverLabel: 'docs',
          name: 'delete_page',
          arguments: '{}',
        },
      ]),
      agent,
      [server],
      [],
    );

    expect(processed.newItems).toHaveLength(1);
    expect(processed.newItems[0]).toBeInstanceOf(RunToolApprovalItem);
    expect(processed.protocolApprovalRequests).toHaveLength(1);
    expect(processed.protocolApprovalRequests[0]?.requestItem.callId).toBe(
      'apr_1',
    );
  });

  it('skips unknown items', () => {
    const agent = new Agent({ name: 'Solo' });
    const processed = processModelResponse(
      fakeResponse([{ type: 'unknown', payload: { kind: 'future' } }]),
      agent,
      [],
      [],
    );
    expect(processed.newItems).toEqual([]);
  });

  it('uses custom handoff tool names', () => {
    const custom = handoff(target, { toolNameOverride: 'escalate' });
    const agent = new Agent({ name: 'Router', handoffs: [custom] });
    const processed = processModelResponse(
      fakeResponse([fakeFunctionCall('escalate', {}, 'call_1')]),
      agent,
      [],
      agent.getEnabledHandoffs(),
    );
    expect(processed.handoffs[0]?.handoff).toBe(custom);
  });
});
