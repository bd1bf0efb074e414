import { afterEach, describe, expect, it, vi } from 'vitest';
import { Agent } from '../src/agent';
import { RunToolApprovalItem } from '../src/items';
import logger from '../src/logger';
import { RunContext } from '../src/runContext';
import { fakeFunctionCall } from './stubs';

const agent = new Agent({ name: 'A' });

function createApproval(callId = '123', toolName = 'toolX') {
  return new RunToolApprovalItem(fakeFunctionCall(toolName, {}, callId), agent);
}

describe('RunContext', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults to an empty context and zero usage', () => {
    const ctx = new RunContext();
    expect(ctx.context).toEqual({});
    expect(ctx.usage.requests).toBe(0);
  });

  it('reports undefined until a decision is made', () => {
    const ctx = new RunContext();
    expect(ctx.isToolApproved({ toolName: 'toolX', callId: '123' })).toBe(
      undefined,
    );
  });

  it('approves and rejects individual calls', () => {
    const ctx = new RunContext();
    ctx.approveTool(createApproval('a'));
    ctx.rejectTool(createApproval('b'));

    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'a' })).toBe(true);
    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'b' })).toBe(false);
    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'c' })).toBe(
      undefined,
    );
  });

  it('moves a call from rejected to approved', () => {
    const ctx = new RunContext();
    const item = createApproval('a');
    ctx.rejectTool(item);
    ctx.approveTool(item);

    expect(ctx.toJSON().approvals).toEqual({
      toolX: { approved: ['a'], rejected: [] },
    });
  });

  it('applies always decisions to every call of the tool', () => {
    const ctx = new RunContext();
    ctx.approveTool(createApproval(), { alwaysApprove: true });
    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'other' })).toBe(
      true,
    );

    ctx.rejectTool(createApproval(), { alwaysReject: true });
    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'other' })).toBe(
      false,
    );
  });

  it('lets approval win over a conflicting rejection', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const ctx = new RunContext();
    ctx._rebuildApprovals({ toolX: { approved: ['a'], rejected: ['a'] } });

    expect(ctx.isToolApproved({ toolName: 'toolX', callId: 'a' })).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      'Tool call a is both approved and rejected at the same time. Approval takes precedence',
    );
  });

  it('merges approvals without discarding existing entries', () => {
    const ctx = new RunContext();
    ctx.approveTool(createApproval('a'));
    ctx._mergeApprovals({
      toolX: { approved: ['b'], rejected: ['c'] },
      other: { approved: true, rejected: [] },
    });

    expect(ctx.toJSON().approvals).toEqual({
      toolX: { approved: ['a', 'b'], rejected: ['c'] },
      other: { approved: true, rejected: [] },
    });
  });

  it('serializes the context, usage and approvals', () => {
    const ctx = new RunContext({ userId: 'u1' });
    ctx.approveTool(createApproval('a'));

    const json = ctx.toJSON();
    expect(json.context).toEqual({ userId: 'u1' });
    expect(json.usage.requests).toBe(0);
    expect(json.approvals).toEqual({
      toolX: { approved: ['a'], rejected: [] },
    });
  });
});
