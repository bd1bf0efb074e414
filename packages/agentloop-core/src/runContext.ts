import type { RunToolApprovalItem } from './items';
import logger from './logger';
import type { UnknownContext } from './types';
import { Usage } from './usage';

/**
 * Decisions recorded for one tool. `true` applies to every call of the tool, a list applies to
 * the listed call ids only.
 */
export type ApprovalRecord = {
  approved: boolean | string[];
  rejected: boolean | string[];
};

/**
 * Serialized shape of a run context.
 */
export type RunContextJSON<TContext = UnknownContext> = {
  context: TContext;
  usage: ReturnType<Usage['toJSON']>;
  approvals: Record<string, ApprovalRecord>;
};

function cloneRecord(record: ApprovalRecord): ApprovalRecord {
  return {
    approved: Array.isArray(record.approved)
      ? [...record.approved]
      : record.approved,
    rejected: Array.isArray(record.rejected)
      ? [...record.rejected]
      : record.rejected,
  };
}

function mergeDecision(
  current: boolean | string[],
  incoming: boolean | string[],
): boolean | string[] {
  if (current === true || incoming === true) {
    return true;
  }
  const merged = new Set<string>([
    ...(Array.isArray(current) ? current : []),
    ...(Array.isArray(incoming) ? incoming : []),
  ]);
  return [...merged];
}

/**
 * A context object that is passed to the `Runner.run()` method. It carries the user provided
 * context, the usage accumulated over the run and the approval ledger that decides whether gated
 * tool calls may run.
 */
export class RunContext<TContext = UnknownContext> {
  /**
   * The context object passed by you to the `Runner.run()` method.
   */
  context: TContext;

  /**
   * The usage of the agent run so far. For streamed responses, the usage will be stale until the
   * last chunk of the stream is processed.
   */
  usage: Usage;

  /**
   * A map of tool names to whether they have been approved.
   */
  #approvals: Map<string, ApprovalRecord>;

  constructor(context: TContext = {} as TContext) {
    this.context = context;
    this.usage = new Usage();
    this.#approvals = new Map();
  }

  /**
   * Rebuild the approvals map from a serialized state.
   * @internal
   */
  _rebuildApprovals(approvals: Record<string, ApprovalRecord>) {
    this.#approvals = new Map(
      Object.entries(approvals).map(([toolName, record]) => [
        toolName,
        cloneRecord(record),
      ]),
    );
  }

  /**
   * Merge approvals into the current ledger without discarding decisions that were already made.
   * @internal
   */
  _mergeApprovals(approvals: Record<string, ApprovalRecord>) {
    for (const [toolName, record] of Object.entries(approvals)) {
      const existing = this.#approvals.get(toolName);
      if (!existing) {
        this.#approvals.set(toolName, cloneRecord(record));
        continue;
      }
      this.#approvals.set(toolName, {
        approved: mergeDecision(existing.approved, record.approved),
        rejected: mergeDecision(existing.rejected, record.rejected),
      });
    }
  }

  /**
   * Check if a tool call has been approved.
   *
   * @returns `true` if approved, `false` if rejected and `undefined` if no decision was made yet.
   */
  isToolApproved({
    toolName,
    callId,
  }: {
    toolName: string;
    callId: string;
  }): boolean | undefined {
    const approvalEntry = this.#approvals.get(toolName);
    if (approvalEntry?.approved === true && approvalEntry.rejected === true) {
      logger.warn(
        'Tool is permanently approved and rejected at the same time. Approval takes precedence',
      );
      return true;
    }

    if (approvalEntry?.approved === true) {
      return true;
    }

    if (approvalEntry?.rejected === true) {
      return false;
    }

    const individualCallApproval = Array.isArray(approvalEntry?.approved)
      ? approvalEntry.approved.includes(callId)
      : false;
    const individualCallRejection = Array.isArray(approvalEntry?.rejected)
      ? approvalEntry.rejected.includes(callId)
      : false;

    if (individualCallApproval && individualCallRejection) {
      logger.warn(
        `Tool call ${callId} is both approved and rejected at the same time. Approval takes precedence`,
      );
      return true;
    }

    if (individualCallApproval) {
      return true;
    }

    if (individualCallRejection) {
      return false;
    }

    return undefined;
  }

  /**
   * Approve a tool call.
   *
   * @param approvalItem - The tool approval item to approve.
   * @param options - Set `alwaysApprove` to approve every future call of the same tool.
   */
  approveTool(
    approvalItem: RunToolApprovalItem,
    { alwaysApprove = false }: { alwaysApprove?: boolean } = {},
  ) {
    const toolName = approvalItem.toolName;
    if (alwaysApprove) {
      this.#approvals.set(toolName, {
        approved: true,
        rejected: [],
      });
      return;
    }

    const approvalEntry: ApprovalRecord = this.#approvals.get(toolName) ?? {
      approved: [],
      rejected: [],
    };
    if (Array.isArray(approvalEntry.approved)) {
      approvalEntry.approved.push(approvalItem.callId);
    }
    if (Array.isArray(approvalEntry.rejected)) {
      approvalEntry.rejected = approvalEntry.rejected.filter(
        (id) => id !== approvalItem.callId,
      );
    }
    this.#approvals.set(toolName, approvalEntry);
  }

  /**
   * Reject a tool call.
   *
   * @param approvalItem - The tool approval item to reject.
   * @param options - Set `alwaysReject` to reject every future call of the same tool.
   */
  rejectTool(
    approvalItem: RunToolApprovalItem,
    { alwaysReject = false }: { alwaysReject?: boolean } = {},
  ) {
    const toolName = approvalItem.toolName;
    if (alwaysReject) {
      this.#approvals.set(toolName, {
        approved: false,
        rejected: true,
      });
      return;
    }

    const approvalEntry: ApprovalRecord = this.#approvals.get(toolName) ?? {
      approved: [],
      rejected: [],
    };

    if (Array.isArray(approvalEntry.rejected)) {
      approvalEntry.rejected.push(approvalItem.callId);
    }
    if (Array.isArray(approvalEntry.approved)) {
      approvalEntry.approved = approvalEntry.approved.filter(
        (id) => id !== approvalItem.callId,
      );
    }
    this.#approvals.set(toolName, approvalEntry);
  }

  toJSON(): RunContextJSON<TContext> {
    return {
      context: this.context,
      usage: this.usage.toJSON(),
      approvals: Object.fromEntries(
        [...this.#approvals.entries()].map(([toolName, record]) => [
          toolName,
          cloneRecord(record),
        ]),
      ),
    };
  }
}
