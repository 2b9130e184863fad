import { CancellationError, toTaskFailure } from '../errors.js';
import type { LedgerWriter } from '../ledger/writer.js';
import type { BatchOutcome } from '../delegation/types.js';
import type { TaskStore } from './store.js';
import { TERMINAL_STATUSES, type TaskNode, type TaskOutcome } from './types.js';

export interface ResultAggregatorOptions {
  ledger?: LedgerWriter;
  /** Called synchronously as each task settles, descendants before their ancestors. */
  onResolved?: (node: TaskNode) => void;
}

interface Waiter {
  promise: Promise<TaskOutcome>;
  resolve: (outcome: TaskOutcome) => void;
}

/**
 * Settles tasks and hands their outcomes to whoever is suspended on them. Failures are
 * delivered as values; the waiting parent decides what to do with them.
 */
export class ResultAggregator {
  private readonly waiters = new Map<string, Waiter>();

  constructor(
    private readonly store: TaskStore,
    private readonly opts: ResultAggregatorOptions = {}
  ) {}

  /** Promise for the outcome of `taskId`; the same promise on every call. */
  watch(taskId: string): Promise<TaskOutcome> {
    const existing = this.waiters.get(taskId);
    if (existing) return existing.promise;

    const node = this.store.get(taskId);
    if (node.result) return Promise.resolve(node.result);

    let resolve: (outcome: TaskOutcome) => void = () => {};
    const promise = new Promise<TaskOutcome>((r) => {
      resolve = r;
    });
    this.waiters.set(taskId, { promise, resolve });
    return promise;
  }

  /**
   * Settles `taskId` with `outcome` after settling every still-open descendant as cancelled.
   * Returns false when the task had already settled.
   */
  async resolve(taskId: string, outcome: TaskOutcome): Promise<boolean> {
    const node = this.store.find(taskId);
    if (!node || TERMINAL_STATUSES.has(node.status)) return false;

    const settled: TaskNode[] = [];
    for (const d of this.store.descendants(taskId)) {
      if (TERMINAL_STATUSES.has(d.status)) continue;
      const cancelled = new CancellationError(`Cancelled with its delegator (${node.roleId})`);
      settled.push(this.settle(d, { ok: false, roleId: d.roleId, error: toTaskFailure(cancelled, this.store.chain(d.id)) }));
    }
    settled.push(this.settle(node, outcome));

    for (const n of settled) {
      const result = n.result;
      if (!result) continue;
      await this.opts.ledger?.append({
        type: 'task_resolved',
        data: {
          taskId: n.id,
          role: n.roleId,
          status: result.ok ? 'succeeded' : 'failed',
          ...(result.ok ? {} : { kind: result.error.kind, message: result.error.message })
        }
      });
    }
    return true;
  }

  /**
   * Orders child outcomes by request index and records them on the parent. Indexes are
   * positions in the original request list.
   */
  resolveBatch(parentId: string, childOutcomes: Array<{ index: number; task: string; outcome: TaskOutcome }>): BatchOutcome {
    const ordered = [...childOutcomes].sort((a, b) => a.index - b.index);
    for (const c of ordered) this.recordOn(parentId, c.task, c.outcome);

    const outcomes = ordered.map((c) => c.outcome);
    const succeeded = outcomes.filter((o) => o.ok).length;
    return { outcomes, succeeded, failed: outcomes.length - succeeded, ok: succeeded === outcomes.length };
  }

  /** Appends one consumed outcome to the parent's delegation summary. */
  recordOn(parentId: string, task: string, outcome: TaskOutcome): void {
    const parent = this.store.find(parentId);
    if (!parent) return;
    parent.delegations.push(
      outcome.ok
        ? { roleId: outcome.roleId, task, ok: true }
        : { roleId: outcome.roleId, task, ok: false, kind: outcome.error.kind }
    );
  }

  /** The parent has taken the outcome; the child can go. */
  release(taskId: string): void {
    this.waiters.delete(taskId);
    this.store.evict(taskId);
  }

  private settle(node: TaskNode, outcome: TaskOutcome): TaskNode {
    this.store.settle(node.id, outcome);
    if (!outcome.ok && !node.controller.signal.aborted) node.controller.abort(outcome.error.kind);
    this.opts.onResolved?.(node);
    this.waiters.get(node.id)?.resolve(outcome);
    return node;
  }
}
