import type { RouterConfig } from '../config.js';
import { resolveRouterConfig } from '../config.js';
import {
  CancellationError,
  TimeoutError,
  ToolInvocationError,
  UnknownRoleError,
  toTaskFailure,
  type RosterError
} from '../errors.js';
import type { HookRunner } from '../hooks/runner.js';
import type { LedgerWriter } from '../ledger/writer.js';
import type { RoleRegistry } from '../roles/registry.js';
import type { RoleTableDefaults } from '../roles/types.js';
import { ResultAggregator } from '../task/aggregator.js';
import { TaskStore } from '../task/store.js';
import { TERMINAL_STATUSES, type TaskContext, type TaskNode, type TaskOutcome } from '../task/types.js';
import type { ToolGateway } from '../tools/gateway.js';
import type { Logger } from '../../utils/logger.js';
import { quietLogger } from '../../utils/logger.js';
import { WorkerPool } from './pool.js';
import type { BatchOutcome, DelegationRequest, RoleRunner, RunOptions, RunOutcome, TaskScope } from './types.js';
import { checkDelegation, type DelegatorView } from './validator.js';

/** Source label for failures of the router's own ledger and hook plumbing. */
const BOOKKEEPING = 'task bookkeeping';

export interface DelegationRouterOptions {
  /** Explicit settings; they win over `table` and `env`. */
  config?: Partial<RouterConfig>;
  /** `defaults` of the role table the registry came from. */
  table?: RoleTableDefaults;
  /** Source of `ROSTER_*` overrides; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  ledger?: LedgerWriter;
  hooks?: HookRunner;
  /** Observes every task as it settles; descendants are reported before their ancestors. */
  onTaskResolved?: (info: { roleId: string; task: string; depth: number; outcome: TaskOutcome }) => void;
}

/**
 * Owns the task tree. Validates delegations, runs accepted ones on a bounded pool, and
 * suspends the delegating task until its children settle.
 *
 * A task holds a pool slot only while it is actually running: it gives the slot back
 * while suspended in `delegate`/`delegateMany` and queues for one again before resuming.
 */
export class DelegationRouter {
  readonly config: RouterConfig;
  private readonly store = new TaskStore();
  private readonly aggregator: ResultAggregator;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly holding = new Set<string>();
  private readonly suspensions = new Map<string, number>();

  constructor(
    private readonly registry: RoleRegistry,
    private readonly gateway: ToolGateway,
    private readonly runner: RoleRunner,
    private readonly opts: DelegationRouterOptions = {}
  ) {
    this.config = resolveRouterConfig({ env: opts.env ?? process.env, table: opts.table, overrides: opts.config ?? {} });
    this.pool = new WorkerPool(this.config.maxConcurrency);
    this.logger = opts.logger ?? quietLogger;
    this.aggregator = new ResultAggregator(this.store, {
      ledger: opts.ledger,
      onResolved: (node) => {
        this.releaseSlot(node.id);
        if (node.result) {
          opts.onTaskResolved?.({ roleId: node.roleId, task: node.task, depth: node.delegationDepth, outcome: node.result });
        }
      }
    });
    registry.seal();
  }

  /** Tasks currently tracked; settled tasks leave once their outcome is consumed. */
  get liveTasks(): number {
    return this.store.size;
  }

  /**
   * Entry point for callers outside the core. Always returns an outcome; per-task errors
   * come back as `ok: false` with the chain of roles that produced them.
   */
  async runRootTask(roleId: string, task: string, options: RunOptions = {}): Promise<RunOutcome> {
    if (!this.registry.has(roleId)) {
      const failure = toTaskFailure(new UnknownRoleError(roleId, this.registry.ids()), [roleId]);
      return { ok: false, roleId, error: failure, delegations: [] };
    }

    const role = this.registry.lookup(roleId);
    const root = this.store.create({ roleId, parentId: null, task, grant: role.capabilities });

    const onAbort = () => {
      void this.cancel(root.id, new CancellationError('Run was cancelled by the caller'));
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await this.opts.ledger?.append({ type: 'run_started', data: { taskId: root.id, role: roleId, task } });
      this.logger.info('run started', { role: roleId, task });
      if (options.signal?.aborted) onAbort();
      const outcome = await this.execute(root, options.timeoutMs);
      const delegations = [...root.delegations];
      await this.opts.ledger?.append({
        type: 'run_completed',
        data: { taskId: root.id, role: roleId, ok: outcome.ok, ...(outcome.ok ? {} : { kind: outcome.error.kind }) }
      });
      this.logger.info('run completed', { role: roleId, ok: outcome.ok });
      return outcome.ok
        ? { ok: true, roleId, value: outcome.value, delegations }
        : { ok: false, roleId, error: outcome.error, delegations };
    } catch (err) {
      const failure = toTaskFailure(err, this.store.chain(root.id), BOOKKEEPING);
      await this.failOnFault(root, err);
      return { ok: false, roleId, error: failure, delegations: [...root.delegations] };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      if (this.store.isTerminal(root.id)) this.aggregator.release(root.id);
    }
  }

  /**
   * Hands `task` to `targetRoleId` on behalf of `parent` and waits for the outcome. A
   * rejected delegation is returned as a failed outcome; the child is never created.
   */
  async delegate(
    parent: TaskContext,
    targetRoleId: string,
    task: string,
    requestedCapabilities?: string[],
    opts: { timeoutMs?: number } = {}
  ): Promise<TaskOutcome> {
    const request: DelegationRequest = { roleId: targetRoleId, task, capabilities: requestedCapabilities, timeoutMs: opts.timeoutMs };
    const accepted = await this.admit(parent, request);
    if (!accepted.ok) {
      this.aggregator.recordOn(parent.id, task, accepted.outcome);
      return accepted.outcome;
    }

    const outcome = await this.suspendWhile(parent.id, () => this.execute(accepted.child, request.timeoutMs));
    this.aggregator.recordOn(parent.id, task, outcome);
    this.aggregator.release(accepted.child.id);
    return outcome;
  }

  /**
   * Runs independent delegations side by side. Rejected requests fail in place; outcomes
   * come back in request order.
   */
  async delegateMany(parent: TaskContext, requests: DelegationRequest[]): Promise<BatchOutcome> {
    type Admitted =
      | { index: number; task: string; timeoutMs?: number; child: TaskNode; outcome: null }
      | { index: number; task: string; timeoutMs?: number; child: null; outcome: TaskOutcome };

    const admitted: Admitted[] = [];
    for (const [index, request] of requests.entries()) {
      const accepted = await this.admit(parent, request);
      admitted.push(
        accepted.ok
          ? { index, task: request.task, timeoutMs: request.timeoutMs, child: accepted.child, outcome: null }
          : { index, task: request.task, child: null, outcome: accepted.outcome }
      );
    }

    const settled = await this.suspendWhile(parent.id, () =>
      Promise.all(
        admitted.map(async (a) => ({
          index: a.index,
          task: a.task,
          outcome: a.child !== null ? await this.execute(a.child, a.timeoutMs) : a.outcome
        }))
      )
    );

    const batch = this.aggregator.resolveBatch(parent.id, settled);
    for (const a of admitted) if (a.child) this.aggregator.release(a.child.id);
    return batch;
  }

  /**
   * Cancels a task and everything below it. Open descendants settle as CancellationError
   * first, then the task itself with `reason`.
   */
  async cancel(taskId: string, reason: RosterError = new CancellationError()): Promise<boolean> {
    const node = this.store.find(taskId);
    if (!node || TERMINAL_STATUSES.has(node.status)) return false;
    this.logger.warn('task cancelled', { taskId, role: node.roleId, reason: reason.message });
    try {
      return await this.aggregator.resolve(taskId, {
        ok: false,
        roleId: node.roleId,
        error: toTaskFailure(reason, this.store.chain(taskId))
      });
    } catch (err) {
      // Settling happens before the ledger write, so only the audit entry is missing.
      this.logger.error('ledger write failed while cancelling', { taskId, error: String(err) });
      return true;
    }
  }

  // ── Admission ─────────────────────────────────────────────────────────────

  private async admit(
    from: TaskContext,
    request: DelegationRequest
  ): Promise<{ ok: true; child: TaskNode } | { ok: false; outcome: TaskOutcome }> {
    const parent = this.store.find(from.id);
    if (!parent || TERMINAL_STATUSES.has(parent.status) || parent.signal.aborted) {
      const err = new CancellationError(`Delegating task (${from.roleId}) is no longer active`);
      const chain = parent ? this.store.chain(parent.id) : [from.roleId];
      return { ok: false, outcome: { ok: false, roleId: request.roleId, error: toTaskFailure(err, [...chain, request.roleId]) } };
    }
    const parentId = parent.id;
    const chain = this.store.chain(parentId);

    const lineage: DelegatorView[] = [parent, ...this.store.ancestors(parentId)];
    const check = checkDelegation({ registry: this.registry, lineage, request, maxDepth: this.config.maxDepth });
    if (!check.ok) {
      this.logger.warn('delegation rejected', { from: parent.roleId, to: request.roleId, kind: check.error.kind, message: check.error.message });
      let rejection: unknown = check.error;
      try {
        await this.opts.ledger?.append({
          type: 'delegation_rejected',
          data: { parentId, from: parent.roleId, to: request.roleId, task: request.task, kind: check.error.kind, message: check.error.message }
        });
      } catch (err) {
        rejection = err;
      }
      return {
        ok: false,
        outcome: { ok: false, roleId: request.roleId, error: toTaskFailure(rejection, [...chain, request.roleId], BOOKKEEPING) }
      };
    }

    const child = this.store.create({ roleId: request.roleId, parentId, task: request.task, grant: check.grant });
    if (parent.status === 'running') this.store.transition(parentId, 'delegated');

    this.logger.debug('delegated', { from: parent.roleId, to: child.roleId, depth: child.delegationDepth, grant: check.grant.toString() });
    try {
      await this.opts.ledger?.append({
        type: 'task_created',
        data: { taskId: child.id, parentId, role: child.roleId, task: child.task, depth: child.delegationDepth, grant: check.grant.kinds() }
      });
      await this.opts.ledger?.append({ type: 'task_delegated', data: { taskId: parentId, childId: child.id, role: parent.roleId } });
    } catch (err) {
      const failure = toTaskFailure(err, this.store.chain(child.id), BOOKKEEPING);
      await this.failOnFault(child, err);
      this.aggregator.release(child.id);
      return { ok: false, outcome: { ok: false, roleId: child.roleId, error: failure } };
    }
    return { ok: true, child };
  }

  // ── Execution ─────────────────────────────────────────────────────────────

  /**
   * Schedules `node` and resolves with its outcome, however it ends. Without its own
   * deadline a task gets the configured default, if any.
   */
  private execute(node: TaskNode, ownTimeoutMs: number | undefined): Promise<TaskOutcome> {
    const settled = this.aggregator.watch(node.id);
    const timeoutMs = ownTimeoutMs ?? this.config.defaultTimeoutMs;
    if (timeoutMs !== undefined && !TERMINAL_STATUSES.has(node.status)) {
      node.deadline = setTimeout(() => {
        void this.cancel(node.id, new TimeoutError(timeoutMs));
      }, timeoutMs);
    }
    void this.drive(node);
    return settled;
  }

  private async drive(node: TaskNode): Promise<void> {
    await this.acquireSlot(node.id);
    try {
      if (TERMINAL_STATUSES.has(node.status)) return;
      this.store.transition(node.id, 'running');
      await this.opts.ledger?.append({ type: 'task_started', data: { taskId: node.id, role: node.roleId, depth: node.delegationDepth } });
      await this.opts.hooks?.fire({ trigger: 'before_task', roleId: node.roleId, task: node.task });

      let value: unknown;
      try {
        value = await this.runner.run(this.scopeFor(node));
      } catch (err) {
        if (TERMINAL_STATUSES.has(node.status)) return;
        const failure = toTaskFailure(err, this.store.chain(node.id));
        await this.opts.hooks?.fire({ trigger: 'on_error', roleId: node.roleId, task: node.task, error: failure.message });
        await this.aggregator.resolve(node.id, { ok: false, roleId: node.roleId, error: failure });
        return;
      }
      if (TERMINAL_STATUSES.has(node.status)) return;
      await this.aggregator.resolve(node.id, { ok: true, roleId: node.roleId, value });
      await this.opts.hooks?.fire({ trigger: 'after_task', roleId: node.roleId, task: node.task });
    } catch (err) {
      await this.failOnFault(node, err);
    } finally {
      this.releaseSlot(node.id);
    }
  }

  /**
   * Settles `node` after its ledger or hook plumbing threw. A second ledger failure while
   * recording that is logged; the task is settled either way.
   */
  private async failOnFault(node: TaskNode, err: unknown): Promise<void> {
    this.logger.error('task bookkeeping failed', { taskId: node.id, role: node.roleId, error: String(err) });
    try {
      await this.aggregator.resolve(node.id, {
        ok: false,
        roleId: node.roleId,
        error: toTaskFailure(err, this.store.chain(node.id), BOOKKEEPING)
      });
    } catch (again) {
      this.logger.error('ledger write failed while settling', { taskId: node.id, error: String(again) });
    }
  }

  /**
   * One tool call for `node`. When an idempotent tool fails, that call alone is issued
   * again, up to `maxRetries` times; nothing else the task did is repeated.
   */
  private async invoke(node: TaskNode, kind: string, args: unknown): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.gateway.invoke(node, kind, args);
      } catch (err) {
        if (!this.shouldRetry(node, err, attempt)) throw err;
        this.logger.warn('retrying idempotent tool call', { taskId: node.id, role: node.roleId, kind, attempt: attempt + 1 });
        await this.opts.ledger?.append({ type: 'tool_retried', data: { taskId: node.id, role: node.roleId, kind, attempt: attempt + 1 } });
      }
    }
  }

  private shouldRetry(node: TaskNode, err: unknown, attempt: number): boolean {
    return (
      err instanceof ToolInvocationError &&
      err.idempotent &&
      !TERMINAL_STATUSES.has(node.status) &&
      !node.signal.aborted &&
      attempt < this.config.maxRetries
    );
  }

  private scopeFor(node: TaskNode): TaskScope {
    const role = this.registry.lookup(node.roleId);
    return {
      role,
      task: node.task,
      depth: node.delegationDepth,
      capabilities: node.grant,
      signal: node.signal,
      invoke: (kind, args) => this.invoke(node, kind, args),
      delegate: (roleId, task, o = {}) => this.delegate(node, roleId, task, o.capabilities, { timeoutMs: o.timeoutMs }),
      delegateMany: (requests) => this.delegateMany(node, requests),
      results: () => [...node.delegations]
    };
  }

  // ── Pool slots ────────────────────────────────────────────────────────────

  private async acquireSlot(taskId: string): Promise<void> {
    await this.pool.acquire();
    if (this.store.isTerminal(taskId) || this.holding.has(taskId)) {
      this.pool.release();
      return;
    }
    this.holding.add(taskId);
  }

  private releaseSlot(taskId: string): void {
    if (!this.holding.delete(taskId)) return;
    this.pool.release();
  }

  private async suspendWhile<T>(taskId: string, fn: () => Promise<T>): Promise<T> {
    const depth = (this.suspensions.get(taskId) ?? 0) + 1;
    this.suspensions.set(taskId, depth);
    if (depth === 1) this.releaseSlot(taskId);
    try {
      return await fn();
    } finally {
      const left = (this.suspensions.get(taskId) ?? 1) - 1;
      if (left > 0) {
        this.suspensions.set(taskId, left);
      } else {
        this.suspensions.delete(taskId);
        if (!this.store.isTerminal(taskId)) await this.acquireSlot(taskId);
      }
    }
  }
}
