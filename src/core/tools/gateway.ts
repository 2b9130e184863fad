import { CancellationError, CapabilityDeniedError, StepBudgetExceededError, ToolInvocationError } from '../errors.js';
import type { HookRunner } from '../hooks/runner.js';
import type { LedgerWriter } from '../ledger/writer.js';
import type { RoleRegistry } from '../roles/registry.js';
import { TERMINAL_STATUSES, type GatewayDecision, type TaskContext } from '../task/types.js';
import type { Logger } from '../../utils/logger.js';
import { quietLogger } from '../../utils/logger.js';
import { defaultTarget, type ToolDefinition } from './types.js';

export interface AuditedContext extends TaskContext {
  readonly audit: GatewayDecision[];
}

export interface ToolGatewayOptions {
  logger?: Logger;
  ledger?: LedgerWriter;
  hooks?: HookRunner;
}

/**
 * The only path from a task to an external operation. Each call is checked against the
 * caller's role and grant before the tool is touched; denied calls have no side effects.
 * Every granted call counts against the role's `maxSteps` for that task.
 */
export class ToolGateway {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: RoleRegistry,
    tools: Iterable<ToolDefinition> = [],
    private readonly opts: ToolGatewayOptions = {}
  ) {
    for (const t of tools) {
      if (this.tools.has(t.kind)) throw new Error(`Tool for '${t.kind}' is already registered`);
      this.tools.set(t.kind, t);
    }
    this.logger = opts.logger ?? quietLogger;
  }

  kinds(): string[] {
    return Array.from(this.tools.keys());
  }

  isIdempotent(kind: string): boolean {
    return this.tools.get(kind)?.idempotent ?? false;
  }

  /** Calls for one context run strictly one after another, in call order. */
  invoke(ctx: AuditedContext, kind: string, args: unknown): Promise<unknown> {
    const prev = this.queues.get(ctx.id) ?? Promise.resolve();
    const run = prev.then(
      () => this.invokeNow(ctx, kind, args),
      () => this.invokeNow(ctx, kind, args)
    );
    this.queues.set(ctx.id, run);
    const clear = () => {
      if (this.queues.get(ctx.id) === run) this.queues.delete(ctx.id);
    };
    void run.then(clear, clear);
    return run;
  }

  private async invokeNow(ctx: AuditedContext, kind: string, args: unknown): Promise<unknown> {
    const tool = this.tools.get(kind);
    const target = tool?.target ? tool.target(args) : defaultTarget(args);

    if (TERMINAL_STATUSES.has(ctx.status) || ctx.signal.aborted) {
      const err = new CancellationError(`Task is no longer active; ${kind} refused`);
      await this.record(ctx, { kind, decision: 'denied', target, error: err.kind });
      throw err;
    }

    const role = this.registry.lookup(ctx.roleId);
    if (!role.capabilities.permits(kind, target) || !ctx.grant.permits(kind, target)) {
      const err = new CapabilityDeniedError(ctx.roleId, [kind], target !== undefined ? `target '${target}'` : undefined);
      this.logger.warn('capability denied', { taskId: ctx.id, role: ctx.roleId, kind, target });
      await this.record(ctx, { kind, decision: 'denied', target, error: err.kind });
      throw err;
    }

    if (role.maxSteps !== undefined && stepsTaken(ctx) >= role.maxSteps) {
      const err = new StepBudgetExceededError(ctx.roleId, role.maxSteps);
      this.logger.warn('step budget exhausted', { taskId: ctx.id, role: ctx.roleId, kind, maxSteps: role.maxSteps });
      await this.record(ctx, { kind, decision: 'denied', target, error: err.kind });
      throw err;
    }

    await this.record(ctx, { kind, decision: 'granted', target });
    if (!tool) throw new ToolInvocationError(kind, new Error(`no tool registered for '${kind}'`));

    const hooks = this.opts.hooks;
    await hooks?.fire({ trigger: 'before_tool', roleId: ctx.roleId, task: ctx.task, tool: kind, toolArgs: args });
    try {
      const result = await tool.run(ctx, args);
      await hooks?.fire({ trigger: 'after_tool', roleId: ctx.roleId, task: ctx.task, tool: kind, toolArgs: args });
      return result;
    } catch (cause) {
      const err = new ToolInvocationError(kind, cause, tool.idempotent);
      this.logger.debug('tool failed', { taskId: ctx.id, role: ctx.roleId, kind, error: err.message });
      await hooks?.fire({ trigger: 'on_error', roleId: ctx.roleId, task: ctx.task, tool: kind, toolArgs: args, error: err.message });
      throw err;
    }
  }

  private async record(ctx: AuditedContext, d: Omit<GatewayDecision, 'atIso'>): Promise<void> {
    const decision: GatewayDecision = { ...d, atIso: new Date().toISOString() };
    ctx.audit.push(decision);
    await this.opts.ledger?.append({
      type: d.decision === 'granted' ? 'tool_invoked' : 'tool_denied',
      data: {
        taskId: ctx.id,
        role: ctx.roleId,
        kind: d.kind,
        ...(d.target !== undefined ? { target: d.target } : {}),
        ...(d.error ? { error: d.error } : {})
      }
    });
  }
}

function stepsTaken(ctx: AuditedContext): number {
  return ctx.audit.filter((d) => d.decision === 'granted').length;
}
