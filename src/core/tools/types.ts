import type { TaskContext } from '../task/types.js';

/**
 * An external operation bound to exactly one capability kind. Only the gateway holds these.
 */
export interface ToolDefinition<A = unknown, R = unknown> {
  kind: string;
  /** Safe to repeat after a failure; the router retries only idempotent failures. */
  idempotent: boolean;
  run(ctx: TaskContext, args: A): Promise<R> | R;
  /**
   * Path the call acts on, checked against path-scoped grants. Defaults to `args.path`
   * when that is a string.
   */
  target?(args: A): string | undefined;
}

export function defineTool<A, R>(def: ToolDefinition<A, R>): ToolDefinition<A, R> {
  return def;
}

export function defaultTarget(args: unknown): string | undefined {
  if (args && typeof args === 'object' && 'path' in args && typeof args.path === 'string') return args.path;
  return undefined;
}
