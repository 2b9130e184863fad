export type ErrorKind =
  | 'UnknownRole'
  | 'DuplicateRole'
  | 'CapabilityDenied'
  | 'DelegationLoop'
  | 'DepthExceeded'
  | 'StepBudgetExceeded'
  | 'CancellationError'
  | 'TimeoutError'
  | 'ToolInvocationError';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'UnknownRole',
  'DuplicateRole',
  'CapabilityDenied',
  'DelegationLoop',
  'DepthExceeded',
  'StepBudgetExceeded',
  'CancellationError',
  'TimeoutError',
  'ToolInvocationError'
];

export class RosterError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class UnknownRoleError extends RosterError {
  constructor(readonly roleId: string, known: string[] = []) {
    super(
      'UnknownRole',
      known.length ? `Unknown role '${roleId}'. Available: ${known.join(', ')}` : `Unknown role '${roleId}'`
    );
  }
}

export class DuplicateRoleError extends RosterError {
  constructor(readonly roleId: string) {
    super('DuplicateRole', `Role '${roleId}' is already registered`);
  }
}

export class CapabilityDeniedError extends RosterError {
  constructor(
    readonly roleId: string,
    readonly capabilities: string[],
    detail?: string
  ) {
    super(
      'CapabilityDenied',
      `Role '${roleId}' is not permitted ${capabilities.join(', ')}${detail ? ` (${detail})` : ''}`
    );
  }
}

export class DelegationLoopError extends RosterError {
  constructor(readonly roleId: string, task: string) {
    super('DelegationLoop', `Role '${roleId}' is already working on '${task}' further up the delegation chain`);
  }
}

export class DepthExceededError extends RosterError {
  constructor(readonly depth: number, readonly maxDepth: number) {
    super('DepthExceeded', `Delegation depth ${depth} exceeds the maximum of ${maxDepth}`);
  }
}

export class StepBudgetExceededError extends RosterError {
  constructor(readonly roleId: string, readonly maxSteps: number) {
    super('StepBudgetExceeded', `Role '${roleId}' has used its budget of ${maxSteps} tool calls`);
  }
}

export class CancellationError extends RosterError {
  constructor(reason = 'Task was cancelled') {
    super('CancellationError', reason);
  }
}

export class TimeoutError extends RosterError {
  constructor(readonly timeoutMs: number) {
    super('TimeoutError', `Task exceeded its deadline of ${timeoutMs}ms`);
  }
}

/**
 * Failure of an external collaborator (tool or role runner). The original error is kept
 * as `cause`, untouched.
 */
export class ToolInvocationError extends RosterError {
  constructor(
    readonly operation: string,
    cause: unknown,
    readonly idempotent: boolean = false
  ) {
    super('ToolInvocationError', `${operation} failed: ${describeCause(cause)}`, { cause });
  }
}

export interface TaskFailure {
  kind: ErrorKind;
  message: string;
  /** Role ids from the root down to the context that failed. */
  chain: string[];
}

export function isRosterError(err: unknown): err is RosterError {
  return err instanceof RosterError;
}

/**
 * Maps any thrown value onto the taxonomy. Errors from outside it are reported as a
 * failure of `source`, the collaborator they came out of.
 */
export function toTaskFailure(err: unknown, chain: string[], source: string = 'role runner'): TaskFailure {
  if (isRosterError(err)) return { kind: err.kind, message: err.message, chain };
  const wrapped = new ToolInvocationError(source, err);
  return { kind: wrapped.kind, message: wrapped.message, chain };
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause);
  } catch {
    return String(cause);
  }
}
