import type { CapabilitySet } from '../capability/set.js';
import type { TaskFailure } from '../errors.js';

export type TaskStatus = 'pending' | 'running' | 'delegated' | 'succeeded' | 'failed';

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(['succeeded', 'failed']);

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['delegated', 'succeeded', 'failed'],
  // Once delegated a task only ever finishes; it never goes back to running.
  delegated: ['succeeded', 'failed'],
  succeeded: [],
  failed: []
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export type TaskOutcome<T = unknown> =
  | { ok: true; roleId: string; value: T }
  | { ok: false; roleId: string; error: TaskFailure };

export interface GatewayDecision {
  kind: string;
  decision: 'granted' | 'denied';
  target?: string;
  atIso: string;
  error?: string;
}

export interface DelegationSummary {
  roleId: string;
  task: string;
  ok: boolean;
  kind?: TaskFailure['kind'];
}

/** Read-only view of a task in flight, as handed to the gateway and to role runners. */
export interface TaskContext {
  readonly id: string;
  readonly roleId: string;
  readonly parentId: string | null;
  readonly task: string;
  readonly delegationDepth: number;
  /** The role's capabilities narrowed to what the delegator requested. */
  readonly grant: CapabilitySet;
  readonly signal: AbortSignal;
  readonly status: TaskStatus;
}

export interface TaskNode extends TaskContext {
  status: TaskStatus;
  result: TaskOutcome | null;
  readonly controller: AbortController;
  readonly audit: GatewayDecision[];
  readonly delegations: DelegationSummary[];
  readonly createdAtIso: string;
  deadline: NodeJS.Timeout | null;
}
