import { z } from 'zod';

import type { CapabilitySet } from '../capability/set.js';
import { CapabilityKind } from '../capability/types.js';
import type { RoleDefinition } from '../roles/types.js';
import type { DelegationSummary, TaskOutcome } from '../task/types.js';

export const DelegationRequest = z.object({
  roleId: z.string().min(1),
  task: z.string().min(1),
  /** Omitted: everything the target role holds that the delegator also holds. */
  capabilities: z.array(CapabilityKind).optional(),
  timeoutMs: z.number().int().positive().optional()
});

export type DelegationRequest = z.infer<typeof DelegationRequest>;

export interface BatchOutcome {
  /** In request order, whatever order the children finished in. */
  outcomes: TaskOutcome[];
  succeeded: number;
  failed: number;
  ok: boolean;
}

/** What a role runner sees while it works on one task. */
export interface TaskScope {
  readonly role: RoleDefinition;
  readonly task: string;
  readonly depth: number;
  readonly capabilities: CapabilitySet;
  readonly signal: AbortSignal;
  invoke(kind: string, args?: unknown): Promise<unknown>;
  delegate(roleId: string, task: string, opts?: Omit<DelegationRequest, 'roleId' | 'task'>): Promise<TaskOutcome>;
  delegateMany(requests: DelegationRequest[]): Promise<BatchOutcome>;
  /** Outcomes of this task's delegations so far, in the order they were consumed. */
  results(): readonly DelegationSummary[];
}

/**
 * The behaviour behind a role: prompting a model, parsing its replies, deciding what to
 * invoke or delegate. Its return value becomes the task's result.
 */
export interface RoleRunner {
  run(scope: TaskScope): Promise<unknown>;
}

export interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type RunOutcome<T = unknown> =
  | { ok: true; roleId: string; value: T; delegations: DelegationSummary[] }
  | { ok: false; roleId: string; error: { kind: string; message: string; chain: string[] }; delegations: DelegationSummary[] };
