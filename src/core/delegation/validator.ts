import type { CapabilitySet } from '../capability/set.js';
import {
  CapabilityDeniedError,
  DelegationLoopError,
  DepthExceededError,
  UnknownRoleError,
  type RosterError
} from '../errors.js';
import type { RoleRegistry } from '../roles/registry.js';
import type { DelegationRequest } from './types.js';

export interface DelegatorView {
  roleId: string;
  task: string;
  grant: CapabilitySet;
  delegationDepth: number;
}

export type DelegationCheck =
  | { ok: true; grant: CapabilitySet; depth: number }
  | { ok: false; error: RosterError };

/**
 * Decides whether `parent` may hand `request` to its target role. Checks run in a fixed
 * order (unknown role, capabilities, loop, depth) and the first failure wins.
 *
 * `lineage` is the parent followed by its ancestors.
 */
export function checkDelegation(args: {
  registry: RoleRegistry;
  lineage: DelegatorView[];
  request: Pick<DelegationRequest, 'roleId' | 'task' | 'capabilities'>;
  maxDepth: number;
}): DelegationCheck {
  const { registry, lineage, request, maxDepth } = args;
  const parent = lineage[0];
  if (!parent) throw new Error('checkDelegation needs at least the delegating task');

  if (!registry.has(request.roleId)) {
    return { ok: false, error: new UnknownRoleError(request.roleId, registry.ids()) };
  }
  const target = registry.lookup(request.roleId);

  const grant = resolveGrant({
    target: { roleId: target.roleId, capabilities: target.capabilities },
    delegator: { roleId: parent.roleId, capabilities: parent.grant },
    requested: request.capabilities
  });
  if (!grant.ok) return grant;

  const wanted = normalizeTask(request.task);
  const looping = lineage.some((a) => a.roleId === request.roleId && normalizeTask(a.task) === wanted);
  if (looping) return { ok: false, error: new DelegationLoopError(request.roleId, request.task) };

  const depth = parent.delegationDepth + 1;
  if (depth > maxDepth) return { ok: false, error: new DepthExceededError(depth, maxDepth) };

  return { ok: true, grant: grant.grant, depth };
}

/**
 * The child's grant: the target role's set narrowed to the requested kinds and limited by
 * the delegator's own grant. Requesting a kind that either side lacks is refused outright.
 */
export function resolveGrant(args: {
  target: { roleId: string; capabilities: CapabilitySet };
  delegator: { roleId: string; capabilities: CapabilitySet };
  requested: string[] | undefined;
}): { ok: true; grant: CapabilitySet } | { ok: false; error: CapabilityDeniedError } {
  const { target, delegator, requested } = args;
  if (requested === undefined) return { ok: true, grant: target.capabilities.intersect(delegator.capabilities) };

  const notInDelegator = delegator.capabilities.missing(requested);
  if (notInDelegator.length) {
    return {
      ok: false,
      error: new CapabilityDeniedError(delegator.roleId, notInDelegator, `cannot delegate to '${target.roleId}'`)
    };
  }
  const notInTarget = target.capabilities.missing(requested);
  if (notInTarget.length) {
    return { ok: false, error: new CapabilityDeniedError(target.roleId, notInTarget, 'not in its capability set') };
  }
  return { ok: true, grant: target.capabilities.narrow(requested).intersect(delegator.capabilities) };
}

/** Tasks that differ only in case or whitespace count as the same task. */
export function normalizeTask(task: string): string {
  return task.trim().replace(/\s+/g, ' ').toLowerCase();
}
