import { CapabilityDeniedError } from '../../core/errors.js';
import { checkDelegation } from '../../core/delegation/validator.js';
import { loadRoles } from '../roles-source.js';
import { getRenderer, type DelegationCheckReport } from '../ui/renderer.js';

export interface CheckCommandOptions {
  from: string;
  to: string;
  capabilities?: string[];
  config?: string;
}

/**
 * `roster check <from> <to>` dry-runs the delegation checks for a root task of role `from`
 * handing work to `to`. Nothing is executed; `ok` is false only when `from` is unknown.
 */
export async function runCheckCommand(
  opts: CheckCommandOptions
): Promise<{ ok: boolean; allowed?: boolean; details?: unknown }> {
  const r = getRenderer();
  const { registry } = await loadRoles(opts.config);

  if (!registry.has(opts.from)) {
    return { ok: false, details: `Unknown role '${opts.from}'. Available: ${registry.ids().join(', ')}` };
  }
  const root = registry.lookup(opts.from);
  const requested = opts.capabilities && opts.capabilities.length > 0 ? opts.capabilities : undefined;

  const check = checkDelegation({
    registry,
    lineage: [{ roleId: root.roleId, task: '', grant: root.capabilities, delegationDepth: 0 }],
    request: { roleId: opts.to, task: `check ${opts.from} -> ${opts.to}`, capabilities: requested },
    maxDepth: Number.POSITIVE_INFINITY
  });

  const report: DelegationCheckReport = check.ok
    ? { from: opts.from, to: opts.to, requested: requested ?? null, ok: true, grant: check.grant.grants(), missing: [] }
    : {
        from: opts.from,
        to: opts.to,
        requested: requested ?? null,
        ok: false,
        grant: [],
        kind: check.error.kind,
        message: check.error.message,
        missing: check.error instanceof CapabilityDeniedError ? check.error.capabilities : []
      };
  r.delegationCheck(report);
  return { ok: true, allowed: check.ok, details: report };
}
