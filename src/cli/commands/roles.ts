import { loadRoles } from '../roles-source.js';
import { getRenderer } from '../ui/renderer.js';

export interface RolesCommandOptions {
  config?: string;
}

/**
 * `roster roles` prints every registered role with its capabilities, path scopes and step budget.
 */
export async function runRolesCommand(opts: RolesCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const { registry, source } = await loadRoles(opts.config);
  r.roleTable(
    source,
    registry.list().map((role) => ({
      roleId: role.roleId,
      grants: role.capabilities.grants(),
      description: role.description,
      maxSteps: role.maxSteps ?? null
    }))
  );
  return { ok: true, details: { roles: registry.ids() } };
}
