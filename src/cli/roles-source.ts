import { resolve } from 'node:path';

import { createDefaultRegistry } from '../core/roles/defaults.js';
import { readRoleTable } from '../core/roles/reader.js';
import type { RoleRegistry } from '../core/roles/registry.js';

/**
 * Helper for CLI commands that operate on a role table: `--config <file>` wins, then
 * `ROSTER_ROLES_FILE`, then the built-in roles.
 */
export async function loadRoles(
  configPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): Promise<{ registry: RoleRegistry; source: string }> {
  const path = configPath ?? (env.ROSTER_ROLES_FILE?.trim() || undefined);
  if (!path) return { registry: createDefaultRegistry(), source: 'built-in' };
  const abs = resolve(path);
  const loaded = await readRoleTable(abs);
  return { registry: loaded.registry, source: abs };
}
