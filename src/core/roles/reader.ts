import { dirname, isAbsolute, join } from 'node:path';

import { readText, readYaml } from '../../utils/fs.js';
import { CapabilitySet } from '../capability/set.js';
import { UnknownRoleError } from '../errors.js';
import { RoleRegistry } from './registry.js';
import { RoleTable as RoleTableSchema, type RoleTable } from './types.js';

export interface LoadedRoleTable {
  registry: RoleRegistry;
  table: RoleTable;
  path: string;
}

/**
 * Reads and validates a YAML role table and returns a sealed registry. Any problem here is a
 * startup error: schema violations, duplicate ids, a missing persona file, or a root role
 * that the table does not declare.
 */
export async function readRoleTable(path: string): Promise<LoadedRoleTable> {
  const raw = await readYaml(path);
  const table = RoleTableSchema.parse(raw);
  const baseDir = dirname(path);

  const registry = new RoleRegistry();
  for (const r of table.roles) {
    const persona = r.personaFile
      ? await readText(isAbsolute(r.personaFile) ? r.personaFile : join(baseDir, r.personaFile))
      : (r.persona ?? '');
    registry.register(r.id, CapabilitySet.of(r.capabilities), persona, {
      description: r.description,
      maxSteps: r.maxSteps
    });
  }

  const rootRole = table.defaults.rootRole;
  if (rootRole && !registry.has(rootRole)) throw new UnknownRoleError(rootRole, registry.ids());

  return { registry: registry.seal(), table, path };
}
