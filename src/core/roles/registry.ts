import type { CapabilitySet } from '../capability/set.js';
import { DuplicateRoleError, UnknownRoleError } from '../errors.js';
import type { RoleDefinition } from './types.js';

/**
 * Static role table. Registration happens once at startup; after `seal()` the registry is
 * read-only, so every context's permissions follow from its role id alone.
 */
export class RoleRegistry {
  private readonly roles = new Map<string, RoleDefinition>();
  private sealed = false;

  register(
    roleId: string,
    capabilities: CapabilitySet,
    persona: string,
    opts: { description?: string; maxSteps?: number } = {}
  ): RoleDefinition {
    if (this.sealed) throw new Error(`Role registry is sealed; cannot register '${roleId}'`);
    if (this.roles.has(roleId)) throw new DuplicateRoleError(roleId);

    const def: RoleDefinition = Object.freeze({
      roleId,
      capabilities,
      persona,
      description: opts.description ?? '',
      ...(opts.maxSteps !== undefined ? { maxSteps: opts.maxSteps } : {})
    });
    this.roles.set(roleId, def);
    return def;
  }

  lookup(roleId: string): RoleDefinition {
    const def = this.roles.get(roleId);
    if (!def) throw new UnknownRoleError(roleId, this.ids());
    return def;
  }

  has(roleId: string): boolean {
    return this.roles.has(roleId);
  }

  ids(): string[] {
    return Array.from(this.roles.keys());
  }

  list(): RoleDefinition[] {
    return Array.from(this.roles.values());
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
