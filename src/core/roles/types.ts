import { z } from 'zod';

import { CapabilityEntry } from '../capability/types.js';
import type { CapabilitySet } from '../capability/set.js';
import { HookDefinition } from '../hooks/types.js';

export interface RoleDefinition {
  readonly roleId: string;
  readonly capabilities: CapabilitySet;
  /** Persona text handed to the role runner as-is. */
  readonly persona: string;
  readonly description: string;
  /** Tool calls one task of this role may make; unlimited when absent. */
  readonly maxSteps?: number;
}

export const RoleId = z.string().regex(/^[a-z][a-z0-9_-]*$/, { message: 'role ids are lowercase identifiers' });

export const RoleConfig = z
  .object({
    id: RoleId,
    description: z.string().default(''),
    capabilities: z.array(CapabilityEntry).default([]),
    persona: z.string().optional(),
    /** Resolved relative to the role table file. */
    personaFile: z.string().min(1).optional(),
    maxSteps: z.number().int().positive().optional()
  })
  .refine((r) => !(r.persona !== undefined && r.personaFile !== undefined), {
    message: 'set either persona or personaFile, not both'
  });

export const RoleTableDefaults = z.object({
  rootRole: RoleId.optional(),
  maxDepth: z.number().int().positive().optional(),
  maxConcurrency: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional()
});

export const RoleTable = z.object({
  roles: z.array(RoleConfig).min(1),
  defaults: RoleTableDefaults.default({}),
  hooks: z.array(HookDefinition).default([])
});

export type RoleConfig = z.infer<typeof RoleConfig>;
export type RoleTableDefaults = z.infer<typeof RoleTableDefaults>;
export type RoleTable = z.infer<typeof RoleTable>;
