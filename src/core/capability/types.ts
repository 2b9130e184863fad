import { z } from 'zod';

export const CapabilityKind = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, { message: 'capability kinds are UPPER_SNAKE_CASE' });

export const CapabilityGrant = z
  .object({
    kind: CapabilityKind,
    /** picomatch globs; absent means the grant covers every target. */
    paths: z.array(z.string().min(1)).min(1).optional(),
    /** Targets refused even when `paths` covers them. Slash-free globs match the basename. */
    deny: z.array(z.string().min(1)).min(1).optional(),
    /** Exceptions to `deny`. */
    allow: z.array(z.string().min(1)).min(1).optional()
  })
  .refine((g) => g.allow === undefined || g.deny !== undefined, {
    message: 'allow only lifts patterns listed under deny'
  });

/** A bare kind string is shorthand for an unrestricted grant. */
export const CapabilityEntry = z.union([
  CapabilityKind.transform((kind) => ({ kind })),
  CapabilityGrant
]);

export type CapabilityKind = z.infer<typeof CapabilityKind>;
export type CapabilityGrant = z.infer<typeof CapabilityGrant>;
export type CapabilityEntry = z.input<typeof CapabilityEntry>;

export const Capabilities = {
  READ_FILE: 'READ_FILE',
  WRITE_FILE: 'WRITE_FILE',
  SEARCH: 'SEARCH',
  EXECUTE_SHELL: 'EXECUTE_SHELL',
  CREATE_PLAN: 'CREATE_PLAN'
} as const;
