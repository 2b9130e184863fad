import { z } from 'zod';

export const HookTrigger = z.enum(['before_task', 'after_task', 'before_tool', 'after_tool', 'on_error']);

export const HookDefinition = z.object({
  trigger: HookTrigger,
  command: z.string().min(1),
  timeoutMs: z.number().int().positive().default(30_000),
  enabled: z.boolean().default(true)
});

export type HookTrigger = z.infer<typeof HookTrigger>;
export type HookDefinition = z.infer<typeof HookDefinition>;
export type HookDefinitionInput = z.input<typeof HookDefinition>;

export interface HookEvent {
  trigger: HookTrigger;
  roleId: string;
  task: string;
  tool?: string;
  toolArgs?: unknown;
  error?: string;
}
