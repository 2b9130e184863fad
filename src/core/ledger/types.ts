import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const LedgerEventType = z.enum([
  'run_started',
  'run_completed',
  'task_created',
  'task_started',
  'task_delegated',
  'tool_retried',
  'task_resolved',
  'delegation_rejected',
  'tool_invoked',
  'tool_denied'
]);

export const LedgerEnvelope = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: LedgerEventType,
  data: z.record(z.string(), z.unknown()).default({})
});

export const TaskResolvedEvent = LedgerEnvelope.extend({
  type: z.literal('task_resolved'),
  data: z.object({
    taskId: z.string(),
    role: z.string(),
    status: z.enum(['succeeded', 'failed']),
    kind: z.string().optional(),
    message: z.string().optional()
  })
});

export const ToolDecisionEvent = LedgerEnvelope.extend({
  type: z.enum(['tool_invoked', 'tool_denied']),
  data: z.object({
    taskId: z.string(),
    role: z.string(),
    kind: z.string(),
    target: z.string().optional(),
    error: z.string().optional()
  })
});

export const LedgerEntrySchema = z.union([TaskResolvedEvent, ToolDecisionEvent, LedgerEnvelope]);

export type LedgerEventType = z.infer<typeof LedgerEventType>;
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
export type TaskResolvedEntry = z.infer<typeof TaskResolvedEvent>;
export type ToolDecisionEntry = z.infer<typeof ToolDecisionEvent>;

export function isTaskResolved(entry: LedgerEntry): entry is TaskResolvedEntry {
  return TaskResolvedEvent.safeParse(entry).success;
}

export function isToolDecision(entry: LedgerEntry): entry is ToolDecisionEntry {
  return ToolDecisionEvent.safeParse(entry).success;
}

export interface LedgerEntryInput {
  type: LedgerEventType;
  data: Record<string, unknown>;
}
