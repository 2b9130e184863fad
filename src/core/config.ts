import { z } from 'zod';

import type { RoleTableDefaults } from './roles/types.js';

export const RouterConfig = z.object({
  maxDepth: z.number().int().min(1).default(8),
  maxConcurrency: z.number().int().min(1).default(4),
  maxRetries: z.number().int().min(0).default(0),
  /** Deadline applied to every task that does not set its own. */
  defaultTimeoutMs: z.number().int().positive().optional()
});

export type RouterConfig = z.infer<typeof RouterConfig>;
export type RouterConfigInput = z.input<typeof RouterConfig>;

interface EnvNumberSetting {
  key: string;
  min: number;
}

const ENV = {
  maxDepth: { key: 'ROSTER_MAX_DEPTH', min: 1 },
  maxConcurrency: { key: 'ROSTER_MAX_CONCURRENCY', min: 1 },
  maxRetries: { key: 'ROSTER_MAX_RETRIES', min: 0 },
  defaultTimeoutMs: { key: 'ROSTER_TASK_TIMEOUT_MS', min: 1 }
} satisfies Record<keyof RouterConfig, EnvNumberSetting>;

/**
 * Layering, lowest first: built-in defaults, role table `defaults`, environment, explicit
 * overrides.
 */
export function resolveRouterConfig(
  opts: { env?: NodeJS.ProcessEnv; table?: RoleTableDefaults; overrides?: RouterConfigInput } = {}
): RouterConfig {
  const env = opts.env ?? process.env;
  const table = opts.table ?? {};

  const fromEnv: RouterConfigInput = {};
  const depth = readEnvInt(env, ENV.maxDepth);
  if (depth !== undefined) fromEnv.maxDepth = depth;
  const concurrency = readEnvInt(env, ENV.maxConcurrency);
  if (concurrency !== undefined) fromEnv.maxConcurrency = concurrency;
  const retries = readEnvInt(env, ENV.maxRetries);
  if (retries !== undefined) fromEnv.maxRetries = retries;
  const timeout = readEnvInt(env, ENV.defaultTimeoutMs);
  if (timeout !== undefined) fromEnv.defaultTimeoutMs = timeout;

  return RouterConfig.parse({
    ...definedOnly({
      maxDepth: table.maxDepth,
      maxConcurrency: table.maxConcurrency,
      maxRetries: table.maxRetries,
      defaultTimeoutMs: table.timeoutMs
    }),
    ...fromEnv,
    ...definedOnly(opts.overrides ?? {})
  });
}

/** Unset, blank and non-numeric values are ignored; values below `min` are clamped up. */
function readEnvInt(env: NodeJS.ProcessEnv, setting: EnvNumberSetting): number | undefined {
  const raw = env[setting.key];
  if (!raw || !raw.trim()) return undefined;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return undefined;

  const n = Math.floor(parsed);
  return n < setting.min ? setting.min : n;
}

function definedOnly(obj: RouterConfigInput): RouterConfigInput {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}
