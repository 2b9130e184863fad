import { execa } from 'execa';

import type { Logger } from '../../utils/logger.js';
import { quietLogger } from '../../utils/logger.js';
import { HookDefinition, type HookDefinitionInput, type HookEvent, type HookTrigger } from './types.js';

export interface HookExecResult {
  exitCode: number | undefined;
  timedOut: boolean;
  stderr: string;
}

export type HookExec = (
  command: string,
  opts: { cwd: string; env: Record<string, string>; timeoutMs: number }
) => Promise<HookExecResult>;

const execaHook: HookExec = async (command, opts) => {
  const res = await execa(command, {
    shell: true,
    cwd: opts.cwd,
    env: opts.env,
    timeout: opts.timeoutMs,
    reject: false,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return { exitCode: res.exitCode, timedOut: res.timedOut, stderr: res.stderr };
};

export interface HookRunnerOptions {
  cwd?: string;
  logger?: Logger;
  exec?: HookExec;
}

/**
 * Runs user-configured shell commands at task and tool boundaries. A hook that fails or times
 * out is logged; it never changes the outcome of the task that fired it.
 */
export class HookRunner {
  private readonly hooks: HookDefinition[];
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly exec: HookExec;

  constructor(hooks: HookDefinitionInput[] = [], opts: HookRunnerOptions = {}) {
    this.hooks = hooks.map((h) => HookDefinition.parse(h)).filter((h) => h.enabled);
    this.cwd = opts.cwd ?? process.cwd();
    this.logger = opts.logger ?? quietLogger;
    this.exec = opts.exec ?? execaHook;
  }

  has(trigger: HookTrigger): boolean {
    return this.hooks.some((h) => h.trigger === trigger);
  }

  async fire(event: HookEvent): Promise<void> {
    const matching = this.hooks.filter((h) => h.trigger === event.trigger);
    if (matching.length === 0) return;

    const env = buildHookEnv(event, this.cwd);
    for (const hook of matching) {
      try {
        const res = await this.exec(hook.command, { cwd: this.cwd, env, timeoutMs: hook.timeoutMs });
        if (res.timedOut) {
          this.logger.warn('hook timed out', { trigger: event.trigger, command: hook.command, timeoutMs: hook.timeoutMs });
        } else if (res.exitCode !== 0) {
          this.logger.warn('hook exited non-zero', { trigger: event.trigger, command: hook.command, exitCode: res.exitCode, stderr: res.stderr });
        }
      } catch (err) {
        this.logger.warn('hook failed to start', { trigger: event.trigger, command: hook.command, error: String(err) });
      }
    }
  }
}

export function buildHookEnv(event: HookEvent, cwd: string): Record<string, string> {
  const env: Record<string, string> = {
    ROSTER_HOOK_TRIGGER: event.trigger,
    ROSTER_CWD: cwd,
    ROSTER_ROLE: event.roleId,
    ROSTER_TASK: event.task
  };
  if (event.tool) env.ROSTER_TOOL = event.tool;
  if (event.toolArgs !== undefined) env.ROSTER_TOOL_ARGS = safeJson(event.toolArgs);
  if (event.error) env.ROSTER_ERROR = event.error;
  return env;
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v) ?? '';
  } catch {
    return '"[unserializable]"';
  }
}
