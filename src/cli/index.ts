import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runRolesCommand } from './commands/roles.js';
import { runCheckCommand } from './commands/check.js';
import { runAuditCommand } from './commands/audit.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export function buildCli(): Command {
  const program = new Command();

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('roster')
    .description('Role delegation with capability scoping: inspect role tables, delegation checks and run ledgers')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<GlobalFlags>();
    process.env.ROSTER_VERBOSE = o.verbose ? '1' : '0';
    process.env.ROSTER_QUIET = o.quiet ? '1' : '0';
    createRenderer({ quiet: !!o.quiet });
  });

  program
    .command('roles')
    .description('List roles with their capabilities and path scopes')
    .option('--config <file>', 'Role table YAML (defaults to ROSTER_ROLES_FILE, then the built-in roles)')
    .action(async (opts: { config?: string }) => {
      await report('Roles failed', () => runRolesCommand({ config: opts.config }));
    });

  program
    .command('check')
    .description('Check whether a root task of one role may delegate to another')
    .argument('<from>', 'Delegating role')
    .argument('<to>', 'Target role')
    .option('--cap <kind>', 'Requested capability kind (repeatable)', collectRepeatable, [])
    .option('--config <file>', 'Role table YAML')
    .action(async (from: string, to: string, opts: { cap: string[]; config?: string }) => {
      await report('Check failed', async () => {
        const res = await runCheckCommand({ from, to, capabilities: opts.cap, config: opts.config });
        if (res.ok && res.allowed === false) process.exitCode = 1;
        return res;
      });
    });

  program
    .command('audit')
    .description('Print a run ledger and verify its sequence integrity')
    .argument('<ledger>', 'Path to a ledger.jsonl file')
    .option('--tail <n>', 'Only the last n entries', (v) => Number(v))
    .option('--task <id>', 'Only entries about one task id')
    .action(async (ledgerPath: string, opts: { tail?: number; task?: string }) => {
      await report('Audit failed', () => runAuditCommand({ ledgerPath, tail: opts.tail, task: opts.task }));
    });

  return program;
}

async function report(title: string, run: () => Promise<{ ok: boolean; details?: unknown }>): Promise<void> {
  const r = getRenderer();
  try {
    const res = await run();
    if (!res.ok) {
      r.error(title, String(res.details ?? 'unknown error'));
      process.exitCode = 1;
    }
  } catch (err) {
    r.error(title, err instanceof Error ? err.message : String(err), 'Try running with --verbose for more details.');
    if (process.env.ROSTER_VERBOSE === '1' && err instanceof Error && err.stack) r.dim(err.stack);
    process.exitCode = 1;
  }
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed: unknown = JSON.parse(content);
        if (parsed !== null && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}
