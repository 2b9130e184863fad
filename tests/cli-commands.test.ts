import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runAuditCommand } from '../src/cli/commands/audit.js';
import { runCheckCommand } from '../src/cli/commands/check.js';
import { runRolesCommand } from '../src/cli/commands/roles.js';
import { loadRoles } from '../src/cli/roles-source.js';
import { QuietRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import { LedgerWriter } from '../src/core/ledger/writer.js';

const shippedRoles = fileURLToPath(new URL('../roles/roles.yaml', import.meta.url));
const READ_FILE = 'READ_FILE[not .env, .env.*, *.env, *.env.* unless .env.example, *.env.example]';

function spyStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

let stderr: ReturnType<typeof spyStderr>;

/** Quiet-mode events written so far, without their timestamps. */
function events(): Array<Record<string, unknown>> {
  return stderr.mock.calls.map((call) => {
    const parsed: Record<string, unknown> = JSON.parse(String(call[0]));
    return Object.fromEntries(Object.entries(parsed).filter(([key]) => key !== 'timestamp'));
  });
}

beforeEach(() => {
  setRenderer(new QuietRenderer());
  stderr = spyStderr();
});

afterEach(() => {
  stderr.mockRestore();
});

describe('roster roles', () => {
  it('lists the built-in roles with their grants', async () => {
    const res = await runRolesCommand({});

    expect(res).toEqual({ ok: true, details: { roles: ['coder', 'researcher', 'planner', 'reviewer'] } });
    const out = events();
    expect(out).toHaveLength(4);
    expect(out[0]).toEqual({
      type: 'role',
      source: 'built-in',
      role: 'coder',
      capabilities: [READ_FILE, 'WRITE_FILE', 'SEARCH', 'EXECUTE_SHELL', 'CREATE_PLAN'],
      description: 'Full-access coding role for development work',
      maxSteps: 100
    });
    expect(out[2]).toMatchObject({
      role: 'planner',
      capabilities: [READ_FILE, 'SEARCH', 'WRITE_FILE[**/*.md, **/*plan*, **/*plan*/**]'],
      maxSteps: 20
    });
  });

  it('reads a role table named by --config', async () => {
    await runRolesCommand({ config: shippedRoles });

    expect(events().map((e) => [e.source, e.role])).toEqual([
      [shippedRoles, 'coder'],
      [shippedRoles, 'researcher'],
      [shippedRoles, 'planner'],
      [shippedRoles, 'reviewer']
    ]);
  });
});

describe('loadRoles', () => {
  it('falls back to ROSTER_ROLES_FILE, then the built-ins', async () => {
    const fromEnv = await loadRoles(undefined, { ROSTER_ROLES_FILE: shippedRoles });
    const builtIn = await loadRoles(undefined, { ROSTER_ROLES_FILE: '  ' });

    expect(fromEnv.source).toBe(resolve(shippedRoles));
    expect(builtIn.source).toBe('built-in');
    expect(builtIn.registry.ids()).toEqual(['coder', 'researcher', 'planner', 'reviewer']);
  });
});

describe('roster check', () => {
  it('reports the narrowed grant of an allowed delegation', async () => {
    const res = await runCheckCommand({ from: 'coder', to: 'planner' });

    expect(res.ok).toBe(true);
    expect(res.allowed).toBe(true);
    expect(events()).toEqual([
      {
        type: 'delegation_check',
        from: 'coder',
        to: 'planner',
        requested: null,
        ok: true,
        grant: [READ_FILE, 'SEARCH', 'WRITE_FILE[**/*.md, **/*plan*, **/*plan*/**]'],
        missing: []
      }
    ]);
  });

  it('refuses a delegator that lacks the requested kind', async () => {
    const res = await runCheckCommand({ from: 'researcher', to: 'coder', capabilities: ['WRITE_FILE'] });

    expect(res.allowed).toBe(false);
    expect(events()).toEqual([
      {
        type: 'delegation_check',
        from: 'researcher',
        to: 'coder',
        requested: ['WRITE_FILE'],
        ok: false,
        grant: [],
        kind: 'CapabilityDenied',
        message: "Role 'researcher' is not permitted WRITE_FILE (cannot delegate to 'coder')",
        missing: ['WRITE_FILE']
      }
    ]);
  });

  it('refuses a target that lacks the requested kind', async () => {
    await runCheckCommand({ from: 'coder', to: 'reviewer', capabilities: ['READ_FILE', 'EXECUTE_SHELL'] });

    expect(events()[0]).toMatchObject({
      ok: false,
      message: "Role 'reviewer' is not permitted EXECUTE_SHELL (not in its capability set)",
      missing: ['EXECUTE_SHELL']
    });
  });

  it('reports an unknown target as a failed check', async () => {
    const res = await runCheckCommand({ from: 'coder', to: 'ghost' });

    expect(res.allowed).toBe(false);
    expect(events()[0]).toMatchObject({
      kind: 'UnknownRole',
      message: "Unknown role 'ghost'. Available: coder, researcher, planner, reviewer",
      missing: []
    });
  });

  it('fails without output when the delegating role is unknown', async () => {
    const res = await runCheckCommand({ from: 'ghost', to: 'coder' });

    expect(res).toEqual({ ok: false, details: "Unknown role 'ghost'. Available: coder, researcher, planner, reviewer" });
    expect(events()).toEqual([]);
  });
});

describe('roster audit', () => {
  it('prints the integrity status and the requested tail', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'roster-audit-'));
    const ledgerPath = join(dir, 'ledger.jsonl');
    const writer = await LedgerWriter.open(ledgerPath);
    await writer.append({ type: 'run_started', data: { taskId: 't-1', role: 'coder', task: 'x' } });
    await writer.append({ type: 'run_completed', data: { taskId: 't-1', role: 'coder', ok: true } });

    const res = await runAuditCommand({ ledgerPath, tail: 1 });

    expect(res).toEqual({ ok: true, details: { entries: 2 } });
    const out = events();
    expect(out[0]).toEqual({ type: 'ledger_integrity', path: ledgerPath, ok: true });
    expect(out).toHaveLength(2);
    expect(out[1]).toMatchObject({ type: 'ledger_entry', entry: { seq: 2, type: 'run_completed' } });
  });

  it('filters the timeline to one task', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'roster-audit-'));
    const ledgerPath = join(dir, 'ledger.jsonl');
    const writer = await LedgerWriter.open(ledgerPath);
    await writer.append({ type: 'task_started', data: { taskId: 't-1', role: 'coder', depth: 0 } });
    await writer.append({ type: 'task_created', data: { taskId: 't-2', parentId: 't-1', role: 'researcher' } });
    await writer.append({ type: 'tool_invoked', data: { taskId: 't-2', role: 'researcher', kind: 'SEARCH' } });
    await writer.append({ type: 'task_delegated', data: { taskId: 't-1', childId: 't-2', role: 'coder' } });

    await runAuditCommand({ ledgerPath, task: 't-2' });

    expect(events().slice(1).map((e) => e.entry)).toMatchObject([{ seq: 2 }, { seq: 3 }, { seq: 4 }]);
  });

  it('treats a missing ledger as empty', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'roster-audit-'));

    const res = await runAuditCommand({ ledgerPath: join(dir, 'none.jsonl') });

    expect(res).toEqual({ ok: true, details: { entries: 0 } });
    expect(events()).toEqual([{ type: 'ledger_integrity', path: join(dir, 'none.jsonl'), ok: true }]);
  });
});
