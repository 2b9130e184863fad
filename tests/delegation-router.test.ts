import { describe, expect, it, vi } from 'vitest';

import type { TaskOutcome } from '../src/core/task/types.js';
import { deferred, flush } from './mock-runner.js';
import { createTestRouter } from './router-fixture.js';

describe('DelegationRouter', () => {
  it('returns a researcher search to the delegating coder', async () => {
    const { router, calls, runner } = createTestRouter({
      coder: async (scope) => {
        const found = await scope.delegate('researcher', 'find callers of parseConfig', { capabilities: ['SEARCH'] });
        return found.ok ? found.value : [];
      },
      researcher: (scope) => scope.invoke('SEARCH', { query: 'parseConfig' })
    });

    const outcome = await router.runRootTask('coder', 'cache the parsed config');

    expect(outcome).toEqual({
      ok: true,
      roleId: 'coder',
      value: ['src/parseConfig.ts:12', 'src/parseConfig/index.ts:3', 'tests/parseConfig.test.ts:40'],
      delegations: [{ roleId: 'researcher', task: 'find callers of parseConfig', ok: true }]
    });
    expect(calls).toEqual([{ kind: 'SEARCH', args: { query: 'parseConfig' } }]);
    expect(runner.started).toEqual([
      { roleId: 'coder', task: 'cache the parsed config', depth: 0 },
      { roleId: 'researcher', task: 'find callers of parseConfig', depth: 1 }
    ]);
    expect(router.liveTasks).toBe(0);
  });

  it('rejects a researcher delegating WRITE_FILE before any child exists', async () => {
    const { router, runner } = createTestRouter({
      researcher: (scope) => scope.delegate('coder', 'apply the fix', { capabilities: ['WRITE_FILE'] })
    });

    const outcome = await router.runRootTask('researcher', 'investigate the crash');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toEqual({
      ok: false,
      roleId: 'coder',
      error: {
        kind: 'CapabilityDenied',
        message: "Role 'researcher' is not permitted WRITE_FILE (cannot delegate to 'coder')",
        chain: ['researcher', 'coder']
      }
    });
    expect(outcome.delegations).toEqual([
      { roleId: 'coder', task: 'apply the fix', ok: false, kind: 'CapabilityDenied' }
    ]);
    expect(runner.started.map((s) => s.roleId)).toEqual(['researcher']);
  });

  it('rejects requesting a kind the target role does not hold', async () => {
    const { router } = createTestRouter({
      coder: (scope) => scope.delegate('researcher', 'patch it', { capabilities: ['WRITE_FILE'] })
    });

    const outcome = await router.runRootTask('coder', 'fix the bug');

    expect(outcome.ok && outcome.value).toEqual({
      ok: false,
      roleId: 'researcher',
      error: {
        kind: 'CapabilityDenied',
        message: "Role 'researcher' is not permitted WRITE_FILE (not in its capability set)",
        chain: ['coder', 'researcher']
      }
    });
  });

  it('fails a task whose own tool call is denied, without side effects', async () => {
    const { router, calls } = createTestRouter({
      researcher: (scope) => scope.invoke('WRITE_FILE', { path: 'src/app.ts', content: '' })
    });

    const outcome = await router.runRootTask('researcher', 'tidy up');

    expect(outcome).toEqual({
      ok: false,
      roleId: 'researcher',
      error: {
        kind: 'CapabilityDenied',
        message: "Role 'researcher' is not permitted WRITE_FILE (target 'src/app.ts')",
        chain: ['researcher']
      },
      delegations: []
    });
    expect(calls).toEqual([]);
  });

  it('keeps a child inside the scopes of its delegator', async () => {
    const { router, calls } = createTestRouter({
      planner: (scope) => scope.delegate('coder', 'write it down', { capabilities: ['WRITE_FILE'] }),
      coder: async (scope) => {
        await scope.invoke('WRITE_FILE', { path: 'docs/plan.md', content: '# Plan' });
        return await scope.invoke('WRITE_FILE', { path: 'src/app.ts', content: '' });
      }
    });

    const outcome = await router.runRootTask('planner', 'plan the release');

    expect(outcome.ok && outcome.value).toEqual({
      ok: false,
      roleId: 'coder',
      error: {
        kind: 'CapabilityDenied',
        message: "Role 'coder' is not permitted WRITE_FILE (target 'src/app.ts')",
        chain: ['planner', 'coder']
      }
    });
    expect(calls).toEqual([{ kind: 'WRITE_FILE', args: { path: 'docs/plan.md', content: '# Plan' } }]);
  });

  it('increases depth by one per edge and stops at the configured maximum', async () => {
    const { router, runner } = createTestRouter(
      {
        coder: (scope) => scope.delegate('researcher', 'look around'),
        researcher: (scope) => scope.delegate('reviewer', 'double-check the findings')
      },
      { config: { maxDepth: 1 } }
    );

    const outcome = await router.runRootTask('coder', 'ship it');

    expect(runner.started.map((s) => [s.roleId, s.depth])).toEqual([
      ['coder', 0],
      ['researcher', 1]
    ]);
    expect(outcome.ok && outcome.value).toEqual({
      ok: true,
      roleId: 'researcher',
      value: {
        ok: false,
        roleId: 'reviewer',
        error: {
          kind: 'DepthExceeded',
          message: 'Delegation depth 2 exceeds the maximum of 1',
          chain: ['coder', 'researcher', 'reviewer']
        }
      }
    });
  });

  it('detects a coder handing itself the same task at depth 2', async () => {
    const { router, runner } = createTestRouter({
      coder: (scope) =>
        scope.depth === 0
          ? scope.delegate('coder', 'refactor the cache module')
          : scope.delegate('coder', '  Refactor the cache   module')
    });

    const outcome = await router.runRootTask('coder', 'implement caching');

    expect(outcome.ok && outcome.value).toEqual({
      ok: true,
      roleId: 'coder',
      value: {
        ok: false,
        roleId: 'coder',
        error: {
          kind: 'DelegationLoop',
          message: "Role 'coder' is already working on '  Refactor the cache   module' further up the delegation chain",
          chain: ['coder', 'coder', 'coder']
        }
      }
    });
    expect(runner.started.map((s) => s.depth)).toEqual([0, 1]);
  });

  it('returns batch results in request order whatever order they finish in', async () => {
    const gates = { first: deferred(), third: deferred() };
    const finished: string[] = [];
    const { router, resolved } = createTestRouter({
      coder: async (scope) => {
        const batch = await scope.delegateMany([
          { roleId: 'researcher', task: 'first' },
          { roleId: 'researcher', task: 'second' },
          { roleId: 'researcher', task: 'third' }
        ]);
        return batch;
      },
      researcher: async (scope) => {
        if (scope.task === 'first') await gates.first.promise;
        if (scope.task === 'third') await gates.third.promise;
        finished.push(scope.task);
        return `${scope.task} result`;
      }
    });

    const run = router.runRootTask('coder', 'survey');
    await vi.waitFor(() => expect(finished).toEqual(['second']));
    gates.third.resolve();
    await vi.waitFor(() => expect(finished).toEqual(['second', 'third']));
    gates.first.resolve();
    const outcome = await run;

    expect(finished).toEqual(['second', 'third', 'first']);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toEqual({
      outcomes: [
        { ok: true, roleId: 'researcher', value: 'first result' },
        { ok: true, roleId: 'researcher', value: 'second result' },
        { ok: true, roleId: 'researcher', value: 'third result' }
      ],
      succeeded: 3,
      failed: 0,
      ok: true
    });
    expect(outcome.delegations.map((d) => d.task)).toEqual(['first', 'second', 'third']);
    expect(resolved.map((r) => r.task)).toEqual(['second', 'third', 'first', 'survey']);
  });

  it('fails rejected batch members in place and runs the rest', async () => {
    const { router, runner } = createTestRouter({
      coder: (scope) =>
        scope.delegateMany([
          { roleId: 'researcher', task: 'read the docs' },
          { roleId: 'ghost', task: 'haunt' },
          { roleId: 'reviewer', task: 'review the diff' }
        ])
    });

    const outcome = await router.runRootTask('coder', 'prepare release');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const batch = outcome.value;
    expect(batch).toMatchObject({ succeeded: 2, failed: 1, ok: false });
    expect(outcome.delegations).toEqual([
      { roleId: 'researcher', task: 'read the docs', ok: true },
      { roleId: 'ghost', task: 'haunt', ok: false, kind: 'UnknownRole' },
      { roleId: 'reviewer', task: 'review the diff', ok: true }
    ]);
    expect(runner.started.map((s) => s.roleId).sort()).toEqual(['coder', 'researcher', 'reviewer']);
  });

  it('lets the parent decide what to do with a failed child', async () => {
    const { router } = createTestRouter({
      coder: async (scope) => {
        const first = await scope.delegate('researcher', 'write the patch', { capabilities: ['WRITE_FILE'] });
        if (first.ok) return 'unexpected';
        const second = await scope.delegate('planner', 'write the patch plan', { capabilities: ['WRITE_FILE'] });
        return { fellBackTo: second.roleId, ok: second.ok };
      }
    });

    const outcome = await router.runRootTask('coder', 'fix it');

    expect(outcome).toEqual({
      ok: true,
      roleId: 'coder',
      value: { fellBackTo: 'planner', ok: true },
      delegations: [
        { roleId: 'researcher', task: 'write the patch', ok: false, kind: 'CapabilityDenied' },
        { roleId: 'planner', task: 'write the patch plan', ok: true }
      ]
    });
  });

  it('bounds how many tasks run at once', async () => {
    const gate = deferred();
    let active = 0;
    let peak = 0;
    const { router } = createTestRouter(
      {
        coder: (scope) =>
          scope.delegateMany(['a', 'b', 'c', 'd'].map((task) => ({ roleId: 'researcher', task }))),
        researcher: async () => {
          active++;
          peak = Math.max(peak, active);
          await gate.promise;
          active--;
          return 'ok';
        }
      },
      { config: { maxConcurrency: 2 } }
    );

    const run = router.runRootTask('coder', 'fan out');
    await vi.waitFor(() => expect(active).toBe(2));
    await flush();
    expect(active).toBe(2);
    gate.resolve();
    const outcome = await run;

    expect(peak).toBe(2);
    expect(outcome.ok).toBe(true);
  });

  it('does not deadlock a chain deeper than the pool', async () => {
    const { router } = createTestRouter(
      {
        coder: async (scope) => {
          const r = await scope.delegate('researcher', 'dig');
          return r.ok ? r.value : 'failed';
        },
        researcher: async (scope) => {
          const r = await scope.delegate('reviewer', 'check');
          return r.ok ? r.value : 'failed';
        },
        reviewer: () => 'looks good'
      },
      { config: { maxConcurrency: 1 } }
    );

    await expect(router.runRootTask('coder', 'deep work')).resolves.toMatchObject({ ok: true, value: 'looks good' });
  });

  it('reports unknown root roles as a failed outcome', async () => {
    const { router } = createTestRouter({});

    await expect(router.runRootTask('ghost', 'boo')).resolves.toEqual({
      ok: false,
      roleId: 'ghost',
      error: {
        kind: 'UnknownRole',
        message: "Unknown role 'ghost'. Available: coder, researcher, planner, reviewer",
        chain: ['ghost']
      },
      delegations: []
    });
  });

  it('maps a runner crash to ToolInvocationError with the chain', async () => {
    const { router } = createTestRouter({
      coder: (scope) => scope.delegate('reviewer', 'review'),
      reviewer: () => {
        throw new Error('model unavailable');
      }
    });

    const outcome = await router.runRootTask('coder', 'ship');

    expect(outcome.ok && outcome.value).toEqual({
      ok: false,
      roleId: 'reviewer',
      error: {
        kind: 'ToolInvocationError',
        message: 'role runner failed: model unavailable',
        chain: ['coder', 'reviewer']
      }
    });
  });

  it('exposes the consumed results to the runner', async () => {
    let seen: unknown;
    const { router } = createTestRouter({
      coder: async (scope) => {
        await scope.delegate('reviewer', 'first look');
        seen = scope.results();
        return (await scope.delegate('reviewer', 'second look')).ok;
      }
    });

    const outcome = await router.runRootTask('coder', 'review twice');

    expect(seen).toEqual([{ roleId: 'reviewer', task: 'first look', ok: true }]);
    expect(outcome.ok && outcome.delegations).toHaveLength(2);
  });

  it('records a settled outcome once', async () => {
    const results: TaskOutcome[] = [];
    const { router } = createTestRouter({
      coder: async (scope) => {
        results.push(await scope.delegate('researcher', 'one'));
        return 'done';
      }
    });

    await router.runRootTask('coder', 'go');
    expect(results).toEqual([{ ok: true, roleId: 'researcher', value: 'researcher done' }]);
  });
});
