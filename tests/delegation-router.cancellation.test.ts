import { describe, expect, it, vi } from 'vitest';

import { untilAborted } from './mock-runner.js';
import { createTestRouter } from './router-fixture.js';

describe('DelegationRouter cancellation', () => {
  it('cancels both pending children before the parent resolves', async () => {
    const { router, runner, resolved } = createTestRouter({
      coder: (scope) =>
        scope.delegateMany([
          { roleId: 'researcher', task: 'scan the api' },
          { roleId: 'researcher', task: 'scan the cli' }
        ]),
      researcher: (scope) => untilAborted(scope.signal)
    });
    const controller = new AbortController();

    const run = router.runRootTask('coder', 'audit everything', { signal: controller.signal });
    await vi.waitFor(() => expect(runner.started).toHaveLength(3));
    controller.abort();
    const outcome = await run;

    expect(outcome).toMatchObject({
      ok: false,
      roleId: 'coder',
      error: { kind: 'CancellationError', message: 'Run was cancelled by the caller', chain: ['coder'] }
    });
    expect(resolved.map((r) => [r.roleId, r.kind])).toEqual([
      ['researcher', 'CancellationError'],
      ['researcher', 'CancellationError'],
      ['coder', 'CancellationError']
    ]);
    await vi.waitFor(() => expect(router.liveTasks).toBe(0));
  });

  it('cancels grandchildren deepest first', async () => {
    const { router, runner, resolved } = createTestRouter({
      coder: (scope) => scope.delegate('researcher', 'dig'),
      researcher: (scope) => scope.delegate('reviewer', 'verify'),
      reviewer: (scope) => untilAborted(scope.signal)
    });
    const controller = new AbortController();

    const run = router.runRootTask('coder', 'deep audit', { signal: controller.signal });
    await vi.waitFor(() => expect(runner.started).toHaveLength(3));
    controller.abort();
    await run;

    expect(resolved.map((r) => [r.roleId, r.depth, r.kind])).toEqual([
      ['reviewer', 2, 'CancellationError'],
      ['researcher', 1, 'CancellationError'],
      ['coder', 0, 'CancellationError']
    ]);
  });

  it('does not start a root task whose signal is already aborted', async () => {
    const { router, runner } = createTestRouter({});
    const controller = new AbortController();
    controller.abort();

    const outcome = await router.runRootTask('coder', 'never', { signal: controller.signal });

    expect(outcome).toMatchObject({ ok: false, error: { kind: 'CancellationError' } });
    expect(runner.started).toEqual([]);
    expect(router.liveTasks).toBe(0);
  });

  it('refuses new delegations from a cancelled task', async () => {
    const { router, runner } = createTestRouter({
      coder: async (scope) => {
        await untilAborted(scope.signal).catch(() => undefined);
        return await scope.delegate('researcher', 'too late');
      }
    });
    const controller = new AbortController();

    const run = router.runRootTask('coder', 'slow start', { signal: controller.signal });
    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    controller.abort();
    await run;

    await vi.waitFor(() => expect(router.liveTasks).toBe(0));
    expect(runner.started.map((s) => s.roleId)).toEqual(['coder']);
  });
});

describe('DelegationRouter timeouts', () => {
  it('resolves the awaiting parent with TimeoutError', async () => {
    const { router } = createTestRouter({
      coder: (scope) => scope.delegate('researcher', 'endless search', { timeoutMs: 20 }),
      researcher: (scope) => untilAborted(scope.signal)
    });

    const outcome = await router.runRootTask('coder', 'find it');

    expect(outcome.ok && outcome.value).toEqual({
      ok: false,
      roleId: 'researcher',
      error: { kind: 'TimeoutError', message: 'Task exceeded its deadline of 20ms', chain: ['coder', 'researcher'] }
    });
  });

  it('cancels the subtree of a task that times out', async () => {
    const { router, resolved } = createTestRouter({
      coder: (scope) => scope.delegate('researcher', 'dig', { timeoutMs: 20 }),
      researcher: (scope) => scope.delegate('reviewer', 'verify'),
      reviewer: (scope) => untilAborted(scope.signal)
    });

    const outcome = await router.runRootTask('coder', 'deep audit');

    expect(outcome.ok).toBe(true);
    expect(resolved.map((r) => [r.roleId, r.kind])).toEqual([
      ['reviewer', 'CancellationError'],
      ['researcher', 'TimeoutError'],
      ['coder', undefined]
    ]);
  });

  it('applies a root deadline', async () => {
    const { router } = createTestRouter({ coder: (scope) => untilAborted(scope.signal) });

    const outcome = await router.runRootTask('coder', 'wait forever', { timeoutMs: 20 });

    expect(outcome).toEqual({
      ok: false,
      roleId: 'coder',
      error: { kind: 'TimeoutError', message: 'Task exceeded its deadline of 20ms', chain: ['coder'] },
      delegations: []
    });
  });

  it('applies the configured default deadline', async () => {
    const { router } = createTestRouter(
      { coder: (scope) => untilAborted(scope.signal) },
      { config: { defaultTimeoutMs: 15 } }
    );

    await expect(router.runRootTask('coder', 'wait forever')).resolves.toMatchObject({
      ok: false,
      error: { kind: 'TimeoutError', message: 'Task exceeded its deadline of 15ms' }
    });
  });
});
