import { describe, expect, it } from 'vitest';

import { TaskIdGenerator, formatTaskId, parseTaskId } from '../src/utils/id.js';

describe('task id', () => {
  it('numbers ids within one run', () => {
    const gen = new TaskIdGenerator(new Date('2026-02-07T00:00:00Z'));
    const run = new Date('2026-02-07T00:00:00Z').getTime().toString(36);

    expect(gen.next()).toBe(`t-${run}-001`);
    expect(parseTaskId(gen.next())).toEqual({ run, nnn: '002' });
  });

  it('keeps counting past three digits', () => {
    expect(parseTaskId(formatTaskId({ run: 'abc', nnn: '1000' }))).toEqual({ run: 'abc', nnn: '1000' });
  });

  it('rejects malformed ids', () => {
    expect(parseTaskId('t-abc-01')).toBeNull();
    expect(parseTaskId('job-abc-001')).toBeNull();
    expect(parseTaskId('t-ABC-001')).toBeNull();
  });
});
