export interface TaskIdParts {
  run: string; // base36 run stamp
  nnn: string; // 3+ digits
}

export function formatTaskId(parts: TaskIdParts): string {
  return `t-${parts.run}-${parts.nnn}`;
}

export function parseTaskId(taskId: string): TaskIdParts | null {
  const m = /^t-([0-9a-z]+)-(\d{3,})$/.exec(taskId);
  if (!m) return null;
  return { run: m[1], nnn: m[2] };
}

/**
 * Issues ids unique within one router: a per-run stamp plus a counter. Ids never leave the
 * core, so they only need to be unique, not meaningful.
 */
export class TaskIdGenerator {
  private seq = 0;
  private readonly run: string;

  constructor(now: Date = new Date()) {
    this.run = now.getTime().toString(36);
  }

  next(): string {
    this.seq += 1;
    return formatTaskId({ run: this.run, nnn: String(this.seq).padStart(3, '0') });
  }
}
