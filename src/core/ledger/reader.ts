import { readFile } from 'node:fs/promises';

import {
  LedgerEntrySchema,
  isTaskResolved,
  isToolDecision,
  type LedgerEntry,
  type LedgerEventType,
  type TaskResolvedEntry,
  type ToolDecisionEntry
} from './types.js';
import { isErrnoException } from './writer.js';

export interface LedgerScan {
  entries: LedgerEntry[];
  /** One per line that did not parse. */
  warnings: string[];
}

export interface LedgerIntegrity {
  ok: boolean;
  message?: string;
}

const TASK_ID_FIELDS = ['taskId', 'parentId', 'childId'] as const;

/** Task ids an entry mentions: the task itself, its parent, or the child it delegated to. */
export function taskIdsOf(entry: LedgerEntry): string[] {
  const data: Record<string, unknown> = entry.data;
  return TASK_ID_FIELDS.flatMap((field) => {
    const id = data[field];
    return typeof id === 'string' ? [id] : [];
  });
}

/** A scan is intact when every line parsed and `seq` runs 1, 2, 3... without holes. */
export function checkSequence(scan: LedgerScan): LedgerIntegrity {
  if (scan.warnings.length) return { ok: false, message: scan.warnings.join('\n') };
  const broken = scan.entries.findIndex((e, i) => e.seq !== i + 1);
  if (broken === -1) return { ok: true };
  return { ok: false, message: `Entry ${broken + 1} has seq ${scan.entries[broken].seq}, expected ${broken + 1}` };
}

/**
 * Read side of a run ledger. Every query rescans the file, so a reader can follow a ledger
 * that is still being written.
 */
export class LedgerReader {
  constructor(readonly path: string) {}

  /**
   * Parses every line. A line that fails is reported and skipped; a failing last line is
   * taken to be a torn write.
   */
  async scan(): Promise<LedgerScan> {
    const lines = await readLines(this.path);
    const scan: LedgerScan = { entries: [], warnings: [] };
    lines.forEach((line, i) => {
      const parsed = parseLine(line);
      if (parsed.ok) {
        scan.entries.push(parsed.entry);
        return;
      }
      const where = i === lines.length - 1 ? `line ${i + 1} (torn write)` : `line ${i + 1}`;
      scan.warnings.push(`unreadable ledger ${where}: ${parsed.reason}`);
    });
    return scan;
  }

  async readAll(): Promise<LedgerEntry[]> {
    return (await this.scan()).entries;
  }

  async ofType(type: LedgerEventType): Promise<LedgerEntry[]> {
    return (await this.readAll()).filter((e) => e.type === type);
  }

  /** Entries about `taskId`: its own events plus the delegations it made or received. */
  async forTask(taskId: string): Promise<LedgerEntry[]> {
    return (await this.readAll()).filter((e) => taskIdsOf(e).includes(taskId));
  }

  /** How each task ended, in settling order. */
  async resolutions(): Promise<TaskResolvedEntry[]> {
    return (await this.readAll()).filter(isTaskResolved);
  }

  /** Gateway decisions, optionally only those of one task. */
  async toolDecisions(taskId?: string): Promise<ToolDecisionEntry[]> {
    const decisions = (await this.readAll()).filter(isToolDecision);
    return taskId === undefined ? decisions : decisions.filter((d) => d.data.taskId === taskId);
  }

  async verify(): Promise<LedgerIntegrity> {
    return checkSequence(await this.scan());
  }
}

function parseLine(line: string): { ok: true; entry: LedgerEntry } | { ok: false; reason: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const res = LedgerEntrySchema.safeParse(raw);
  if (!res.success) return { ok: false, reason: res.error.issues.map((i) => i.message).join('; ') };
  return { ok: true, entry: res.data };
}

async function readLines(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
  return content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}
