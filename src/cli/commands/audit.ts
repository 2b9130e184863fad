import { resolve } from 'node:path';

import { LedgerReader, checkSequence, taskIdsOf } from '../../core/ledger/reader.js';
import { getRenderer } from '../ui/renderer.js';

export interface AuditCommandOptions {
  ledgerPath: string;
  tail?: number;
  /** Only entries about this task id. */
  task?: string;
}

/**
 * `roster audit <ledger>` prints a run ledger as a timeline plus its integrity status.
 */
export async function runAuditCommand(opts: AuditCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const path = resolve(opts.ledgerPath);
  const scan = await new LedgerReader(path).scan();
  const integrity = checkSequence(scan);
  const { entries } = scan;

  const task = opts.task;
  const selected = task ? entries.filter((e) => taskIdsOf(e).includes(task)) : entries;
  const shown = opts.tail !== undefined && opts.tail > 0 ? selected.slice(Math.max(0, selected.length - opts.tail)) : selected;
  r.ledger(path, shown, integrity);
  return { ok: integrity.ok, details: integrity.ok ? { entries: entries.length } : integrity.message };
}
