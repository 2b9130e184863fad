import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput } from './types.js';

/**
 * Append-only JSONL audit trail. Appends are chained so entries from concurrent tasks get
 * distinct, gap-free sequence numbers in file order.
 */
export class LedgerWriter {
  private nextSeq: number;
  private ledgerPath: string;
  private tail: Promise<unknown> = Promise.resolve();

  private constructor(ledgerPath: string, nextSeq: number) {
    this.ledgerPath = ledgerPath;
    this.nextSeq = nextSeq;
  }

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });

    const nextSeq = (await computeNextSeq(ledgerPath)) ?? 1;
    return new LedgerWriter(ledgerPath, nextSeq);
  }

  get path(): string {
    return this.ledgerPath;
  }

  append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const run = this.tail.then(
      () => this.write(event),
      () => this.write(event)
    );
    this.tail = run;
    return run;
  }

  private async write(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry: LedgerEntry = LedgerEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });

    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }
}

async function computeNextSeq(ledgerPath: string): Promise<number | null> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return 1;
    throw err;
  }

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
  if (lines.length === 0) return 1;

  // A crash mid-write can leave a garbled last line; use the last parseable seq.
  for (let i = lines.length - 1; i >= 0; i--) {
    const lastSeq = readSeq(lines[i]);
    if (lastSeq !== null) return lastSeq + 1;
  }

  return 1;
}

function readSeq(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
      return parsed.seq;
    }
    return null;
  } catch {
    return null;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
