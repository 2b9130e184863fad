import type { ResolvedGrant } from '../../core/capability/set.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import { theme, INDENT } from './theme.js';
import { formatEventSummary, formatTimestamp, grantLabel, grantText, padRight, roleLabel } from './format.js';

export interface RoleRow {
  roleId: string;
  grants: ResolvedGrant[];
  description: string;
  /** Tool calls per task, null when unlimited. */
  maxSteps: number | null;
}

export interface DelegationCheckReport {
  from: string;
  to: string;
  requested: string[] | null;
  ok: boolean;
  grant: ResolvedGrant[];
  kind?: string;
  message?: string;
  missing: string[];
}

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it, enabling:
 * - InteractiveRenderer for colored TTY output
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  roleTable(source: string, rows: RoleRow[]): void;
  delegationCheck(report: DelegationCheckReport): void;
  ledger(path: string, entries: LedgerEntry[], integrity: { ok: boolean; message?: string }): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  roleTable(source: string, rows: RoleRow[]): void {
    this.writeln(`${INDENT}${theme.bold('Roles')} ${theme.dim(`(${source})`)}`);
    this.writeln();
    for (const row of rows) {
      const caps = row.grants.length > 0 ? row.grants.map(grantLabel).join(theme.dim(', ')) : theme.dim('(none)');
      const steps = row.maxSteps !== null ? theme.dim(`  max ${row.maxSteps} steps`) : '';
      this.writeln(`${INDENT}${roleLabel(row.roleId)}${caps}${steps}`);
      if (row.description) this.writeln(`${INDENT}${' '.repeat(12)}${theme.dim(row.description)}`);
    }
    this.writeln();
  }

  delegationCheck(report: DelegationCheckReport): void {
    const route = `${theme.role(report.from)(report.from)} ${theme.arrow} ${theme.role(report.to)(report.to)}`;
    if (report.ok) {
      this.writeln(`${INDENT}${theme.check} ${route}  ${theme.success('allowed')}`);
      const caps = report.grant.length > 0 ? report.grant.map(grantLabel).join(theme.dim(', ')) : theme.dim('(none)');
      this.writeln(`${INDENT}  ${theme.dim(padRight('grant', 9))}${caps}`);
    } else {
      this.writeln(`${INDENT}${theme.cross} ${route}  ${theme.error(report.kind ?? 'denied')}`);
      if (report.message) this.writeln(`${INDENT}  ${theme.dim(report.message)}`);
      if (report.missing.length > 0) {
        this.writeln(`${INDENT}  ${theme.dim(padRight('missing', 9))}${report.missing.map((k) => theme.capability(k)).join(', ')}`);
      }
    }
    this.writeln();
  }

  ledger(path: string, entries: LedgerEntry[], integrity: { ok: boolean; message?: string }): void {
    this.writeln(`${INDENT}${theme.bold(`Ledger: ${path}`)}`);
    this.writeln();
    if (!integrity.ok) this.warn(`Ledger integrity: ${integrity.message ?? 'failed'}`);
    if (entries.length === 0) {
      this.dim('No ledger entries found.');
    }
    for (const e of entries) {
      const data: Record<string, unknown> = e.data;
      const detail = formatEventSummary(data);
      const failed = data.status === 'failed' || data.ok === false;
      this.writeln(
        `${INDENT}  ${theme.dim(String(e.seq).padStart(4))}  ${theme.dim(formatTimestamp(e.timestamp))}  ${theme.event(e.type, failed)(padRight(e.type, 20))}${detail ? `  ${theme.dim(detail)}` : ''}`
      );
    }
    this.writeln();
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.cross} ${theme.error(theme.bold(title))}`);
    for (const line of details.split('\n')) this.writeln(`${INDENT}  ${line}`);
    if (tip) this.writeln(`${INDENT}  ${theme.dim(`Tip: ${tip}`)}`);
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('!')} ${theme.warning(message)}`);
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  roleTable(source: string, rows: RoleRow[]): void {
    for (const row of rows) {
      this.emit('role', {
        source,
        role: row.roleId,
        capabilities: row.grants.map(grantText),
        description: row.description,
        maxSteps: row.maxSteps
      });
    }
  }

  delegationCheck(report: DelegationCheckReport): void {
    this.emit('delegation_check', {
      from: report.from,
      to: report.to,
      requested: report.requested,
      ok: report.ok,
      grant: report.grant.map(grantText),
      ...(report.kind ? { kind: report.kind } : {}),
      ...(report.message ? { message: report.message } : {}),
      missing: report.missing
    });
  }

  ledger(path: string, entries: LedgerEntry[], integrity: { ok: boolean; message?: string }): void {
    this.emit('ledger_integrity', { path, ok: integrity.ok, ...(integrity.message ? { message: integrity.message } : {}) });
    for (const e of entries) this.emit('ledger_entry', { entry: e });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, ...(tip ? { tip } : {}) });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('text', { message });
  }
}

// ── Global Renderer Instance ────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.ROSTER_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
