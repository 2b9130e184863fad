import type { ResolvedGrant } from '../../core/capability/set.js';
import { theme, ROLE_LABEL_WIDTH } from './theme.js';

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/**
 * Format a role label at a fixed width.
 */
export function roleLabel(role: string, width: number = ROLE_LABEL_WIDTH): string {
  const color = theme.role(role);
  return color(theme.bold(padRight(role, width)));
}

/**
 * Plain text form of a grant: `WRITE_FILE[docs/**]`. Several scope lists
 * (a grant narrowed along a chain) are joined with ` & `, and deny rules
 * follow as `not .env unless .env.example`.
 */
export function grantText(grant: ResolvedGrant): string {
  const limits = grantLimits(grant);
  return limits ? `${grant.kind}[${limits}]` : grant.kind;
}

/**
 * Colored form of `grantText`.
 */
export function grantLabel(grant: ResolvedGrant): string {
  const limits = grantLimits(grant);
  return limits ? theme.capability(grant.kind) + theme.scope(`[${limits}]`) : theme.capability(grant.kind);
}

function grantLimits(grant: ResolvedGrant): string {
  const parts = grant.scopes.map((s) => s.join(', '));
  for (const rule of grant.deny ?? []) {
    const unless = rule.except.length ? ` unless ${rule.except.join(', ')}` : '';
    parts.push(`not ${rule.patterns.join(', ')}${unless}`);
  }
  return parts.join(' & ');
}

/**
 * HH:MM:SS of an ISO timestamp, or the raw value when it does not parse.
 */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return d.toISOString().slice(11, 19);
}

/**
 * One-line summary of a ledger entry's data: role, task id, kind and status when present.
 */
export function formatEventSummary(data: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const key of ['role', 'taskId', 'kind', 'status', 'target', 'from', 'to']) {
    const v = data[key];
    if (typeof v === 'string' && v.length > 0) parts.push(key === 'role' ? v : `${key}=${v}`);
  }
  return parts.join('  ');
}
