import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  arrow: chalk.dim('→'),

  // Roles: each built-in role gets its own color; custom roles fall back to white.
  role: (name: string): ChalkInstance => {
    const map: Record<string, ChalkInstance> = {
      coder: chalk.green,
      researcher: chalk.cyan,
      planner: chalk.yellow,
      reviewer: chalk.red,
    };
    return map[name.toLowerCase()] ?? chalk.white;
  },

  capability: chalk.magenta,
  scope: chalk.dim,

  // Ledger timeline: refusals and failures in red, retries in yellow.
  event: (type: string, failed: boolean = false): ChalkInstance => {
    if (failed || type === 'tool_denied' || type === 'delegation_rejected') return chalk.red;
    if (type === 'tool_retried') return chalk.yellow;
    if (type === 'tool_invoked') return chalk.blue;
    if (type === 'run_started' || type === 'run_completed') return chalk.bold;
    return chalk.reset;
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Minimum column width for role labels. */
export const ROLE_LABEL_WIDTH = 12;
