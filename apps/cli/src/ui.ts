/**
 * Shared CLI styling: colours, boxes, key-value rows, and a badge for each
 * connection state. Pure string rendering; callers print with console.log().
 */

import type { ConnectionState } from '@meshbridge/core';

// ---------------------------------------------------------------------------
// Colors: LoRa amber accent, standard ANSI elsewhere
// ---------------------------------------------------------------------------

/** Accent colour. True-color (24-bit). */
export const AMBER = '\x1b[38;2;255;176;0m';

/** Dimmed accent for borders and secondary elements. */
export const AMBER_DIM = '\x1b[38;2;170;118;0m';

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';
export const CYAN = '\x1b[36m';

// ---------------------------------------------------------------------------
// Box drawing characters
// ---------------------------------------------------------------------------

export const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

// ---------------------------------------------------------------------------
// Status indicators
// ---------------------------------------------------------------------------

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}⚠${RESET}`;
export const BULLET = `${AMBER}●${RESET}`;

// ---------------------------------------------------------------------------
// Terminal helpers
// ---------------------------------------------------------------------------

/** Get terminal width with 80-column fallback. */
export function termWidth(): number {
  return process.stdout.columns ?? 80;
}

/** Measure visible character length (strips ANSI escape sequences). */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

// ---------------------------------------------------------------------------
// Box rendering
// ---------------------------------------------------------------------------

/**
 * Render a bordered box with an optional title.
 *
 * ```
 * ╭─── Title ─────────────────────────────────────────────────╮
 * │                                                            │
 * │  Content line 1                                            │
 * │                                                            │
 * ╰───────────────────────────────────────────────────────────╯
 * ```
 */
export function box(title: string, lines: string[], width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 2;
  const innerW = w - 2;

  const out: string[] = [];

  if (title) {
    const titleStr = ` ${title} `;
    const dashesAfter = Math.max(0, w - 4 - visibleLength(titleStr));
    out.push(
      `  ${AMBER_DIM}${BOX.topLeft}${BOX.horizontal.repeat(2)}${RESET}` +
      `${AMBER}${BOLD}${titleStr}${RESET}` +
      `${AMBER_DIM}${BOX.horizontal.repeat(dashesAfter)}${BOX.topRight}${RESET}`,
    );
  } else {
    out.push(`  ${AMBER_DIM}${BOX.topLeft}${BOX.horizontal.repeat(w - 2)}${BOX.topRight}${RESET}`);
  }

  const blank = `  ${AMBER_DIM}${BOX.vertical}${RESET}${' '.repeat(innerW)}${AMBER_DIM}${BOX.vertical}${RESET}`;
  out.push(blank);

  for (const line of lines) {
    const padRight = Math.max(0, innerW - 2 - visibleLength(line));
    out.push(
      `  ${AMBER_DIM}${BOX.vertical}${RESET}  ${line}${' '.repeat(padRight)}${AMBER_DIM}${BOX.vertical}${RESET}`,
    );
  }

  out.push(blank);
  out.push(`  ${AMBER_DIM}${BOX.bottomLeft}${BOX.horizontal.repeat(w - 2)}${BOX.bottomRight}${RESET}`);

  return out.join('\n');
}

/**
 * Render a section header with dashes.
 *
 * Example: ── Radio ────────────────────────────
 */
export function sectionHeader(title: string, width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 6;
  const prefix = `${BOX.horizontal.repeat(2)} `;
  const dashesAfter = Math.max(0, w - 3 - title.length - 1);
  return `  ${AMBER_DIM}${prefix}${RESET}${AMBER}${BOLD}${title} ${RESET}${AMBER_DIM}${BOX.horizontal.repeat(dashesAfter)}${RESET}`;
}

/** Example: "Link         bound" */
export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `${BOLD}${label.padEnd(labelWidth, ' ')}${RESET} ${value}`;
}

export function separator(width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 4;
  return `  ${AMBER_DIM}${BOX.horizontal.repeat(w)}${RESET}`;
}

// ---------------------------------------------------------------------------
// Link state
// ---------------------------------------------------------------------------

const STATE_COLORS: Record<ConnectionState, string> = {
  bound: GREEN,
  connecting: YELLOW,
  degraded: YELLOW,
  disconnected: RED,
};

/** Coloured connection state, e.g. a green "bound". */
export function stateBadge(state: ConnectionState): string {
  return `${STATE_COLORS[state]}${state}${RESET}`;
}

/** Left-aligned columns, padded to the widest visible cell. */
export function table(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, visibleLength(cell));
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell + ' '.repeat((widths[i] ?? 0) - visibleLength(cell))))
      .join('  '),
  );
}
