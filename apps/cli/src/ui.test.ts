/**
 * Tests for the shared CLI styling module.
 */

import { describe, it, expect } from 'vitest';
import {
  box,
  sectionHeader,
  kvRow,
  separator,
  visibleLength,
  stateBadge,
  table,
  AMBER,
  AMBER_DIM,
  RESET,
  BOLD,
  GREEN,
  YELLOW,
  RED,
  BOX,
  CHECK,
  CROSS,
  WARN,
  BULLET,
} from './ui.js';

describe('glyphs', () => {
  it('uses rounded box corners and single-width status marks', () => {
    expect(BOX).toEqual({
      topLeft: '\u256d',
      topRight: '\u256e',
      bottomLeft: '\u2570',
      bottomRight: '\u256f',
      horizontal: '\u2500',
      vertical: '\u2502',
    });
    expect([CHECK, CROSS, WARN, BULLET].map(visibleLength)).toEqual([1, 1, 1, 1]);
  });
});

describe('visibleLength', () => {
  it('returns length of plain text', () => {
    expect(visibleLength('hello')).toBe(5);
  });

  it('strips ANSI escape sequences', () => {
    expect(visibleLength(`${GREEN}bound${RESET}`)).toBe(5);
    expect(visibleLength(`${AMBER}${BOLD}x${RESET}`)).toBe(1);
  });

  it('returns 0 for an ANSI-only string', () => {
    expect(visibleLength(`${RED}${RESET}`)).toBe(0);
  });
});

describe('box', () => {
  it('renders a titled box with borders on every line', () => {
    const lines = box('Bridge', ['port 45832'], 40).split('\n');

    expect(lines).toHaveLength(5);
    expect(lines[0]).toContain(BOX.topLeft);
    expect(lines[0]).toContain('Bridge');
    expect(lines[2]).toContain('port 45832');
    expect(lines[4]).toContain(BOX.bottomRight);
    for (const line of lines.slice(1, 4)) {
      expect(visibleLength(line)).toBe(40);
    }
  });

  it('renders a box without a title', () => {
    const first = box('', [], 30).split('\n')[0];
    expect(first).toBe(`  ${AMBER_DIM}${BOX.topLeft}${BOX.horizontal.repeat(26)}${BOX.topRight}${RESET}`);
  });
});

describe('sectionHeader', () => {
  it('renders the title in the accent colour', () => {
    const header = sectionHeader('Radio', 40);
    expect(header).toContain(`${AMBER}${BOLD}Radio ${RESET}`);
    expect(header.startsWith(`  ${AMBER_DIM}${BOX.horizontal.repeat(2)} `)).toBe(true);
  });
});

describe('kvRow', () => {
  it('pads the label to the default width', () => {
    expect(kvRow('Link', 'bound')).toBe(`${BOLD}Link          ${RESET} bound`);
  });

  it('pads the label to a given width', () => {
    expect(kvRow('Port', '4242', 6)).toBe(`${BOLD}Port  ${RESET} 4242`);
  });
});

describe('separator', () => {
  it('renders a line of dashes', () => {
    expect(separator(24)).toBe(`  ${AMBER_DIM}${BOX.horizontal.repeat(20)}${RESET}`);
  });
});

describe('stateBadge', () => {
  it('colours each connection state', () => {
    expect(stateBadge('bound')).toBe(`${GREEN}bound${RESET}`);
    expect(stateBadge('connecting')).toBe(`${YELLOW}connecting${RESET}`);
    expect(stateBadge('degraded')).toBe(`${YELLOW}degraded${RESET}`);
    expect(stateBadge('disconnected')).toBe(`${RED}disconnected${RESET}`);
  });
});

describe('table', () => {
  it('aligns columns by visible width', () => {
    expect(table([
      ['code', 'preset', 'delay'],
      ['8', 'SHORT_TURBO', '0.4s'],
      [`${GREEN}1${RESET}`, 'LONG_SLOW', '15s'],
    ])).toEqual([
      'code  preset       delay',
      '8     SHORT_TURBO  0.4s',
      `${GREEN}1${RESET}     LONG_SLOW    15s`,
    ]);
  });
});
