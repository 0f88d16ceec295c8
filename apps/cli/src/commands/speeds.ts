/**
 * `meshbridge speeds [--mtu N]`: the speed codes a bridge accepts, with
 * the spacing each enforces and the throughput that leaves.
 */

import { ConfigError } from '@meshbridge/core';
import { DEFAULT_MTU, listSpeedProfiles, type SpeedProfileEntry } from '@meshbridge/framing';
import { sectionHeader, table, AMBER, DIM, RESET } from '../ui.js';

export function speedRows(entries: SpeedProfileEntry[]): string[][] {
  return [
    ['code', 'preset', 'spacing', 'throughput'],
    ...entries.map((e) => [
      String(e.code),
      e.preset,
      `${e.delaySeconds}s`,
      `${e.bytesPerSecond} B/s`,
    ]),
  ];
}

function readMtu(args: string[]): number {
  const i = args.indexOf('--mtu');
  if (i === -1) return DEFAULT_MTU;
  const raw = args[i + 1];
  const mtu = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(mtu) || mtu < 1) {
    throw new ConfigError('--mtu needs a positive whole number of bytes', { value: raw });
  }
  return mtu;
}

export function speeds(args: string[]): void {
  const mtu = readMtu(args);
  const rows = table(speedRows(listSpeedProfiles(mtu)));

  console.log('');
  console.log(sectionHeader('Speed profiles', 64));
  console.log('');
  const [header, ...body] = rows;
  if (header !== undefined) console.log(`  ${AMBER}${header}${RESET}`);
  for (const row of body) console.log(`  ${row}`);
  console.log(`\n  ${DIM}Throughput assumes ${mtu}-byte frames.${RESET}\n`);
}
