/**
 * Command-line flags shared by `bridge` and `interface`, turned into a
 * config fragment that loadConfig() merges over the file. Values are left
 * for validation to judge, so a bad flag reports the same field-level
 * message as a bad config entry.
 */

import { ConfigError } from '@meshbridge/core';

type Fields = Record<string, unknown>;

export interface ParsedArgs {
  overrides: Fields;
  positional: string[];
}

function numeric(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}

function isRecord(value: unknown): value is Fields {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Set a dotted path, creating intermediate objects. */
function set(target: Fields, path: string, value: unknown): void {
  const keys = path.split('.');
  const last = keys.pop();
  if (last === undefined) return;

  let node = target;
  for (const key of keys) {
    let child: unknown = node[key];
    if (!isRecord(child)) {
      const created: Fields = {};
      node[key] = created;
      child = created;
    }
    node = child;
  }
  node[last] = value;
}

/** Flags that take a value, and the config path each one sets. */
const VALUE_FLAGS = new Map<string, (value: string, listener: string) => [string, unknown]>([
  ['--port', (v, listener) => [`${listener}.port`, numeric(v)]],
  ['--host', (v, listener) => [`${listener}.host`, v]],
  ['--transport', (v) => ['radio.transport', v]],
  ['--radio-host', (v) => ['radio.host', v]],
  ['--radio-port', (v) => ['radio.port', numeric(v)]],
  ['--channel', (v) => ['radio.channel', v === 'private-app' ? { kind: 'private-app' } : { kind: 'named-stream', name: v }]],
  ['--speed', (v) => ['radio.speedCode', numeric(v)]],
  ['--mtu', (v) => ['radio.mtu', numeric(v)]],
  ['--unicast', (v) => ['address', { mode: 'unicast', destination: numeric(v) }]],
  ['--secret', (v) => ['bridge.auth', { mode: 'token', secret: v }]],
  ['--radio-secret', (v) => ['radio.secret', v]],
  ['--control-port', (v) => ['control.port', numeric(v)]],
  ['--log-level', (v) => ['observability.logLevel', v]],
]);

const SWITCH_FLAGS = new Map<string, [string, unknown]>([
  ['--broadcast', ['address', { mode: 'broadcast' }]],
  ['--no-control', ['control.enabled', false]],
  ['--allow-public-bind', ['bridge.allowPublicBind', true]],
]);

/**
 * Parse flags for a serving command. `--port` and `--host` apply to the
 * section named by `listener` (`bridge` or `interface`).
 */
export function parseServeArgs(args: string[], listener: 'bridge' | 'interface'): ParsedArgs {
  const overrides: Fields = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    const valueFlag = VALUE_FLAGS.get(arg);
    if (valueFlag) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Option ${arg} needs a value`, { option: arg });
      }
      const [path, parsed] = valueFlag(value, listener);
      set(overrides, path, parsed);
      i++;
      continue;
    }

    const switchFlag = SWITCH_FLAGS.get(arg);
    if (switchFlag) {
      set(overrides, switchFlag[0], switchFlag[1]);
      continue;
    }

    if (arg.startsWith('--')) {
      throw new ConfigError(`Unknown option ${arg}`, { option: arg });
    }
    positional.push(arg);
  }

  return { overrides, positional };
}
