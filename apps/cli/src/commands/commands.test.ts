/**
 * Tests for CLI commands: speeds, status, address, reconnect and the
 * banner helpers shared by the serving commands.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { LinkStateEvent } from '@meshbridge/core';
import { AddressPolicy, listSpeedProfiles } from '@meshbridge/framing';
import { ControlServer, type ControlTarget } from '@meshbridge/gateway';
import type { SupervisorStats } from '@meshbridge/supervisor';

// ---------------------------------------------------------------------------
// Mock homedir for config functions
// ---------------------------------------------------------------------------

const TEST_HOME = join(tmpdir(), `meshbridge-cmd-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

vi.mock('node:os', async () => {
  const actual = await vi.importActual<typeof import('node:os')>('node:os');
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

import { getDefaultConfig } from '../config.js';
import { describeChannel, describeRadio } from './bridge.js';
import { speedRows, speeds } from './speeds.js';
import { status } from './status.js';
import { address } from './address.js';
import { reconnect } from './reconnect.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let logSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  mkdirSync(TEST_HOME, { recursive: true });
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  logSpy.mockRestore();
  rmSync(TEST_HOME, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function writeTestConfig(config: Record<string, unknown>): void {
  const dir = join(TEST_HOME, '.meshbridge');
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'config.json'), JSON.stringify(config));
}

function output(): string {
  return logSpy.mock.calls.map((call: unknown[]) => String(call[0])).join('\n');
}

class FakeTarget implements ControlTarget {
  readonly linkId = 'meshtastic-tcp';
  forceReconnect = vi.fn();

  getStats(): SupervisorStats {
    return {
      state: 'bound',
      queueDepth: 0,
      sent: 1,
      received: 2,
      dropped: 0,
      binds: 1,
      failedAttempts: 0,
      linkInfo: null,
    };
  }

  onStateChange(_listener: (event: LinkStateEvent) => void): () => void {
    return () => {};
  }
}

// ---------------------------------------------------------------------------
// Banner helpers
// ---------------------------------------------------------------------------

describe('describeRadio / describeChannel', () => {
  it('describes the default radio', () => {
    const config = getDefaultConfig();

    expect(describeRadio(config)).toBe('tcp://meshtastic.local');
    expect(describeChannel(config)).toBe('private app port');
  });

  it('includes the port and a named channel', () => {
    const config = getDefaultConfig();
    config.radio.transport = 'http';
    config.radio.port = 8080;
    config.radio.channel = { kind: 'named-stream', name: 'reticulum' };

    expect(describeRadio(config)).toBe('http://meshtastic.local:8080');
    expect(describeChannel(config)).toBe('named stream "reticulum"');
  });

  it('describes a bridge transport by the bridge it will reach', () => {
    const config = getDefaultConfig();
    config.radio.transport = 'bridge';

    expect(describeRadio(config)).toBe('bridge://127.0.0.1:45832');
  });
});

// ---------------------------------------------------------------------------
// speeds
// ---------------------------------------------------------------------------

describe('speeds', () => {
  it('builds rows from fastest to slowest', () => {
    const rows = speedRows(listSpeedProfiles(180));

    expect(rows[0]).toEqual(['code', 'preset', 'spacing', 'throughput']);
    expect(rows[1]).toEqual(['8', 'SHORT_TURBO', '0.4s', '450 B/s']);
    expect(rows.at(-1)).toEqual(['1', 'LONG_SLOW', '15s', '12 B/s']);
    expect(rows).toHaveLength(9);
  });

  it('prints the table for a given mtu', () => {
    speeds(['--mtu', '90']);

    expect(output()).toContain('Throughput assumes 90-byte frames.');
    expect(output()).toContain('225 B/s');
  });

  it('rejects a malformed mtu', () => {
    expect(() => speeds(['--mtu', 'big'])).toThrow('--mtu needs a positive whole number of bytes');
    expect(() => speeds(['--mtu'])).toThrow('--mtu needs a positive whole number of bytes');
  });
});

// ---------------------------------------------------------------------------
// Control plane commands
// ---------------------------------------------------------------------------

describe('control plane commands', () => {
  let server: ControlServer;
  let target: FakeTarget;
  let policy: AddressPolicy;

  beforeEach(async () => {
    target = new FakeTarget();
    policy = new AddressPolicy();
    server = new ControlServer({ port: 0, target, addressPolicy: policy, binding: { kind: 'private-app' } });
    await server.start();
    writeTestConfig({ control: { port: server.getAddress()?.port } });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('status --json prints the raw body', async () => {
    await status(['--json']);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual(server.status());
  });

  it('status prints a box with the link row', async () => {
    await status([]);

    expect(output()).toContain('meshbridge status');
    expect(output()).toContain('meshtastic-tcp');
    expect(output()).toContain('1 sent, 2 received, 0 dropped');
  });

  it('address sets unicast and broadcast', async () => {
    await address(['!0000002a']);
    expect(policy.current()).toEqual({ kind: 'unicast', destination: 42 });
    expect(output()).toContain('unicast !0000002a');

    await address(['broadcast']);
    expect(policy.current()).toEqual({ kind: 'broadcast' });
  });

  it('address with no argument shows the current address', async () => {
    policy.setUnicast(7);

    await address([]);

    expect(output()).toContain('unicast !00000007');
  });

  it('address rejects a malformed node id before contacting the process', async () => {
    await expect(address(['node-7'])).rejects.toThrow(
      '"node-7" is not a node id; use broadcast, !a1b2c3d4 or a decimal number',
    );
    expect(policy.current()).toEqual({ kind: 'broadcast' });
  });

  it('reconnect asks the target to rebind', async () => {
    await reconnect();

    expect(target.forceReconnect).toHaveBeenCalledWith('reconnect requested via control plane');
    expect(output()).toContain('Reconnect requested');
  });
});
