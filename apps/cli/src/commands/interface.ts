/**
 * `meshbridge interface`: fragmenting interface for an unmodified
 * Reticulum instance. Point a TCPClientInterface at the HDLC port.
 *
 *   meshbridge interface [--port N] [--transport tcp|http|bridge]
 *                        [--radio-host H] [--radio-port N] [--mtu N]
 *                        [--radio-secret S] [--no-control]
 */

import { parseServeArgs } from '../args.js';
import { ensureConfigDir, loadConfig } from '../config.js';
import { createCliObserver, startInterface } from '../runtime.js';
import { box, kvRow, AMBER, DIM, RESET } from '../ui.js';
import { describeChannel, describeRadio } from './bridge.js';
import { runUntilSignal } from './lifecycle.js';

export async function meshInterface(args: string[]): Promise<void> {
  const { overrides } = parseServeArgs(args, 'interface');
  const config = loadConfig({ overrides });
  ensureConfigDir();

  const observer = createCliObserver(config);
  const runtime = await startInterface(config, { observer });

  const listening = runtime.server.getAddress();
  const control = runtime.control?.getAddress();

  console.log('');
  console.log(box('meshbridge interface', [
    kvRow('HDLC port', `${AMBER}${listening?.host ?? config.interface.host}:${listening?.port ?? config.interface.port}${RESET}`),
    kvRow('Radio', describeRadio(config)),
    kvRow('Channel', describeChannel(config)),
    kvRow('Fragment MTU', `${runtime.meshInterface.mtu} bytes (packets up to ${runtime.meshInterface.hwMtu})`),
    kvRow('Control', control ? `http://${control.host}:${control.port}` : `${DIM}disabled${RESET}`),
  ], 64));
  console.log(`\n  ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  await runUntilSignal('interface', () => runtime.stop(), observer);
}
