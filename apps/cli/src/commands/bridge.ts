/**
 * `meshbridge bridge`: serve the framed local socket on top of a
 * supervised Meshtastic link.
 *
 *   meshbridge bridge [--port N] [--radio-host H] [--transport tcp|http]
 *                     [--channel NAME] [--speed CODE] [--unicast ID]
 *                     [--secret S] [--no-control]
 */

import type { MeshBridgeConfig } from '@meshbridge/core';
import { minSpacingMs } from '@meshbridge/framing';
import { describeAddress } from '@meshbridge/gateway';
import { parseServeArgs } from '../args.js';
import { ensureConfigDir, loadConfig, resolveRadioEndpoint } from '../config.js';
import { describeAddressView } from '../control-client.js';
import { createCliObserver, startBridge } from '../runtime.js';
import { box, kvRow, AMBER, DIM, GREEN, RESET, YELLOW } from '../ui.js';
import { runUntilSignal } from './lifecycle.js';

export function describeRadio(config: MeshBridgeConfig): string {
  const { host, port } = resolveRadioEndpoint(config);
  return `${config.radio.transport}://${host}${port === undefined ? '' : `:${port}`}`;
}

export function describeChannel(config: MeshBridgeConfig): string {
  const { channel } = config.radio;
  return channel.kind === 'private-app' ? 'private app port' : `named stream "${channel.name}"`;
}

export async function bridge(args: string[]): Promise<void> {
  const { overrides } = parseServeArgs(args, 'bridge');
  const config = loadConfig({ overrides });
  ensureConfigDir();

  const observer = createCliObserver(config);
  const runtime = await startBridge(config, { observer });

  const listening = runtime.server.getAddress();
  const control = runtime.control?.getAddress();
  const auth = config.bridge.auth.mode === 'token' ? `${GREEN}challenge${RESET}` : `${YELLOW}disabled${RESET}`;

  console.log('');
  console.log(box('meshbridge bridge', [
    kvRow('Listening', `${AMBER}${listening?.host ?? config.bridge.host}:${listening?.port ?? config.bridge.port}${RESET}`),
    kvRow('Radio', describeRadio(config)),
    kvRow('Channel', describeChannel(config)),
    kvRow('Address', describeAddressView(describeAddress(runtime.addressPolicy.current()))),
    kvRow('Pacing', `speed ${config.radio.speedCode}, ${minSpacingMs(config.radio.speedCode)}ms between frames`),
    kvRow('Auth', auth),
    kvRow('Control', control ? `http://${control.host}:${control.port}` : `${DIM}disabled${RESET}`),
  ], 64));
  console.log(`\n  ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  await runUntilSignal('bridge', () => runtime.stop(), observer);
}
