/**
 * `meshbridge address [broadcast|<node>]`: show or change where outbound
 * frames go. Takes effect on the next frame; a frame already queued keeps
 * the address it was sent with.
 */

import { ConfigError, parseNodeId } from '@meshbridge/core';
import { loadConfig } from '../config.js';
import { describeAddressView, endpointFromConfig, getStatus, setAddress } from '../control-client.js';
import { kvRow, CHECK } from '../ui.js';

export async function address(args: string[]): Promise<void> {
  const endpoint = endpointFromConfig(loadConfig());
  const target = args[0];

  if (target === undefined) {
    const current = await getStatus(endpoint);
    console.log(`\n  ${kvRow('Address', describeAddressView(current['address']))}\n`);
    return;
  }

  if (target !== 'broadcast' && parseNodeId(target) === null) {
    throw new ConfigError(`"${target}" is not a node id; use broadcast, !a1b2c3d4 or a decimal number`, {
      target,
    });
  }

  const result = await setAddress(endpoint, target);
  console.log(`\n  ${CHECK} ${kvRow('Address', describeAddressView(result['address']))}\n`);
}
