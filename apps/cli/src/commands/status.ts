/**
 * `meshbridge status`: ask a running bridge or interface for its link
 * state through the control plane.
 *
 *   meshbridge status [--json]
 */

import { loadConfig } from '../config.js';
import { endpointFromConfig, getStatus, renderStatus } from '../control-client.js';
import { box } from '../ui.js';

export async function status(args: string[]): Promise<void> {
  const config = loadConfig();
  const result = await getStatus(endpointFromConfig(config));

  if (args.includes('--json')) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log('');
  console.log(box('meshbridge status', renderStatus(result), 64));
  console.log('');
}
