/**
 * `meshbridge reconnect`: drop the radio link and bind again with a
 * fresh backoff.
 */

import { loadConfig } from '../config.js';
import { endpointFromConfig, requestReconnect } from '../control-client.js';
import { CHECK } from '../ui.js';

export async function reconnect(): Promise<void> {
  await requestReconnect(endpointFromConfig(loadConfig()));
  console.log(`\n  ${CHECK} Reconnect requested\n`);
}
