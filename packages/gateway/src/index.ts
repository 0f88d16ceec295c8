/**
 * @meshbridge/gateway: the local framed socket, its challenge auth, and the
 * HTTP + WebSocket control plane.
 */

export { BridgeServer } from './bridge-server.js';
export type { BridgeServerOpts, BridgeClientInfo } from './bridge-server.js';

export { BridgeSession, DEFAULT_AUTH_TIMEOUT_MS, DEFAULT_MAX_BUFFERED_BYTES } from './bridge-session.js';
export type { BridgeSessionOpts, SessionState } from './bridge-session.js';

export { ControlServer, describeAddress, DEFAULT_CONTROL_PORT } from './control-server.js';
export type { ControlServerOptions, ControlTarget, AddressView } from './control-server.js';
