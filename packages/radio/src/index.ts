/**
 * @meshbridge/radio: RadioLink implementations.
 */

export { MeshtasticLink, resolveRoute } from './meshtastic-link.js';
export type { MeshtasticLinkOpts, ChannelEntry, Route } from './meshtastic-link.js';

export { BridgeSocketLink } from './bridge-socket-link.js';
export type { BridgeSocketLinkOpts } from './bridge-socket-link.js';

export { TcpStreamTransport, DEFAULT_STREAM_PORT } from './tcp-stream-transport.js';
export type { TcpStreamTransportOpts } from './tcp-stream-transport.js';

export { HttpApiTransport } from './http-api-transport.js';
export type { HttpApiTransportOpts } from './http-api-transport.js';

export type { DeviceTransport, TransportClose } from './transport.js';

export { encodeStreamFrame, StreamFrameDecoder, WAKE_SEQUENCE, MAX_STREAM_PAYLOAD } from './stream-codec.js';

export {
  decodeFromRadio,
  encodePacket,
  encodeWantConfig,
  encodeHeartbeat,
  encodeDisconnect,
} from './mesh-packets.js';
export type { DeviceMessage, MeshPacketOut, ReceivedPacket } from './mesh-packets.js';

export {
  getMeshtasticTypes,
  MAX_DATA_PAYLOAD,
  PORTNUM_PRIVATE_APP,
  PORTNUM_RETICULUM_TUNNEL,
} from './schema.js';
