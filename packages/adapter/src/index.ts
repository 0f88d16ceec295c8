/**
 * @meshbridge/adapter: the networking-stack side: a fragmenting mesh
 * interface and an HDLC TCP server a Reticulum instance can attach to.
 */

export { MeshInterface, INTERFACE_HW_MTU, MIN_PACKET_BYTES } from './mesh-interface.js';
export type { MeshInterfaceOpts, PacketPort, SupervisedPort } from './mesh-interface.js';

export { HdlcInterfaceServer, DEFAULT_INTERFACE_PORT, DEFAULT_INTERFACE_BUFFER_BYTES } from './hdlc-interface-server.js';
export type { HdlcInterfaceServerOpts } from './hdlc-interface-server.js';

export { HdlcDecoder, hdlcEscape, hdlcFrame, HDLC_FLAG, HDLC_ESC, HDLC_ESC_MASK } from './hdlc.js';
