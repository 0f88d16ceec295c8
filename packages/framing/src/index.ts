/**
 * @meshbridge/framing: wire contracts shared by the bridge and the adapter.
 * No third-party dependencies.
 */

export {
  encodeFrame,
  decodeFrames,
  FrameDecoder,
  LENGTH_PREFIX_BYTES,
  MAX_FRAME_PAYLOAD,
  DEFAULT_BRIDGE_HOST,
  DEFAULT_BRIDGE_PORT,
} from './frame-codec.js';
export type { FrameCodecOptions } from './frame-codec.js';

export {
  delayFor,
  delayForOrSlowest,
  minSpacingMs,
  listSpeedProfiles,
  effectiveMtu,
  isKnownSpeedCode,
  DEFAULT_MTU,
  DEFAULT_SPEED_CODE,
  RADIO_PAYLOAD_MTU,
  SLOWEST_SPEED_CODE,
} from './speed-profile.js';
export type { SpeedProfileEntry } from './speed-profile.js';

export { AddressPolicy, sameAddress } from './address-policy.js';
export type { AddressListener } from './address-policy.js';

export {
  chunkPacket,
  FragmentChunker,
  Reassembler,
  FRAGMENT_HEADER_BYTES,
  MAX_FRAGMENTS,
  DEFAULT_REASSEMBLY_TIMEOUT_MS,
} from './chunker.js';
export type { ReassemblerOptions } from './chunker.js';

export {
  createChallenge,
  signChallenge,
  verifyChallenge,
  CHALLENGE_NONCE_BYTES,
  CHALLENGE_RESPONSE_BYTES,
} from './challenge.js';
