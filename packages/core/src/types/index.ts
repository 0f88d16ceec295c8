/**
 * Shared types used across all meshbridge packages.
 */

// === Radio addressing ===

/** 32-bit unsigned Meshtastic node number. */
export type NodeNum = number;

/** Node number the mesh treats as "every node". */
export const BROADCAST_NUM: NodeNum = 0xffffffff;

/** Source reported when a link cannot know the sender (e.g. the bridge socket). */
export const UNKNOWN_NODE: NodeNum = 0;

export type RadioAddress =
  | { kind: 'broadcast' }
  | { kind: 'unicast'; destination: NodeNum };

// === Channel binding ===

export type ChannelBinding =
  | { kind: 'private-app' }
  | { kind: 'named-stream'; name: string };

// === Link lifecycle ===

export type ConnectionState = 'disconnected' | 'connecting' | 'bound' | 'degraded';

export interface InboundFrame {
  payload: Uint8Array;
  source: NodeNum;
}

/** What a link learned about the radio while binding. */
export interface LinkInfo {
  /** Our own node number, when the transport reports it. */
  localNode?: NodeNum;
  /** Meshtastic port number frames are tagged with. */
  portnum?: number;
  /** Device channel index frames travel on. */
  channelIndex?: number;
  /** LoRa modem preset the device reported (same numbering as speed codes). */
  modemPreset?: number;
}

// === Events ===

export interface LinkStateEvent {
  linkId: string;
  from: ConnectionState;
  to: ConnectionState;
  reason?: string;
  /** Set on `disconnected` when a retry has been scheduled. */
  retryInMs?: number;
  timestamp: Date;
}

export interface FrameEvent {
  direction: 'outbound' | 'inbound' | 'dropped';
  bytes: number;
  address?: RadioAddress;
  source?: NodeNum;
  reason?: string;
  timestamp: Date;
}

export interface ClientEvent {
  type: 'connected' | 'authenticated' | 'rejected' | 'disconnected';
  remote: string;
  reason?: string;
  timestamp: Date;
}

export interface SecurityEvent {
  type: 'auth_failed' | 'auth_timeout' | 'control_unauthorized';
  details: Record<string, unknown>;
  timestamp: Date;
}

// === Configuration ===

export type AuthConfig =
  | { mode: 'disabled' }
  | { mode: 'token'; secret: string };

export type AddressConfig =
  | { mode: 'broadcast' }
  | { mode: 'unicast'; destination: string | number };

export type RadioTransportKind = 'tcp' | 'http' | 'bridge';

export type ByteOrder = 'be' | 'le';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface MeshBridgeConfig {
  bridge: {
    host: string;
    port: number;
    allowPublicBind: boolean;
    byteOrder: ByteOrder;
    /** Reserved-length variant: declared lengths above this are malformed. */
    maxPayloadBytes?: number;
    auth: AuthConfig;
    authTimeoutMs: number;
  };
  radio: {
    transport: RadioTransportKind;
    /** Unset means meshtastic.local for a device, the local bridge for `bridge`. */
    host?: string;
    port?: number;
    tls?: boolean;
    channel: ChannelBinding;
    /** Largest fragment the adapter hands to the radio, header included. */
    mtu: number;
    speedCode: number;
    hopLimit: number;
    /** Shared secret when `transport` is `bridge` and the bridge requires auth. */
    secret?: string;
  };
  address: AddressConfig;
  supervisor: {
    minBackoffMs: number;
    maxBackoffMs: number;
    staleAfterMs: number;
    probeIntervalMs: number;
    queueCapacity: number;
  };
  control: {
    enabled: boolean;
    port: number;
  };
  interface: {
    host: string;
    port: number;
  };
  observability: {
    observers: string[];
    logLevel: LogLevel;
    logFile?: string;
  };
}
