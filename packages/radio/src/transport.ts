/**
 * DeviceTransport: how a MeshtasticLink moves ToRadio/FromRadio bytes.
 *
 * Transports carry whole protobuf messages; any wire framing is their
 * own business. A transport is opened once per connect() and closed
 * once; the link builds a fresh session on the next connect().
 */

export interface TransportClose {
  error: Error;
  /** A retry cannot help (e.g. the device refused our credentials). */
  permanent: boolean;
}

export interface DeviceTransport {
  readonly kind: 'tcp' | 'http';
  /** Human-readable endpoint, for logs. */
  readonly target: string;

  open(signal?: AbortSignal): Promise<void>;
  write(toRadio: Uint8Array): Promise<void>;
  close(): Promise<void>;

  onMessage(handler: (fromRadio: Uint8Array) => void): void;
  /** Fired once when an open transport fails. Not fired by close(). */
  onClose(handler: (event: TransportClose) => void): void;
}
