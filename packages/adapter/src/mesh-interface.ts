/**
 * MeshInterface: the networking stack's view of the mesh.
 *
 * send() splits a packet into fragments no larger than the radio MTU and
 * submits each one to the supervised radio port; they queue there while
 * the link is down. Inbound fragments are reassembled per sender, and
 * whole packets reach onReceive handlers.
 */

import {
  PayloadTooLarge,
  type ConnectionState,
  type IObserver,
  type IRadioPort,
  type InboundFrame,
} from '@meshbridge/core';
import {
  AddressPolicy,
  DEFAULT_MTU,
  FragmentChunker,
  Reassembler,
} from '@meshbridge/framing';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A radio port with a lifecycle. ReconnectSupervisor satisfies it. */
export interface SupervisedPort extends IRadioPort {
  start(): void;
  stop(): Promise<void>;
}

/** What a packet transport (e.g. the HDLC server) needs from the interface. */
export interface PacketPort {
  send(packet: Uint8Array): boolean;
  onReceive(handler: (packet: Uint8Array) => void): () => void;
}

export interface MeshInterfaceOpts {
  port: SupervisedPort;
  /** Largest fragment handed to the radio, header included. Default: 180. */
  mtu?: number;
  /** Where fragments go. Default: broadcast. */
  addressPolicy?: AddressPolicy;
  reassemblyTimeoutMs?: number;
  observer?: IObserver;
}

/** Largest packet the networking stack may hand to this interface. */
export const INTERFACE_HW_MTU = 564;

/** Reassembled packets shorter than this cannot be networking-stack frames. */
export const MIN_PACKET_BYTES = 16;

// ---------------------------------------------------------------------------
// MeshInterface
// ---------------------------------------------------------------------------

export class MeshInterface implements PacketPort {
  readonly hwMtu = INTERFACE_HW_MTU;
  readonly mtu: number;

  private readonly port: SupervisedPort;
  private readonly addressPolicy: AddressPolicy;
  private readonly chunker: FragmentChunker;
  private readonly reassembler: Reassembler;
  private readonly observer?: IObserver;
  private readonly handlers = new Set<(packet: Uint8Array) => void>();
  private unsubscribe: Array<() => void> = [];
  private running = false;
  private counters = { txBytes: 0, rxBytes: 0 };

  constructor(opts: MeshInterfaceOpts) {
    this.port = opts.port;
    this.mtu = opts.mtu ?? DEFAULT_MTU;
    this.addressPolicy = opts.addressPolicy ?? new AddressPolicy();
    this.chunker = new FragmentChunker(this.mtu);
    this.reassembler = new Reassembler({ reassemblyTimeoutMs: opts.reassemblyTimeoutMs });
    this.observer = opts.observer;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.unsubscribe.push(this.port.onReceive((frame) => this.handleFrame(frame)));
    this.port.start();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (const off of this.unsubscribe) off();
    this.unsubscribe = [];
    await this.port.stop();
    this.reassembler.clear();
  }

  /** True while the radio link is bound. */
  get online(): boolean {
    return this.port.getState() === 'bound';
  }

  get state(): ConnectionState {
    return this.port.getState();
  }

  get txBytes(): number {
    return this.counters.txBytes;
  }

  get rxBytes(): number {
    return this.counters.rxBytes;
  }

  /**
   * Queue a packet for transmission. Returns false when it was dropped:
   * the interface is stopped, or the packet needs more fragments than the
   * header can number.
   */
  send(packet: Uint8Array): boolean {
    if (!this.running) {
      this.reportDrop(packet.length, 'interface not running');
      return false;
    }

    let fragments: Uint8Array[];
    try {
      fragments = this.chunker.chunk(packet);
    } catch (err) {
      if (!(err instanceof PayloadTooLarge)) throw err;
      this.observer?.onError(err, { phase: 'chunk', bytes: packet.length, mtu: this.mtu });
      this.reportDrop(packet.length, err.message);
      return false;
    }

    const address = this.addressPolicy.current();
    for (const fragment of fragments) {
      this.port.submit(fragment, address);
    }
    this.counters.txBytes += packet.length;
    return true;
  }

  onReceive(handler: (packet: Uint8Array) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private handleFrame(frame: InboundFrame): void {
    const packet = this.reassembler.accept(frame.payload, frame.source);
    if (!packet) return;

    if (packet.length < MIN_PACKET_BYTES) {
      this.observer?.onFrame({
        direction: 'dropped',
        bytes: packet.length,
        source: frame.source,
        reason: `reassembled packet shorter than ${MIN_PACKET_BYTES} bytes`,
        timestamp: new Date(),
      });
      return;
    }

    this.counters.rxBytes += packet.length;
    for (const handler of [...this.handlers]) {
      handler(packet);
    }
  }

  private reportDrop(bytes: number, reason: string): void {
    this.observer?.onFrame({ direction: 'dropped', bytes, reason, timestamp: new Date() });
  }
}
