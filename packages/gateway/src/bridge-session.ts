/**
 * BridgeSession: one accepted client on the local socket.
 *
 * Bytes from the client are decoded into frames and each frame is submitted
 * to the radio with the address AddressPolicy gives at that moment. Frames
 * longer than the radio MTU are dropped; the client stays. Radio payloads
 * handed to deliver() are framed and written back in order. A client that
 * stops reading is closed once maxBufferedBytes are waiting for it.
 *
 * With a shared secret the session starts in `authenticating`: it sends a
 * nonce frame and expects HMAC-SHA256(secret, nonce) as the first frame
 * back within authTimeoutMs. Anything else closes the socket.
 */

import type { Socket } from 'node:net';
import type { AuthConfig, IObserver, IRadioPort } from '@meshbridge/core';
import {
  FrameDecoder,
  createChallenge,
  encodeFrame,
  verifyChallenge,
  type AddressPolicy,
  type FrameCodecOptions,
} from '@meshbridge/framing';

export type SessionState = 'authenticating' | 'ready' | 'closed';

export interface BridgeSessionOpts {
  socket: Socket;
  radio: IRadioPort;
  addressPolicy: AddressPolicy;
  codec?: FrameCodecOptions;
  auth?: AuthConfig;
  /** Default: 10000. */
  authTimeoutMs?: number;
  /** Largest payload submitted to the radio. Default: no limit beyond the codec's. */
  mtu?: number;
  /** Unsent bytes allowed to pile up for the client. Default: 1 MiB. */
  maxBufferedBytes?: number;
  observer?: IObserver;
  /** Called once when the session has torn down, whatever the cause. */
  onClosed?: (session: BridgeSession) => void;
}

export const DEFAULT_AUTH_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

export class BridgeSession {
  readonly remote: string;
  readonly connectedAt = new Date();

  private state: SessionState;
  private readonly socket: Socket;
  private readonly radio: IRadioPort;
  private readonly addressPolicy: AddressPolicy;
  private readonly codec: FrameCodecOptions;
  private readonly decoder: FrameDecoder;
  private readonly secret: string | null;
  private readonly mtu: number | undefined;
  private readonly maxBufferedBytes: number;
  private readonly observer?: IObserver;
  private readonly onClosed?: (session: BridgeSession) => void;
  private nonce: Uint8Array | null = null;
  private authTimer: ReturnType<typeof setTimeout> | null = null;
  private framesIn = 0;
  private framesOut = 0;

  constructor(opts: BridgeSessionOpts) {
    this.socket = opts.socket;
    this.radio = opts.radio;
    this.addressPolicy = opts.addressPolicy;
    this.codec = opts.codec ?? {};
    this.decoder = new FrameDecoder(this.codec);
    this.secret = opts.auth?.mode === 'token' ? opts.auth.secret : null;
    this.mtu = opts.mtu;
    this.maxBufferedBytes = opts.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.observer = opts.observer;
    this.onClosed = opts.onClosed;
    this.remote = `${opts.socket.remoteAddress ?? 'unknown'}:${opts.socket.remotePort ?? 0}`;
    this.state = this.secret ? 'authenticating' : 'ready';

    this.socket.setNoDelay(true);
    this.socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    this.socket.on('error', (err: Error) => {
      this.observer?.onError(err, { phase: 'client', remote: this.remote });
    });
    this.socket.on('close', () => this.teardown('connection closed'));

    this.observer?.onClient({ type: 'connected', remote: this.remote, timestamp: new Date() });

    if (this.secret) this.sendChallenge(opts.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS);
  }

  getState(): SessionState {
    return this.state;
  }

  stats(): { framesIn: number; framesOut: number } {
    return { framesIn: this.framesIn, framesOut: this.framesOut };
  }

  /** Frame a radio payload and write it to the client. Returns false when not ready. */
  deliver(payload: Uint8Array): boolean {
    if (this.state !== 'ready') return false;
    let frame: Uint8Array;
    try {
      frame = encodeFrame(payload, this.codec);
    } catch (err) {
      this.observer?.onError(toError(err), { phase: 'encode', remote: this.remote });
      return false;
    }
    if (this.socket.writableLength + frame.length > this.maxBufferedBytes) {
      this.observer?.onLog('warn', 'Bridge client is not reading; closing it', {
        remote: this.remote,
        buffered: this.socket.writableLength,
      });
      this.close('client not reading');
      return false;
    }
    this.socket.write(frame);
    this.framesOut++;
    return true;
  }

  /** Close the client immediately, discarding undecoded bytes. */
  close(reason = 'session closed'): void {
    if (this.state === 'closed') return;
    this.socket.destroy();
    this.teardown(reason);
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private handleData(chunk: Buffer): void {
    if (this.state === 'closed') return;
    try {
      for (const frame of this.decoder.feed(chunk)) {
        if (this.state === 'authenticating') {
          this.checkResponse(frame);
        } else if (this.state === 'ready') {
          this.submit(frame);
        }
        if (this.state === 'closed') return;
      }
    } catch (err) {
      const error = toError(err);
      this.observer?.onError(error, { phase: 'decode', remote: this.remote });
      this.close(error.message);
    }
  }

  private submit(frame: Uint8Array): void {
    const address = this.addressPolicy.current();
    if (this.mtu !== undefined && frame.length > this.mtu) {
      this.observer?.onFrame({
        direction: 'dropped',
        bytes: frame.length,
        address,
        reason: `payload exceeds MTU (${frame.length} > ${this.mtu})`,
        timestamp: new Date(),
      });
      return;
    }
    this.framesIn++;
    this.radio.submit(frame, address);
  }

  // ---------------------------------------------------------------------------
  // Challenge
  // ---------------------------------------------------------------------------

  private sendChallenge(timeoutMs: number): void {
    this.nonce = createChallenge();
    this.socket.write(encodeFrame(this.nonce, this.codec));

    this.authTimer = setTimeout(() => {
      this.authTimer = null;
      this.observer?.onSecurityEvent({
        type: 'auth_timeout',
        details: { remote: this.remote, timeoutMs },
        timestamp: new Date(),
      });
      this.reject('authentication timed out');
    }, timeoutMs);
    this.authTimer.unref?.();
  }

  private checkResponse(frame: Uint8Array): void {
    this.clearAuthTimer();
    if (this.secret && this.nonce && verifyChallenge(this.secret, this.nonce, frame)) {
      this.state = 'ready';
      this.nonce = null;
      this.observer?.onClient({ type: 'authenticated', remote: this.remote, timestamp: new Date() });
      return;
    }
    this.observer?.onSecurityEvent({
      type: 'auth_failed',
      details: { remote: this.remote, responseBytes: frame.length },
      timestamp: new Date(),
    });
    this.reject('authentication failed');
  }

  private reject(reason: string): void {
    this.observer?.onClient({ type: 'rejected', remote: this.remote, reason, timestamp: new Date() });
    this.close(reason);
  }

  private clearAuthTimer(): void {
    if (this.authTimer) {
      clearTimeout(this.authTimer);
      this.authTimer = null;
    }
  }

  private teardown(reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.clearAuthTimer();
    this.decoder.reset();
    this.observer?.onClient({ type: 'disconnected', remote: this.remote, reason, timestamp: new Date() });
    this.onClosed?.(this);
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
