/**
 * Structured error types for meshbridge.
 *
 * Every error carries a stable `code` so observers and the control plane
 * can report failures without string matching.
 */

export class MeshBridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MeshBridgeError';
  }
}

/** The radio transport (device or bridge) could not be reached or bound. */
export class BindUnavailable extends MeshBridgeError {
  constructor(message: string, public readonly link: string, context?: Record<string, unknown>) {
    super(message, 'BIND_UNAVAILABLE', { ...context, link });
    this.name = 'BindUnavailable';
  }
}

/** A send was attempted while the link is not bound. */
export class NotBound extends MeshBridgeError {
  constructor(public readonly link: string, context?: Record<string, unknown>) {
    super(`Link ${link} is not bound`, 'NOT_BOUND', { ...context, link });
    this.name = 'NotBound';
  }
}

export class PayloadTooLarge extends MeshBridgeError {
  constructor(public readonly size: number, public readonly limit: number) {
    super(`Payload of ${size} bytes exceeds the ${limit}-byte limit`, 'PAYLOAD_TOO_LARGE', { size, limit });
    this.name = 'PayloadTooLarge';
  }
}

export class MalformedFrame extends MeshBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MALFORMED_FRAME', context);
    this.name = 'MalformedFrame';
  }
}

export class UnknownSpeedProfile extends MeshBridgeError {
  constructor(public readonly speedCode: number, known: number[]) {
    super(
      `Unknown speed profile ${speedCode} (known: ${known.join(', ')})`,
      'UNKNOWN_SPEED_PROFILE',
      { speedCode, known },
    );
    this.name = 'UnknownSpeedProfile';
  }
}

/**
 * The transport dropped after binding. `recoverable` is false for failures
 * a retry cannot fix (e.g. access revoked by the device).
 */
export class LinkLost extends MeshBridgeError {
  public readonly recoverable: boolean;

  constructor(
    message: string,
    public readonly link: string,
    context?: Record<string, unknown>,
    recoverable = true,
  ) {
    super(message, 'LINK_LOST', { ...context, link });
    this.name = 'LinkLost';
    this.recoverable = recoverable;
  }
}

export class AuthError extends MeshBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', context);
    this.name = 'AuthError';
  }
}

export class ConfigError extends MeshBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}
