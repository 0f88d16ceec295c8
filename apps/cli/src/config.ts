/**
 * Configuration loading, validation, and directory management.
 *
 * Loads user config from ~/.meshbridge/config.json, merges over bundled
 * defaults, resolves ${VAR_NAME} environment variable references, and
 * validates every field into a typed MeshBridgeConfig.
 */

import { readFileSync, mkdirSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import {
  ConfigError,
  UnknownSpeedProfile,
  parseNodeId,
  type AddressConfig,
  type AuthConfig,
  type ChannelBinding,
  type MeshBridgeConfig,
} from '@meshbridge/core';
import {
  DEFAULT_BRIDGE_HOST,
  DEFAULT_BRIDGE_PORT,
  DEFAULT_MTU,
  DEFAULT_SPEED_CODE,
  RADIO_PAYLOAD_MTU,
  MAX_FRAME_PAYLOAD,
  delayFor,
} from '@meshbridge/framing';
import { OBSERVER_KINDS, isLogLevel } from '@meshbridge/observability';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const HOME_DIR_NAME = '.meshbridge';
const CONFIG_FILE_NAME = 'config.json';
const LOGS_DIR_NAME = 'logs';

export const DEFAULT_RADIO_HOST = 'meshtastic.local';

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Resolve the meshbridge home directory (~/.meshbridge). */
export function getMeshbridgeDir(): string {
  return resolve(homedir(), HOME_DIR_NAME);
}

export function getConfigPath(): string {
  return join(getMeshbridgeDir(), CONFIG_FILE_NAME);
}

export function getLogsDir(): string {
  return join(getMeshbridgeDir(), LOGS_DIR_NAME);
}

// ---------------------------------------------------------------------------
// Default config
// ---------------------------------------------------------------------------

export function getDefaultConfig(): MeshBridgeConfig {
  return {
    bridge: {
      host: DEFAULT_BRIDGE_HOST,
      port: DEFAULT_BRIDGE_PORT,
      allowPublicBind: false,
      byteOrder: 'be',
      auth: { mode: 'disabled' },
      authTimeoutMs: 10_000,
    },
    radio: {
      transport: 'tcp',
      channel: { kind: 'private-app' },
      mtu: DEFAULT_MTU,
      speedCode: DEFAULT_SPEED_CODE,
      hopLimit: 1,
    },
    address: { mode: 'broadcast' },
    supervisor: {
      minBackoffMs: 1000,
      maxBackoffMs: 60_000,
      staleAfterMs: 15 * 60 * 1000,
      probeIntervalMs: 5 * 60 * 1000,
      queueCapacity: 64,
    },
    control: {
      enabled: true,
      port: 45833,
    },
    interface: {
      host: '127.0.0.1',
      port: 4242,
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
  };
}

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '']);

/**
 * Where the radio link connects. A `bridge` transport with no radio.host
 * reaches the bridge configured in this same file, over loopback when
 * that bridge listens on a wildcard address.
 */
export function resolveRadioEndpoint(config: MeshBridgeConfig): { host: string; port?: number } {
  const { radio, bridge } = config;
  if (radio.transport !== 'bridge') {
    return { host: radio.host ?? DEFAULT_RADIO_HOST, port: radio.port };
  }
  const host = radio.host ?? (WILDCARD_HOSTS.has(bridge.host) ? DEFAULT_BRIDGE_HOST : bridge.host);
  return { host, port: radio.port ?? bridge.port };
}

// ---------------------------------------------------------------------------
// .env file loading
// ---------------------------------------------------------------------------

/**
 * Load variables from ~/.meshbridge/.env into process.env.
 *
 * Supports KEY=value, quoted values, # comments and an optional `export `
 * prefix. Existing environment variables are not overwritten.
 */
export function loadEnvFile(): number {
  const envPath = join(getMeshbridgeDir(), '.env');
  if (!existsSync(envPath)) return 0;

  const raw = readFileSync(envPath, 'utf8');
  let loaded = 0;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const stripped = trimmed.startsWith('export ')
      ? trimmed.slice(7).trim()
      : trimmed;

    const eqIdx = stripped.indexOf('=');
    if (eqIdx === -1) continue;

    const key = stripped.slice(0, eqIdx).trim();
    let value = stripped.slice(eqIdx + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    // Shell takes precedence.
    if (key && process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }

  return loaded;
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively resolve ${VAR_NAME} references in string values. Missing
 * variables resolve to the empty string and are collected in `missing`.
 */
export function resolveEnvVars(obj: unknown, missing?: Set<string>): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        missing?.add(varName);
      }
      return value ?? '';
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, missing));
  }

  if (isRecord(obj)) {
    const result: Fields = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, missing);
    }
    return result;
  }

  return obj;
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/**
 * Deep merge `source` into `target`. Arrays are replaced, not merged.
 * Returns a new object; neither input is mutated.
 */
export function deepMerge(target: Fields, source: Fields, seen = new WeakSet<object>()): Fields {
  if (seen.has(source)) return target;
  seen.add(source);

  const result: Fields = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal, seen);
    } else {
      result[key] = sourceVal;
    }
  }

  return result;
}

function toFields(config: MeshBridgeConfig): Fields {
  const parsed: unknown = JSON.parse(JSON.stringify(config));
  return isRecord(parsed) ? parsed : {};
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationError {
  field: string;
  message: string;
}

/** Reads typed values out of untyped JSON, collecting one error per bad field. */
class FieldReader {
  readonly errors: ValidationError[] = [];

  fail(field: string, message: string): void {
    this.errors.push({ field, message });
  }

  section(root: Fields, name: string): Fields {
    const value = root[name];
    if (isRecord(value)) return value;
    this.fail(name, 'Must be an object');
    return {};
  }

  integer(obj: Fields, key: string, field: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = obj[key];
    if (typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max) return value;
    this.fail(field, max === Number.MAX_SAFE_INTEGER
      ? `Must be an integer >= ${min}`
      : `Must be an integer between ${min} and ${max}`);
    return fallback;
  }

  optionalInteger(obj: Fields, key: string, field: string, min: number, max: number): number | undefined {
    if (obj[key] === undefined) return undefined;
    return this.integer(obj, key, field, min, min, max);
  }

  boolean(obj: Fields, key: string, field: string, fallback: boolean): boolean {
    const value = obj[key];
    if (typeof value === 'boolean') return value;
    this.fail(field, 'Must be true or false');
    return fallback;
  }

  optionalBoolean(obj: Fields, key: string, field: string): boolean | undefined {
    if (obj[key] === undefined) return undefined;
    return this.boolean(obj, key, field, false);
  }

  string(obj: Fields, key: string, field: string, fallback: string): string {
    const value = obj[key];
    if (typeof value === 'string' && value.length > 0) return value;
    this.fail(field, 'Must be a non-empty string');
    return fallback;
  }

  optionalString(obj: Fields, key: string, field: string): string | undefined {
    const value = obj[key];
    if (value === undefined || value === '') return undefined;
    if (typeof value === 'string') return value;
    this.fail(field, 'Must be a string');
    return undefined;
  }

  oneOf<T extends string>(obj: Fields, key: string, field: string, options: readonly T[], fallback: T): T {
    const value = obj[key];
    const match = options.find((o) => o === value);
    if (match !== undefined) return match;
    this.fail(field, `Must be one of: ${options.join(', ')}`);
    return fallback;
  }
}

function readChannel(reader: FieldReader, radio: Fields): ChannelBinding {
  const channel = reader.section(radio, 'channel');
  const kind = reader.oneOf(channel, 'kind', 'radio.channel.kind', ['private-app', 'named-stream'], 'private-app');
  if (kind === 'private-app') return { kind };
  return { kind, name: reader.string(channel, 'name', 'radio.channel.name', '') };
}

function readAuth(reader: FieldReader, bridge: Fields): AuthConfig {
  const auth = reader.section(bridge, 'auth');
  const mode = reader.oneOf(auth, 'mode', 'bridge.auth.mode', ['disabled', 'token'], 'disabled');
  if (mode === 'disabled') return { mode };
  return { mode, secret: reader.string(auth, 'secret', 'bridge.auth.secret', '') };
}

function readAddress(reader: FieldReader, root: Fields): AddressConfig {
  const address = reader.section(root, 'address');
  const mode = reader.oneOf(address, 'mode', 'address.mode', ['broadcast', 'unicast'], 'broadcast');
  if (mode === 'broadcast') return { mode };

  const destination = address['destination'];
  if ((typeof destination === 'string' || typeof destination === 'number') && parseNodeId(destination) !== null) {
    return { mode, destination };
  }
  reader.fail('address.destination', 'Must be a node id such as !a1b2c3d4 or a decimal node number');
  return { mode: 'broadcast' };
}

function readSpeedCode(reader: FieldReader, radio: Fields): number {
  const code = reader.integer(radio, 'speedCode', 'radio.speedCode', DEFAULT_SPEED_CODE, 0);
  try {
    delayFor(code);
  } catch (err) {
    if (!(err instanceof UnknownSpeedProfile)) throw err;
    reader.fail('radio.speedCode', err.message);
  }
  return code;
}

/**
 * Check a merged, env-resolved config object and build the typed config.
 * Returns every problem found rather than stopping at the first.
 */
export function validateConfig(raw: Fields): { config: MeshBridgeConfig; errors: ValidationError[] } {
  const reader = new FieldReader();
  const defaults = getDefaultConfig();

  const bridge = reader.section(raw, 'bridge');
  const radio = reader.section(raw, 'radio');
  const supervisor = reader.section(raw, 'supervisor');
  const control = reader.section(raw, 'control');
  const iface = reader.section(raw, 'interface');
  const observability = reader.section(raw, 'observability');

  const observers: string[] = [];
  const rawObservers = observability['observers'];
  if (Array.isArray(rawObservers)) {
    for (const name of rawObservers) {
      if (typeof name === 'string' && OBSERVER_KINDS.some((k) => k === name)) observers.push(name);
      else reader.fail('observability.observers', `Unknown observer ${JSON.stringify(name)}; expected ${OBSERVER_KINDS.join(', ')}`);
    }
  } else {
    reader.fail('observability.observers', 'Must be an array');
  }

  const rawLevel = observability['logLevel'];
  const logLevel = isLogLevel(rawLevel) ? rawLevel : defaults.observability.logLevel;
  if (!isLogLevel(rawLevel)) {
    reader.fail('observability.logLevel', 'Must be one of: debug, info, warn, error');
  }

  const config: MeshBridgeConfig = {
    bridge: {
      host: reader.string(bridge, 'host', 'bridge.host', defaults.bridge.host),
      port: reader.integer(bridge, 'port', 'bridge.port', defaults.bridge.port, 1, 65535),
      allowPublicBind: reader.boolean(bridge, 'allowPublicBind', 'bridge.allowPublicBind', false),
      byteOrder: reader.oneOf(bridge, 'byteOrder', 'bridge.byteOrder', ['be', 'le'], 'be'),
      maxPayloadBytes: reader.optionalInteger(bridge, 'maxPayloadBytes', 'bridge.maxPayloadBytes', 1, MAX_FRAME_PAYLOAD),
      auth: readAuth(reader, bridge),
      authTimeoutMs: reader.integer(bridge, 'authTimeoutMs', 'bridge.authTimeoutMs', defaults.bridge.authTimeoutMs, 100),
    },
    radio: {
      transport: reader.oneOf(radio, 'transport', 'radio.transport', ['tcp', 'http', 'bridge'], 'tcp'),
      host: reader.optionalString(radio, 'host', 'radio.host'),
      port: reader.optionalInteger(radio, 'port', 'radio.port', 1, 65535),
      tls: reader.optionalBoolean(radio, 'tls', 'radio.tls'),
      channel: readChannel(reader, radio),
      mtu: reader.integer(radio, 'mtu', 'radio.mtu', DEFAULT_MTU, 3, RADIO_PAYLOAD_MTU),
      speedCode: readSpeedCode(reader, radio),
      hopLimit: reader.integer(radio, 'hopLimit', 'radio.hopLimit', 1, 0, 7),
      secret: reader.optionalString(radio, 'secret', 'radio.secret'),
    },
    address: readAddress(reader, raw),
    supervisor: {
      minBackoffMs: reader.integer(supervisor, 'minBackoffMs', 'supervisor.minBackoffMs', defaults.supervisor.minBackoffMs, 1),
      maxBackoffMs: reader.integer(supervisor, 'maxBackoffMs', 'supervisor.maxBackoffMs', defaults.supervisor.maxBackoffMs, 1),
      staleAfterMs: reader.integer(supervisor, 'staleAfterMs', 'supervisor.staleAfterMs', defaults.supervisor.staleAfterMs, 0),
      probeIntervalMs: reader.integer(supervisor, 'probeIntervalMs', 'supervisor.probeIntervalMs', defaults.supervisor.probeIntervalMs, 0),
      queueCapacity: reader.integer(supervisor, 'queueCapacity', 'supervisor.queueCapacity', defaults.supervisor.queueCapacity, 1),
    },
    control: {
      enabled: reader.boolean(control, 'enabled', 'control.enabled', true),
      port: reader.integer(control, 'port', 'control.port', defaults.control.port, 1, 65535),
    },
    interface: {
      host: reader.string(iface, 'host', 'interface.host', defaults.interface.host),
      port: reader.integer(iface, 'port', 'interface.port', defaults.interface.port, 1, 65535),
    },
    observability: {
      observers,
      logLevel,
      logFile: reader.optionalString(observability, 'logFile', 'observability.logFile'),
    },
  };

  if (config.supervisor.maxBackoffMs < config.supervisor.minBackoffMs) {
    reader.fail('supervisor.maxBackoffMs', 'Must not be smaller than supervisor.minBackoffMs');
  }

  return { config, errors: reader.errors };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Ensure ~/.meshbridge/ and ~/.meshbridge/logs/ exist with restrictive permissions. */
export function ensureConfigDir(): void {
  const homeDir = getMeshbridgeDir();
  const logsDir = getLogsDir();

  if (!existsSync(homeDir)) {
    mkdirSync(homeDir, { recursive: true, mode: 0o700 });
  }

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true, mode: 0o700 });
  }
}

export interface LoadConfigOptions {
  /** Applied over the config file, e.g. from command-line flags. */
  overrides?: Fields;
  /** Called once per referenced but unset environment variable. */
  onMissingVar?: (name: string) => void;
}

/**
 * Load and return a fully resolved, validated MeshBridgeConfig.
 *
 * 1. Loads ~/.meshbridge/.env into process.env.
 * 2. Deep-merges ~/.meshbridge/config.json, then `overrides`, over defaults.
 * 3. Resolves ${VAR_NAME} references.
 * 4. Validates every field.
 *
 * Throws ConfigLoadError if the file cannot be parsed or validation fails.
 */
export function loadConfig(options: LoadConfigOptions = {}): MeshBridgeConfig {
  loadEnvFile();

  let merged = toFields(getDefaultConfig());

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    let userConfig: unknown;
    try {
      userConfig = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(userConfig)) {
      throw new ConfigLoadError(`Failed to parse ${configPath}: top level must be a JSON object`);
    }
    merged = deepMerge(merged, userConfig);
  }

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  const missingVars = new Set<string>();
  const resolved = resolveEnvVars(merged, missingVars);

  const warn = options.onMissingVar ?? ((name: string) => {
    console.warn(`  ⚠  Config references \${${name}} but it is not set in environment.`);
  });
  for (const varName of missingVars) warn(varName);

  const { config, errors } = validateConfig(isRecord(resolved) ? resolved : {});
  if (errors.length > 0) {
    const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigLoadError(`Configuration validation failed:\n${details}`, errors);
  }

  return config;
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string, public readonly errors: ValidationError[] = []) {
    super(message, { fields: errors.map((e) => e.field) });
    this.name = 'ConfigLoadError';
  }
}
