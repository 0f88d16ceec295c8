/**
 * Builds the running pieces from a validated config.
 *
 *   bridge     device link -> ReconnectSupervisor -> BridgeServer (+ ControlServer)
 *   interface  device or bridge link -> ReconnectSupervisor -> MeshInterface
 *              -> HdlcInterfaceServer (+ ControlServer)
 *
 * Start order is radio-facing last so nothing is queued for a socket that
 * failed to listen; stop order is the reverse.
 */

import { join } from 'node:path';
import { ConfigError, type IObserver, type IRadioLink, type MeshBridgeConfig } from '@meshbridge/core';
import { AddressPolicy, minSpacingMs } from '@meshbridge/framing';
import {
  BridgeSocketLink,
  HttpApiTransport,
  MeshtasticLink,
  TcpStreamTransport,
} from '@meshbridge/radio';
import { ReconnectSupervisor } from '@meshbridge/supervisor';
import { BridgeServer, ControlServer } from '@meshbridge/gateway';
import { HdlcInterfaceServer, MeshInterface } from '@meshbridge/adapter';
import { createObserver } from '@meshbridge/observability';
import { getLogsDir, resolveRadioEndpoint } from './config.js';

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createCliObserver(config: MeshBridgeConfig): IObserver {
  return createObserver({
    observers: config.observability.observers,
    logLevel: config.observability.logLevel,
    logPath: config.observability.logFile ?? join(getLogsDir(), 'meshbridge.jsonl'),
  });
}

export function createRadioLink(config: MeshBridgeConfig, observer?: IObserver): IRadioLink {
  const { radio } = config;
  const { host, port } = resolveRadioEndpoint(config);
  switch (radio.transport) {
    case 'tcp':
      return new MeshtasticLink(
        new TcpStreamTransport({ host, port }),
        { hopLimit: radio.hopLimit, observer },
      );
    case 'http':
      return new MeshtasticLink(
        new HttpApiTransport({
          host: port === undefined ? host : `${host}:${port}`,
          tls: radio.tls,
        }),
        { hopLimit: radio.hopLimit, observer },
      );
    case 'bridge':
      return new BridgeSocketLink({
        host,
        port,
        secret: radio.secret,
        byteOrder: config.bridge.byteOrder,
        observer,
      });
  }
}

/**
 * Pacing is applied where frames meet the air. A bridge transport hands
 * frames to a bridge that paces them itself, so the adapter side does not.
 * Pacing follows radio.speedCode; a device reporting a different modem
 * preset on bind gets a warning.
 */
export function createSupervisor(config: MeshBridgeConfig, link: IRadioLink, observer?: IObserver): ReconnectSupervisor {
  const paced = config.radio.transport !== 'bridge';
  const supervisor = new ReconnectSupervisor({
    link,
    binding: config.radio.channel,
    ...config.supervisor,
    spacingMs: paced ? minSpacingMs(config.radio.speedCode) : 0,
    observer,
  });

  if (paced && observer) {
    const configured = config.radio.speedCode;
    supervisor.onStateChange((event) => {
      if (event.to !== 'bound') return;
      const reported = supervisor.getStats().linkInfo?.modemPreset;
      if (reported === undefined || reported === configured) return;
      observer.onLog(
        'warn',
        `Radio reports modem preset ${reported} but radio.speedCode is ${configured}; pacing follows radio.speedCode`,
        { link: link.id, reported, configured },
      );
    });
  }
  return supervisor;
}

function controlToken(config: MeshBridgeConfig): string | undefined {
  return config.bridge.auth.mode === 'token' ? config.bridge.auth.secret : undefined;
}

export interface RuntimeDeps {
  observer: IObserver;
  /** Replaces the link built from `config.radio`. */
  link?: IRadioLink;
}

// ---------------------------------------------------------------------------
// Bridge
// ---------------------------------------------------------------------------

export interface BridgeRuntime {
  supervisor: ReconnectSupervisor;
  server: BridgeServer;
  control: ControlServer | null;
  addressPolicy: AddressPolicy;
  stop(): Promise<void>;
}

export async function startBridge(config: MeshBridgeConfig, deps: RuntimeDeps): Promise<BridgeRuntime> {
  const { observer } = deps;
  if (config.radio.transport === 'bridge' && !deps.link) {
    throw new ConfigError('radio.transport "bridge" only applies to the interface command; use tcp or http', {
      transport: config.radio.transport,
    });
  }

  const link = deps.link ?? createRadioLink(config, observer);
  const supervisor = createSupervisor(config, link, observer);
  const addressPolicy = AddressPolicy.fromConfig(config.address);

  const server = new BridgeServer({
    radio: supervisor,
    addressPolicy,
    host: config.bridge.host,
    port: config.bridge.port,
    allowPublicBind: config.bridge.allowPublicBind,
    codec: { byteOrder: config.bridge.byteOrder, maxPayloadBytes: config.bridge.maxPayloadBytes },
    mtu: config.radio.mtu,
    auth: config.bridge.auth,
    authTimeoutMs: config.bridge.authTimeoutMs,
    observer,
  });
  await server.start();

  let control: ControlServer | null = null;
  if (config.control.enabled) {
    control = new ControlServer({
      port: config.control.port,
      target: supervisor,
      addressPolicy,
      binding: config.radio.channel,
      client: () => server.getClient(),
      token: controlToken(config),
      observer,
    });
    try {
      await control.start();
    } catch (err) {
      await server.stop();
      throw err;
    }
  }

  supervisor.start();

  return {
    supervisor,
    server,
    control,
    addressPolicy,
    async stop() {
      await control?.stop();
      await server.stop();
      await supervisor.stop();
      await observer.flush?.();
    },
  };
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface InterfaceRuntime {
  supervisor: ReconnectSupervisor;
  meshInterface: MeshInterface;
  server: HdlcInterfaceServer;
  control: ControlServer | null;
  addressPolicy: AddressPolicy;
  stop(): Promise<void>;
}

export async function startInterface(config: MeshBridgeConfig, deps: RuntimeDeps): Promise<InterfaceRuntime> {
  const { observer } = deps;
  const link = deps.link ?? createRadioLink(config, observer);
  const supervisor = createSupervisor(config, link, observer);
  const addressPolicy = AddressPolicy.fromConfig(config.address);

  const meshInterface = new MeshInterface({
    port: supervisor,
    mtu: config.radio.mtu,
    addressPolicy,
    observer,
  });
  const server = new HdlcInterfaceServer({
    meshInterface,
    host: config.interface.host,
    port: config.interface.port,
    allowPublicBind: config.bridge.allowPublicBind,
    observer,
  });
  await server.start();

  let control: ControlServer | null = null;
  if (config.control.enabled) {
    control = new ControlServer({
      port: config.control.port,
      target: supervisor,
      addressPolicy,
      binding: config.radio.channel,
      token: controlToken(config),
      observer,
    });
    try {
      await control.start();
    } catch (err) {
      await server.stop();
      throw err;
    }
  }

  meshInterface.start();

  return {
    supervisor,
    meshInterface,
    server,
    control,
    addressPolicy,
    async stop() {
      await control?.stop();
      await server.stop();
      await meshInterface.stop();
      await observer.flush?.();
    },
  };
}
