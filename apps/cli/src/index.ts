#!/usr/bin/env node

/**
 * meshbridge -- Reticulum over Meshtastic LoRa
 *
 * Entry point: parses process.argv by hand and dispatches to the
 * appropriate command module.
 *
 * Commands:
 *   bridge      Serve the framed local socket on a supervised radio link
 *   interface   Serve an HDLC interface for an unmodified Reticulum stack
 *   status      Show link state of a running process
 *   address     Show or change the outbound address
 *   reconnect   Force a running process to rebind its radio link
 *   speeds      List speed codes and their pacing
 *   help        Show usage
 *   version     Show version
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MeshBridgeError } from '@meshbridge/core';
import { AMBER, RESET, BOLD, DIM, GREEN, RED } from './ui.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/ sits one level under the package; dist/apps/cli/src/ four under the root.
  for (let up = 1; up <= 4; up++) {
    const p = resolve(here, ...Array<string>(up).fill('..'), 'package.json');
    if (!existsSync(p)) continue;
    const pkg: unknown = JSON.parse(readFileSync(p, 'utf8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.1.0';
}

// ---------------------------------------------------------------------------
// Help text
// ---------------------------------------------------------------------------

function printHelp(): void {
  const version = getVersion();

  console.log(`
  ${AMBER}${BOLD}meshbridge${RESET} ${DIM}v${version}${RESET} -- Reticulum over Meshtastic LoRa

  ${BOLD}Usage${RESET}
    ${GREEN}meshbridge${RESET} ${DIM}<command> [options]${RESET}

  ${BOLD}Commands${RESET}
    ${GREEN}bridge${RESET}       Serve the framed local socket on a supervised radio link
    ${GREEN}interface${RESET}    Serve an HDLC interface for an unmodified Reticulum stack
    ${GREEN}status${RESET}       Show link state of a running bridge or interface
    ${GREEN}address${RESET}      Show or change the outbound address
    ${GREEN}reconnect${RESET}    Drop the radio link and bind again
    ${GREEN}speeds${RESET}       List speed codes and the pacing each enforces

  ${BOLD}Serve Options${RESET} ${DIM}(bridge, interface)${RESET}
    ${GREEN}--port${RESET} N                 Local listening port
    ${GREEN}--host${RESET} addr              Local listening address (loopback unless --allow-public-bind)
    ${GREEN}--transport${RESET} kind         tcp, http, or bridge (interface only)
    ${GREEN}--radio-host${RESET} host        Radio or bridge host
    ${GREEN}--radio-port${RESET} N           Radio or bridge port
    ${GREEN}--channel${RESET} name           private-app, or a named stream channel
    ${GREEN}--speed${RESET} code             Speed code (see ${GREEN}meshbridge speeds${RESET})
    ${GREEN}--mtu${RESET} N                  Fragment size in bytes
    ${GREEN}--broadcast${RESET}              Send to every node
    ${GREEN}--unicast${RESET} id             Send to one node (!a1b2c3d4 or decimal)
    ${GREEN}--secret${RESET} s               Require challenge-response auth on the local socket
    ${GREEN}--radio-secret${RESET} s         Secret for a bridge transport
    ${GREEN}--control-port${RESET} N         Control plane port
    ${GREEN}--no-control${RESET}             Do not start the control plane
    ${GREEN}--log-level${RESET} level        debug, info, warn, or error

  ${BOLD}Global Options${RESET}
    ${GREEN}--help, -h${RESET}               Show this help
    ${GREEN}--version, -V${RESET}            Show version

  ${BOLD}Examples${RESET}
    ${DIM}$${RESET} meshbridge bridge --radio-host 192.168.1.20     ${DIM}# Bridge a networked radio${RESET}
    ${DIM}$${RESET} meshbridge interface --transport bridge       ${DIM}# Fragmenting interface over a bridge${RESET}
    ${DIM}$${RESET} meshbridge address !a1b2c3d4                   ${DIM}# Unicast from the next frame${RESET}
    ${DIM}$${RESET} meshbridge status                              ${DIM}# Link state and counters${RESET}

  ${DIM}Configuration lives in ${AMBER}~/.meshbridge/config.json${DIM}.${RESET}
`);
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(argv: string[]): { command: string; rest: string[] } {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args.
  const args = argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    return { command: 'help', rest: [] };
  }
  if (args.includes('--version') || args.includes('-V')) {
    return { command: 'version', rest: [] };
  }

  const command = args[0] ?? 'help';
  return { command, rest: args.slice(1) };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { command, rest } = parseArgs(process.argv);

  switch (command) {
    case 'bridge': {
      const { bridge } = await import('./commands/bridge.js');
      await bridge(rest);
      break;
    }

    case 'interface': {
      const { meshInterface } = await import('./commands/interface.js');
      await meshInterface(rest);
      break;
    }

    case 'status': {
      const { status } = await import('./commands/status.js');
      await status(rest);
      break;
    }

    case 'address': {
      const { address } = await import('./commands/address.js');
      await address(rest);
      break;
    }

    case 'reconnect': {
      const { reconnect } = await import('./commands/reconnect.js');
      await reconnect();
      break;
    }

    case 'speeds': {
      const { speeds } = await import('./commands/speeds.js');
      speeds(rest);
      break;
    }

    case 'version': {
      console.log(`meshbridge v${getVersion()}`);
      break;
    }

    case 'help': {
      printHelp();
      break;
    }

    default: {
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      console.error(`  ${DIM}Run ${AMBER}meshbridge --help${DIM} for available commands.${RESET}\n`);
      process.exitCode = 1;
      break;
    }
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`\n  ${RED}${BOLD}Error:${RESET} ${message}`);
  // Our own errors carry a readable message; anything else gets its stack.
  if (err instanceof Error && !(err instanceof MeshBridgeError) && err.stack) {
    const stackLines = err.stack.split('\n').slice(1).map((l) => `  ${l.trim()}`).join('\n');
    console.error(`${DIM}${stackLines}${RESET}`);
  }
  process.exitCode = 1;
});
