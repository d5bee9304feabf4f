import { Command, CommanderError, InvalidArgumentError, type OutputConfiguration } from "commander";
import { MAX_FLOODS, PROGRAM_NAME, VERSION, type FlooderOptions } from "./config.js";
import { CHANNELS, isChannel, parseLogLevel, type Channel, type LogLevel } from "./log.js";
import { PEER_ID_MAX } from "./protocol.js";
import type { PeerId } from "./types.js";

type RawOptions = {
  serverAddr: string;
  serverName?: string;
  ssl?: boolean;
  nssdb?: string;
  clientCertName?: string;
  floodId: PeerId[];
  loglevel?: LogLevel;
  channelLoglevel: Array<{ channel: Channel; level: LogLevel }>;
  statusPort?: number;
};

export type CliResult =
  | { kind: "run"; options: FlooderOptions }
  | { kind: "exit"; code: number };

function parsePeerId(value: string): PeerId {
  if (!/^\d+$/.test(value) || Number(value) > PEER_ID_MAX) {
    throw new InvalidArgumentError(`Peer ID must be an integer in 0-${PEER_ID_MAX}.`);
  }
  return Number(value);
}

function collectFloodId(value: string, previous: PeerId[]): PeerId[] {
  if (previous.length === MAX_FLOODS) {
    throw new InvalidArgumentError(`Too many (at most ${MAX_FLOODS}).`);
  }
  return [...previous, parsePeerId(value)];
}

function parseLevelArg(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError("Expected 0-5 or none/error/warning/notice/info/debug.");
  }
  return level;
}

function collectChannelLevel(
  value: string,
  previous: Array<{ channel: Channel; level: LogLevel }>
): Array<{ channel: Channel; level: LogLevel }> {
  const eq = value.indexOf("=");
  const name = eq < 0 ? value : value.slice(0, eq);
  if (eq < 0 || !isChannel(name)) {
    throw new InvalidArgumentError(`Expected <channel>=<level>, channel one of ${CHANNELS.join(", ")}.`);
  }
  return [...previous, { channel: name, level: parseLevelArg(value.slice(eq + 1)) }];
}

function parsePortArg(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) > 65535) {
    throw new InvalidArgumentError("Port must be an integer in 0-65535.");
  }
  return Number(value);
}

export function buildProgram(output?: OutputConfiguration): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description("Floods a relay server with full-size messages to the given peers")
    .version(VERSION)
    .requiredOption("--server-addr <addr>", "relay server, a.b.c.d:port or [addr]:port")
    .option("--server-name <name>", "name used for TLS verification (default: address host)")
    .option("--ssl", "connect with TLS and a client certificate")
    .option("--nssdb <path>", "certificate store directory (with --ssl)")
    .option("--client-cert-name <name>", "client certificate name in the store (with --ssl)")
    .option("--flood-id <id>", `peer to flood, repeatable up to ${MAX_FLOODS} times`, collectFloodId, [])
    .option("--loglevel <level>", "0-5 or none/error/warning/notice/info/debug", parseLevelArg)
    .option("--channel-loglevel <channel=level>", "per-channel log level, repeatable", collectChannelLevel, [])
    .option("--status-port <port>", "serve /health and /stats on this port", parsePortArg)
    .addHelpText("after", "\nAddress format is a.b.c.d:port (IPv4) or [addr]:port (IPv6).")
    .exitOverride();
  if (output) {
    program.configureOutput(output);
  }
  return program;
}

function checkSsl(raw: RawOptions): string | undefined {
  const ssl = raw.ssl === true;
  if (ssl !== (raw.nssdb !== undefined)) {
    return "--ssl and --nssdb must be given together";
  }
  if (ssl !== (raw.clientCertName !== undefined)) {
    return "--ssl and --client-cert-name must be given together";
  }
  return undefined;
}

/**
 * Parse user arguments (without the node and script entries). Help, version
 * and usage errors are printed by commander and reported as an exit code.
 */
export function parseArguments(argv: readonly string[], output?: OutputConfiguration): CliResult {
  const program = buildProgram(output);
  try {
    program.parse([...argv], { from: "user" });
    const raw = program.opts<RawOptions>();
    const problem = checkSsl(raw);
    if (problem) {
      program.error(`error: ${problem}`);
    }

    const options: FlooderOptions = {
      serverAddr: raw.serverAddr,
      serverName: raw.serverName,
      floods: raw.floodId,
      loglevel: raw.loglevel,
      channelLoglevels: raw.channelLoglevel,
      statusPort: raw.statusPort,
    };
    if (raw.ssl && raw.nssdb !== undefined && raw.clientCertName !== undefined) {
      options.ssl = { nssdb: raw.nssdb, clientCertName: raw.clientCertName };
    }
    return { kind: "run", options };
  } catch (err) {
    if (err instanceof CommanderError) {
      return { kind: "exit", code: err.exitCode };
    }
    throw err;
  }
}
