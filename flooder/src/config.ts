import { isIPv4, isIPv6 } from "node:net";
import { ConfigError } from "./errors.js";
import type { LogLevel, Channel } from "./log.js";
import type { PeerId } from "./types.js";

export const PROGRAM_NAME = "flooder";
export const VERSION = "1.0.0";

/** Upper bound on `--flood-id` occurrences. */
export const MAX_FLOODS = 32;
export const SERVER_BUFFER_MIN_PACKETS = 200;

export interface SslOptions {
  /** Certificate store directory. */
  nssdb: string;
  clientCertName: string;
}

export interface FlooderOptions {
  serverAddr: string;
  serverName?: string;
  ssl?: SslOptions;
  floods: PeerId[];
  loglevel?: LogLevel;
  channelLoglevels: Array<{ channel: Channel; level: LogLevel }>;
  statusPort?: number;
}

export interface ServerAddress {
  host: string;
  port: number;
  family: 4 | 6;
}

export interface ServerTarget {
  address: ServerAddress;
  /** Name used for TLS verification. */
  serverName: string;
}

function parsePort(text: string, input: string): number {
  if (!/^\d{1,5}$/.test(text)) {
    throw new ConfigError(`server addr: bad port in "${input}"`);
  }
  const port = Number(text);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`server addr: port out of range in "${input}"`);
  }
  return port;
}

/** Parse `a.b.c.d:port` or `[v6addr]:port`. */
export function parseServerAddress(input: string): ServerAddress {
  if (input.startsWith("[")) {
    const close = input.indexOf("]");
    if (close < 0 || input[close + 1] !== ":") {
      throw new ConfigError(`server addr: expected [addr]:port, got "${input}"`);
    }
    const host = input.slice(1, close);
    if (!isIPv6(host)) {
      throw new ConfigError(`server addr: "${host}" is not an IPv6 address`);
    }
    return { host, port: parsePort(input.slice(close + 2), input), family: 6 };
  }

  const colon = input.lastIndexOf(":");
  if (colon < 0) {
    throw new ConfigError(`server addr: expected a.b.c.d:port, got "${input}"`);
  }
  const host = input.slice(0, colon);
  if (!isIPv4(host)) {
    throw new ConfigError(`server addr: "${host}" is not an IPv4 address`);
  }
  return { host, port: parsePort(input.slice(colon + 1), input), family: 4 };
}

export function resolveServerTarget(options: FlooderOptions): ServerTarget {
  const address = parseServerAddress(options.serverAddr);
  return {
    address,
    serverName: options.serverName ?? address.host,
  };
}

/** Status port from the command line, falling back to FLOODER_STATUS_PORT. */
export function resolveStatusPort(
  fromCli: number | undefined,
  env: NodeJS.ProcessEnv = process.env
): number | undefined {
  if (fromCli !== undefined) return fromCli;
  const raw = env.FLOODER_STATUS_PORT;
  if (raw === undefined || raw === "") return undefined;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`FLOODER_STATUS_PORT: bad port "${raw}"`);
  }
  return port;
}
