export const LOG_LEVELS = ["none", "error", "warning", "notice", "info", "debug"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/** 0 = none … 5 = debug. A message is printed when its level <= the channel's. */
export type LogLevel = 0 | 1 | 2 | 3 | 4 | 5;

export const CHANNELS = [
  "Flooder",
  "Lifecycle",
  "FloodSource",
  "RelayBuffer",
  "RelayConnection",
  "Security",
  "Status",
  "Cleanup",
] as const;

export type Channel = (typeof CHANNELS)[number];

export type LogSink = (level: LogLevelName, channel: Channel, message: string) => void;

export interface Logger {
  error(message: string): void;
  warning(message: string): void;
  notice(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const DEFAULT_LEVEL: LogLevel = 3;

export const consoleSink: LogSink = (level, channel, message) => {
  const line = `[${channel}] ${message}`;
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warning":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

/** Accepts `0`-`5` or a level name; returns undefined for anything else. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const byName = LOG_LEVELS.findIndex((name) => name === value);
  if (byName >= 0) return toLevel(byName);
  if (/^[0-5]$/.test(value)) return toLevel(Number(value));
  return undefined;
}

function toLevel(n: number): LogLevel | undefined {
  switch (n) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
      return n;
    default:
      return undefined;
  }
}

export function isChannel(name: string): name is Channel {
  return CHANNELS.some((channel) => channel === name);
}

/**
 * Level configuration plus the sink every channel writes to. One instance is
 * created at startup and threaded through the application context.
 */
export class Logging {
  private level: LogLevel = DEFAULT_LEVEL;
  private channelLevels = new Map<Channel, LogLevel>();

  constructor(private readonly sink: LogSink = consoleSink) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setChannelLevel(channel: Channel, level: LogLevel): void {
    this.channelLevels.set(channel, level);
  }

  levelOf(channel: Channel): LogLevel {
    return this.channelLevels.get(channel) ?? this.level;
  }

  channel(name: Channel): Logger {
    const emit = (level: LogLevelName) => (message: string) => {
      if (LOG_LEVELS.indexOf(level) <= this.levelOf(name)) {
        this.sink(level, name, message);
      }
    };
    return {
      error: emit("error"),
      warning: emit("warning"),
      notice: emit("notice"),
      info: emit("info"),
      debug: emit("debug"),
    };
  }
}
