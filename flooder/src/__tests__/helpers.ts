import { Logging, type LogLevelName } from "../log.js";

export interface CapturedLogging {
  logging: Logging;
  /** `message` of every emitted line, in order. */
  messages: string[];
  lines: Array<{ level: LogLevelName; message: string }>;
}

export function captureLogging(): CapturedLogging {
  const messages: string[] = [];
  const lines: Array<{ level: LogLevelName; message: string }> = [];
  const logging = new Logging((level, _channel, message) => {
    messages.push(message);
    lines.push({ level, message });
  });
  logging.setLevel(5);
  return { logging, messages, lines };
}

export function quietLogging(): Logging {
  const logging = new Logging(() => {});
  logging.setLevel(0);
  return logging;
}

/** Acquire/release/state lines only. */
export function resourceTrace(messages: readonly string[]): string[] {
  return messages.filter((m) => /^(acquired|released|state) /.test(m));
}
