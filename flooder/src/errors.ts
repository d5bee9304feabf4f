/** Bad command line or unresolvable configuration. Nothing has been acquired yet. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The relay sent something that does not parse or arrives out of order. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(`Protocol: ${message}`);
    this.name = "ProtocolError";
  }
}

/** A caller broke an API contract. Not recoverable. */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolation";
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
