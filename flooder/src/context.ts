import type { CleanupStack } from "./cleanup.js";
import type { FlooderOptions, ServerTarget } from "./config.js";
import type { Logging } from "./log.js";
import type { Reactor } from "./reactor.js";
import type { SecurityContext } from "./security.js";
import type { FloodStats } from "./types.js";

/**
 * Everything the running flooder shares, created once at startup and handed
 * to the controller and the status endpoint.
 */
export interface AppContext {
  readonly options: FlooderOptions;
  readonly target: ServerTarget;
  readonly logging: Logging;
  readonly reactor: Reactor;
  /** Startup acquisitions, released newest-first on shutdown. */
  readonly resources: CleanupStack;
  readonly stats: FloodStats;
  /** Set during startup when running with --ssl. */
  security?: SecurityContext;
}

export function createStats(): FloodStats {
  return { produced: 0, sent: 0, peersJoined: 0, peersLeft: 0, messagesReceived: 0 };
}
