import { CleanupStack } from "./cleanup.js";
import {
  PROGRAM_NAME,
  resolveServerTarget,
  resolveStatusPort,
  VERSION,
  type FlooderOptions,
  type ServerTarget,
} from "./config.js";
import { createStats, type AppContext } from "./context.js";
import { formatError } from "./errors.js";
import { LifecycleController } from "./lifecycle.js";
import { Logging } from "./log.js";
import { installSignalHook, Reactor } from "./reactor.js";
import { connectRelay, type RelayConnector } from "./relay.js";
import { acquireSecurity } from "./security.js";
import { createStatusApp, startStatusServer, stopStatusServer } from "./status.js";

export interface FlooderDeps {
  logging?: Logging;
  connect?: RelayConnector;
  installSignals?: typeof installSignalHook;
  env?: NodeJS.ProcessEnv;
}

function configureLogging(logging: Logging, options: FlooderOptions): void {
  if (options.loglevel !== undefined) {
    logging.setLevel(options.loglevel);
  }
  for (const { channel, level } of options.channelLoglevels) {
    logging.setChannelLevel(channel, level);
  }
}

/**
 * Acquire resources in order, connect, and run until the controller stops
 * the reactor. Resolves with the process exit code.
 */
export async function runFlooder(options: FlooderOptions, deps: FlooderDeps = {}): Promise<number> {
  const logging = deps.logging ?? new Logging();
  configureLogging(logging, options);
  const log = logging.channel("Flooder");
  log.notice(`initializing ${PROGRAM_NAME} ${VERSION}`);

  let target: ServerTarget;
  let statusPort: number | undefined;
  try {
    target = resolveServerTarget(options);
    statusPort = resolveStatusPort(options.statusPort, deps.env);
  } catch (err) {
    log.error(`Failed to resolve arguments: ${formatError(err)}`);
    log.error("initialization failed");
    return 1;
  }

  const ctx: AppContext = {
    options,
    target,
    logging,
    reactor: new Reactor(),
    resources: new CleanupStack(logging.channel("Cleanup")),
    stats: createStats(),
  };
  const controller = new LifecycleController(ctx, deps.connect ?? connectRelay);
  const installSignals = deps.installSignals ?? installSignalHook;

  try {
    if (statusPort !== undefined) {
      const statusLog = logging.channel("Status");
      const app = createStatusApp({
        state: () => controller.state,
        selfId: () => controller.selfId,
        targets: options.floods,
        stats: ctx.stats,
      });
      const server = await startStatusServer(app, statusPort, statusLog);
      ctx.resources.push("status server", () => stopStatusServer(server, statusLog));
    }

    ctx.resources.push(
      "signal handler",
      installSignals((signal) => {
        log.notice(`termination requested (${signal})`);
        controller.terminate("signal");
      })
    );

    if (options.ssl) {
      ctx.security = acquireSecurity(options.ssl, ctx.resources, logging.channel("Security"));
    }

    controller.start();
  } catch (err) {
    log.error(formatError(err));
    ctx.resources.releaseAll();
    log.error("initialization failed");
    return 1;
  }

  log.notice("entering event loop");
  const code = await ctx.reactor.exec();
  log.notice("exiting");
  return code;
}
