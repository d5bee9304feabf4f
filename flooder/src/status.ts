import express, { type Express } from "express";
import { createServer, type Server } from "node:http";
import type { Logger } from "./log.js";
import type { ConnectionState, FloodStats, PeerId } from "./types.js";

export interface StatusView {
  state(): ConnectionState;
  selfId(): PeerId | undefined;
  readonly targets: readonly PeerId[];
  readonly stats: FloodStats;
}

export function createStatusApp(view: StatusView): Express {
  const app = express();

  // ── Health check ────────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", state: view.state() });
  });

  // ── Counters ────────────────────────────────────────────────────────────────

  app.get("/stats", (_req, res) => {
    res.json({
      state: view.state(),
      selfId: view.selfId() ?? null,
      targets: view.targets,
      ...view.stats,
    });
  });

  return app;
}

export function startStatusServer(app: Express, port: number, log: Logger): Promise<Server> {
  const server = createServer(app);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      const address = server.address();
      const bound = address !== null && typeof address === "object" ? address.port : port;
      log.notice(`status endpoint listening on port ${bound}`);
      resolve(server);
    });
  });
}

export function stopStatusServer(server: Server, log: Logger): void {
  server.close((err) => {
    if (err) {
      log.error(`status server close failed: ${err.message}`);
    }
  });
  server.closeAllConnections();
}
