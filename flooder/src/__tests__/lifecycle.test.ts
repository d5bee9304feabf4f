import { describe, expect, it } from "vitest";
import { CleanupStack } from "../cleanup.js";
import { createStats, type AppContext } from "../context.js";
import { ContractViolation } from "../errors.js";
import { canTransition, LifecycleController } from "../lifecycle.js";
import { Reactor } from "../reactor.js";
import type { RelayConnectOptions, RelayConnector, RelayLink } from "../relay.js";
import type { ConnectionState, PeerId, RelayEvent, RelayEventHandler, SendChannel } from "../types.js";
import { captureLogging, resourceTrace } from "./helpers.js";

class FakeLink implements RelayLink {
  frames: Buffer[] = [];
  dones: Array<() => void> = [];
  freed = 0;
  sendChannelFails = false;

  sendChannel(): SendChannel {
    if (this.sendChannelFails) {
      throw new Error("send channel unavailable");
    }
    return {
      send: (frame, done) => {
        this.frames.push(Buffer.from(frame));
        this.dones.push(done);
      },
    };
  }

  free(): void {
    this.freed += 1;
  }
}

function setup(floods: PeerId[]) {
  const { logging, messages } = captureLogging();
  const ctx: AppContext = {
    options: { serverAddr: "10.0.0.1:7000", floods, channelLoglevels: [] },
    target: { address: { host: "10.0.0.1", port: 7000, family: 4 }, serverName: "10.0.0.1" },
    logging,
    reactor: new Reactor(),
    resources: new CleanupStack(logging.channel("Cleanup")),
    stats: createStats(),
  };
  ctx.resources.push("signal handler", () => {});

  const link = new FakeLink();
  let handler: RelayEventHandler | undefined;
  let connectOptions: RelayConnectOptions | undefined;
  const connect: RelayConnector = (options, onEvent) => {
    connectOptions = options;
    handler = onEvent;
    return link;
  };
  const controller = new LifecycleController(ctx, connect);

  const emit = (event: RelayEvent) => {
    if (!handler) throw new Error("not connected");
    handler(event);
  };
  return {
    ctx,
    controller,
    link,
    emit,
    trace: () => resourceTrace(messages),
    connectOptions: () => connectOptions,
  };
}

const READY: RelayEvent = { type: "ready", selfId: 12, externalIp: "203.0.113.5" };

function destination(frame: Buffer): PeerId {
  return frame.readUInt16LE(3);
}

describe("canTransition", () => {
  const states: ConnectionState[] = ["disconnected", "connecting", "ready", "terminating", "terminated"];

  it("only reaches ready from connecting", () => {
    expect(states.filter((from) => canTransition(from, "ready"))).toEqual(["connecting"]);
  });

  it("only reaches terminated from terminating", () => {
    expect(states.filter((from) => canTransition(from, "terminated"))).toEqual(["terminating"]);
  });

  it("leaves terminated for nothing", () => {
    expect(states.filter((to) => canTransition("terminated", to))).toEqual([]);
  });
});

describe("LifecycleController", () => {
  it("connects with the keepalive and buffering parameters", () => {
    const { controller, connectOptions } = setup([1]);
    controller.start();

    expect(controller.state).toBe("connecting");
    expect(connectOptions()).toMatchObject({
      target: { serverName: "10.0.0.1" },
      keepaliveInterval: 10_000,
      minBufferedPackets: 200,
      security: undefined,
    });
  });

  it("starts flooding on ready and cycles through the targets", () => {
    const { controller, link, emit, ctx } = setup([7, 3, 9]);
    controller.start();
    emit(READY);

    expect(controller.state).toBe("ready");
    expect(controller.selfId).toBe(12);
    expect(link.frames.map(destination)).toEqual([7]);

    link.dones[0]();
    link.dones[1]();
    link.dones[2]();

    expect(link.frames.map(destination)).toEqual([7, 3, 9, 7]);
    expect(ctx.stats.produced).toBe(4);
    expect(ctx.stats.sent).toBe(4);
  });

  it("never sends with an empty target list and stops on signal (scenario A)", async () => {
    const { controller, link, emit, ctx } = setup([]);
    controller.start();
    emit(READY);

    expect(controller.state).toBe("ready");
    expect(link.frames).toHaveLength(0);

    controller.terminate("signal");

    expect(controller.state).toBe("terminated");
    expect(link.frames).toHaveLength(0);
    await expect(ctx.reactor.exec()).resolves.toBe(1);
  });

  it("tears down without a pipeline when the connection fails while connecting (scenario C)", async () => {
    const { controller, link, emit, trace, ctx } = setup([1]);
    controller.start();
    emit({ type: "error", error: new Error("connection refused") });

    expect(controller.state).toBe("terminated");
    expect(controller.selfId).toBeUndefined();
    expect(link.freed).toBe(1);
    expect(trace()).toEqual([
      "acquired signal handler",
      "state disconnected -> connecting",
      "state connecting -> terminating",
      "released relay connection",
      "released signal handler",
      "state terminating -> terminated",
    ]);
    await expect(ctx.reactor.exec()).resolves.toBe(1);
  });

  it("releases buffer, encoder and source, then the connection, on error while ready (scenario D)", () => {
    const { controller, link, emit, trace } = setup([1, 2]);
    controller.start();
    emit(READY);
    emit({ type: "error", error: new Error("reset by peer") });

    expect(controller.state).toBe("terminated");
    expect(link.freed).toBe(1);
    expect(trace()).toEqual([
      "acquired signal handler",
      "state disconnected -> connecting",
      "acquired flood source",
      "acquired frame encoder",
      "acquired relay buffer",
      "state connecting -> ready",
      "state ready -> terminating",
      "released relay buffer",
      "released frame encoder",
      "released flood source",
      "released relay connection",
      "released signal handler",
      "state terminating -> terminated",
    ]);
  });

  it("frees a connection that failed before connect returned", () => {
    const { ctx, trace } = setup([1]);
    const link = new FakeLink();
    const controller = new LifecycleController(ctx, (_options, onEvent) => {
      onEvent({ type: "error", error: new Error("connection refused") });
      return link;
    });
    controller.start();

    expect(controller.state).toBe("terminated");
    expect(link.freed).toBe(1);
    expect(trace()).toEqual([
      "acquired signal handler",
      "state disconnected -> connecting",
      "state connecting -> terminating",
      "released signal handler",
      "state terminating -> terminated",
      "released relay connection",
    ]);
  });

  it("ignores completions from the transport after teardown", () => {
    const { controller, link, emit } = setup([1, 2]);
    controller.start();
    emit(READY);
    controller.terminate("signal");

    link.dones[0]();
    expect(link.frames).toHaveLength(1);
  });

  it("treats a second terminate as a no-op", async () => {
    const once = setup([5]);
    once.controller.start();
    once.emit(READY);
    once.controller.terminate("signal");

    const twice = setup([5]);
    twice.controller.start();
    twice.emit(READY);
    twice.controller.terminate("signal");
    twice.controller.terminate("signal", 0);
    twice.emit({ type: "error", error: new Error("late") });

    expect(twice.controller.state).toBe("terminated");
    expect(twice.trace()).toEqual(once.trace());
    expect(twice.link.freed).toBe(1);
    await expect(twice.ctx.reactor.exec()).resolves.toBe(1);
  });

  it("passes the caller's exit code to the reactor", async () => {
    const { controller, ctx } = setup([]);
    controller.start();
    controller.terminate("operator request", 0);
    await expect(ctx.reactor.exec()).resolves.toBe(0);
  });

  it("undoes a partial pipeline and terminates when the buffer cannot be built", () => {
    const { controller, link, emit, trace } = setup([1]);
    link.sendChannelFails = true;
    controller.start();
    emit(READY);

    expect(controller.state).toBe("terminated");
    expect(controller.selfId).toBeUndefined();
    expect(link.frames).toHaveLength(0);
    expect(trace()).toEqual([
      "acquired signal handler",
      "state disconnected -> connecting",
      "acquired flood source",
      "acquired frame encoder",
      "released frame encoder",
      "released flood source",
      "state connecting -> terminating",
      "released relay connection",
      "released signal handler",
      "state terminating -> terminated",
    ]);
  });

  it("counts peer and message notifications while ready", () => {
    const { controller, emit, ctx } = setup([]);
    controller.start();
    emit(READY);
    emit({ type: "peer-joined", peerId: 4, flags: 0, cert: Buffer.alloc(0) });
    emit({ type: "message", peerId: 4, payload: Buffer.from("hi") });
    emit({ type: "peer-left", peerId: 4 });

    expect(ctx.stats).toMatchObject({ peersJoined: 1, peersLeft: 1, messagesReceived: 1 });
  });

  it("rejects peer notifications before ready", () => {
    const { controller, emit } = setup([]);
    controller.start();
    expect(() => emit({ type: "message", peerId: 4, payload: Buffer.alloc(0) })).toThrow(ContractViolation);
    expect(() => emit({ type: "peer-left", peerId: 4 })).toThrow(ContractViolation);
  });

  it("rejects a second ready", () => {
    const { controller, emit } = setup([]);
    controller.start();
    emit(READY);
    expect(() => emit(READY)).toThrow(ContractViolation);
  });

  it("can be terminated before it ever connected", async () => {
    const { controller, link, ctx } = setup([]);
    controller.terminate("signal");
    expect(controller.state).toBe("terminated");
    expect(link.freed).toBe(0);
    expect(ctx.resources.size).toBe(0);
    await expect(ctx.reactor.exec()).resolves.toBe(1);
  });
});
