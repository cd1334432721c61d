import { createServer, type Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import WebSocket from "ws";
import { close, listen } from "../api/http.js";
import { AggregationEngine } from "../engine/aggregation-engine.js";
import { METRIC_NAMES } from "../engine/metric-handlers.js";
import { QueryFacade } from "../engine/query.js";
import { metricEnvelope } from "../telemetry/envelopes.js";
import { WSServer } from "./server.js";

const CLOCK = new Date("2025-01-01T00:00:05.000Z");

function tokens(sessionId: string) {
  return metricEnvelope({
    name: METRIC_NAMES.tokenUsage,
    resourceAttributes: { "session.id": sessionId },
    timestamp: CLOCK,
    dataPoints: [{ value: 10, attributes: { model: "claude-3-haiku", type: "input" } }],
  });
}

/** Collects every message a client receives, decoded. */
function connect(url: string): Promise<{ socket: WebSocket; messages: unknown[] }> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url);
    const messages: unknown[] = [];
    socket.on("message", (data) => messages.push(JSON.parse(data.toString())));
    socket.once("open", () => resolve({ socket, messages }));
    socket.once("error", reject);
  });
}

async function waitForCount(messages: unknown[], count: number): Promise<void> {
  const deadline = Date.now() + 2000;
  while (messages.length < count) {
    if (Date.now() > deadline) throw new Error(`expected ${count} messages, got ${messages.length}`);
    await new Promise((r) => setTimeout(r, 10));
  }
}

describe("WSServer", () => {
  const cleanup: Array<() => Promise<void> | void> = [];

  afterEach(async () => {
    for (const fn of cleanup.splice(0).reverse()) await fn();
  });

  function setup() {
    const engine = new AggregationEngine({ clock: () => CLOCK });
    const server = new WSServer(engine, new QueryFacade(engine, () => CLOCK), { statsIntervalMs: 60_000 });
    cleanup.push(() => server.stop());
    return { engine, server };
  }

  it("greets clients with stats and broadcasts session changes", async () => {
    const { engine, server } = setup();
    const port = await server.start(0, "127.0.0.1");
    const { socket, messages } = await connect(`ws://127.0.0.1:${port}`);
    cleanup.push(() => socket.close());

    await waitForCount(messages, 1);
    expect(messages[0]).toEqual({
      type: "stats",
      payload: { totalSessions: 0, activeSessions: 0, totalInteractions: 0, totalTokens: 0, totalEvents: 0 },
    });
    expect(server.getClientCount()).toBe(1);

    engine.ingest(tokens("S1"));
    engine.ingest(tokens("S1"));
    engine.endSession("S1");
    await waitForCount(messages, 4);

    expect(messages.slice(1)).toMatchObject([
      { type: "session:created", payload: { sessionId: "S1", totalTokens: 10 } },
      { type: "session:updated", payload: { sessionId: "S1", totalTokens: 20 } },
      { type: "session:ended", payload: { sessionId: "S1", durationMinutes: 0 } },
    ]);
  });

  it("only forwards subscribed topics", async () => {
    const { engine, server } = setup();
    const port = await server.start(0, "127.0.0.1");
    const { socket, messages } = await connect(`ws://127.0.0.1:${port}`);
    cleanup.push(() => socket.close());
    await waitForCount(messages, 1);

    socket.send(JSON.stringify({ type: "subscribe", topics: ["session:ended"] }));
    await waitForCount(messages, 2);
    expect(messages[1]).toEqual({ type: "subscribed", topics: ["session:ended"] });

    engine.ingest(tokens("S1"));
    engine.endSession("S1");
    await waitForCount(messages, 3);
    expect(messages[2]).toMatchObject({ type: "session:ended", payload: { sessionId: "S1" } });
  });

  it("answers malformed client messages with an error", async () => {
    const { server } = setup();
    const port = await server.start(0, "127.0.0.1");
    const { socket, messages } = await connect(`ws://127.0.0.1:${port}`);
    cleanup.push(() => socket.close());
    await waitForCount(messages, 1);

    socket.send(JSON.stringify({ type: "subscribe", topics: ["everything"] }));
    await waitForCount(messages, 2);
    expect(messages[1]).toEqual({ type: "error", error: "Unsupported message" });
  });

  it("shares a port with an existing HTTP server", async () => {
    const http: Server = createServer((_req, res) => res.end("ok"));
    const port = await listen(http, 0, "127.0.0.1");
    cleanup.push(() => close(http));
    const { engine, server } = setup();
    server.attachToServer(http);

    const { socket, messages } = await connect(`ws://127.0.0.1:${port}`);
    cleanup.push(() => socket.close());
    await waitForCount(messages, 1);
    engine.ingest(tokens("S2"));
    await waitForCount(messages, 2);
    expect(messages[1]).toMatchObject({ type: "session:created", payload: { sessionId: "S2" } });
  });
});
