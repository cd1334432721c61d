import { createServer } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import WebSocket from "ws";
import { close, listen } from "./api/http.js";
import { Collector } from "./collector.js";
import { DEFAULT_CONFIG } from "./config/defaults.js";
import { applyPatch } from "./config/loader.js";
import { MemoryStore } from "./storage/memory.js";

const config = applyPatch(DEFAULT_CONFIG, {
  host: "127.0.0.1",
  otlpPort: 0,
  apiPort: 0,
  wsPort: 0,
  dashboard: { enabled: false },
});

const tokenMetric = {
  resourceMetrics: [
    {
      resource: { attributes: [{ key: "session.id", value: { stringValue: "S1" } }] },
      scopeMetrics: [
        {
          metrics: [
            {
              name: "claude_code.token.usage",
              sum: {
                dataPoints: [
                  {
                    timeUnixNano: "1735689600000000000",
                    asInt: "25",
                    attributes: [
                      { key: "model", value: { stringValue: "claude-x" } },
                      { key: "type", value: { stringValue: "output" } },
                    ],
                  },
                ],
              },
            },
          ],
        },
      ],
    },
  ],
};

function firstMessage(url: string): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    ws.once("message", (data) => {
      ws.close();
      resolve(JSON.parse(String(data)));
    });
    ws.once("error", reject);
  });
}

describe("Collector", () => {
  let collector: Collector | undefined;

  afterEach(async () => {
    await collector?.stop();
    collector = undefined;
  });

  it("takes OTLP in, serves it over REST and persists it on stop", async () => {
    const store = new MemoryStore();
    collector = new Collector(config, { store });
    const ports = await collector.start();
    expect(ports.ws).toBe(ports.api);

    const res = await fetch(`http://127.0.0.1:${ports.otlp}/v1/metrics`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(tokenMetric),
    });
    expect(res.status).toBe(200);

    const health = await fetch(`http://127.0.0.1:${ports.api}/health`);
    expect(await health.json()).toEqual({ status: "healthy", sessions: 1, activeSessions: 1, wsClients: 0 });

    await collector.stop();
    expect(store.getSession("S1")).toMatchObject({ sessionId: "S1", totalTokens: 25, totalInteractions: 1 });
  });

  it("shares the API port with the WebSocket feed when both are the same", async () => {
    collector = new Collector(config, { store: new MemoryStore() });
    const ports = await collector.start();

    expect(await firstMessage(`ws://127.0.0.1:${ports.api}`)).toEqual({
      type: "stats",
      payload: { totalSessions: 0, activeSessions: 0, totalInteractions: 0, totalTokens: 0, totalEvents: 0 },
    });
  });

  it("stops only once", async () => {
    collector = new Collector(config, { store: new MemoryStore() });
    await collector.start();
    await collector.stop();
    await expect(collector.stop()).resolves.toBeUndefined();
  });

  it("stops what already started when a later part fails to bind", async () => {
    const occupied = createServer();
    const taken = await listen(occupied, 0, "127.0.0.1");
    try {
      collector = new Collector(applyPatch(config, { apiPort: taken, wsPort: 0 }), { store: new MemoryStore() });
      await expect(collector.start()).rejects.toThrow("EADDRINUSE");

      // The receiver came up before the API failed; it must be free to start again.
      const port = await collector.receiver.start();
      expect(port).toBeGreaterThan(0);
      await collector.receiver.stop();
      await expect(collector.stop()).resolves.toBeUndefined();
    } finally {
      await close(occupied);
    }
  });
});
