import { afterEach, describe, expect, it, vi } from "vitest";
import { AggregationEngine } from "../engine/aggregation-engine.js";
import { METRIC_NAMES } from "../engine/metric-handlers.js";
import type { UsageRecord } from "../providers/types.js";
import { metricEnvelope } from "../telemetry/envelopes.js";
import { MemoryStore } from "./memory.js";
import { eventToRow, rowToUsageRecord } from "./postgres.js";
import { StoreSink } from "./sink.js";

function usage(date: string, model: string, costUsd: number): UsageRecord {
  return {
    provider: "openai",
    date,
    model,
    requests: 1,
    inputTokens: 10,
    outputTokens: 5,
    totalTokens: 15,
    costUsd,
  };
}

function tokenEnvelope(sessionId: string) {
  return metricEnvelope({
    name: METRIC_NAMES.tokenUsage,
    resourceAttributes: { "session.id": sessionId },
    timestamp: new Date("2025-01-01T00:00:00Z"),
    dataPoints: [{ value: 7, attributes: { model: "claude-x", type: "input" } }],
  });
}

afterEach(() => {
  vi.useRealTimers();
});

describe("MemoryStore behind StoreSink", () => {
  it("persists snapshots of what the engine produced", async () => {
    const store = new MemoryStore();
    const sink = new StoreSink(store);
    const engine = new AggregationEngine({ sink });

    engine.ingest(tokenEnvelope("S1"));
    await sink.flush();

    expect(store.eventCount).toBe(1);
    expect(store.getSession("S1")?.totalTokens).toBe(7);
    expect(store.getInteraction("S1_claude-x_1735689600")?.requestTokens).toBe(7);

    // Later engine mutations do not leak into stored snapshots.
    const live = engine.getSession("S1");
    if (live) live.attributes.extra = "later";
    expect(store.getSession("S1")?.attributes.extra).toBeUndefined();
  });

  it("logs and counts store failures without throwing into the engine", async () => {
    const store = new MemoryStore();
    vi.spyOn(store, "saveEvent").mockRejectedValue(new Error("disk full"));
    const sink = new StoreSink(store);
    const engine = new AggregationEngine({ sink });

    expect(() => engine.ingest(tokenEnvelope("S1"))).not.toThrow();
    await sink.flush();
    expect(sink.failureCount).toBe(1);
    expect(store.getSession("S1")?.totalTokens).toBe(7);
  });
});

describe("MemoryStore usage records", () => {
  it("replaces a record for the same provider, day and model", async () => {
    const store = new MemoryStore();
    await store.saveUsageRecords([usage("2025-01-02", "gpt-4o", 1), usage("2025-01-01", "gpt-4o", 2)]);
    await store.saveUsageRecords([usage("2025-01-02", "gpt-4o", 3)]);

    const records = await store.listUsageRecords("openai", "2025-01-01");
    expect(records.map((r) => [r.date, r.costUsd])).toEqual([
      ["2025-01-01", 2],
      ["2025-01-02", 3],
    ]);
    expect(await store.listUsageRecords("openai", "2025-01-02")).toHaveLength(1);
    expect(await store.listUsageRecords("anthropic", "2025-01-01")).toEqual([]);
  });

  it("removes data older than the retention window", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-20T00:00:00Z"));

    const store = new MemoryStore();
    const engine = new AggregationEngine({ sink: new StoreSink(store), clock: () => new Date("2025-01-01T00:00:00Z") });
    const old = tokenEnvelope("S1");
    old.receivedAt = new Date("2025-01-01T00:00:00Z");
    engine.ingest(old);
    engine.endSession("S1", new Date("2025-01-01T01:00:00Z"));
    engine.ingest(tokenEnvelope("S2"));
    await store.saveUsageRecords([usage("2025-01-01", "gpt-4o", 1), usage("2025-01-19", "gpt-4o", 1)]);
    await Promise.resolve();

    // old event, ended S1, its interaction, old usage row
    expect(await store.cleanupOldData(7)).toBe(4);
    expect(store.getSession("S1")).toBeUndefined();
    expect(store.getSession("S2")).toBeDefined();
    expect(store.eventCount).toBe(1);
  });
});

describe("postgres row mapping", () => {
  it("indexes events by session id and payload name", () => {
    const envelope = tokenEnvelope("S9");
    const row = eventToRow(envelope);
    expect(row.sessionId).toBe("S9");
    expect(row.name).toBe(METRIC_NAMES.tokenUsage);
    expect(row.kind).toBe("metric");
  });

  it("drops usage rows for providers it does not know", () => {
    const base = {
      date: "2025-01-01",
      model: "m",
      requests: 1,
      inputTokens: 1,
      outputTokens: 1,
      totalTokens: 2,
      costUsd: 0.1,
      organizationId: null,
      sessionId: null,
      raw: null,
      collectedAt: new Date(),
    };
    expect(rowToUsageRecord({ ...base, provider: "mistral" })).toBeUndefined();
    expect(rowToUsageRecord({ ...base, provider: "anthropic" })).toEqual({
      provider: "anthropic",
      date: "2025-01-01",
      model: "m",
      requests: 1,
      inputTokens: 1,
      outputTokens: 1,
      totalTokens: 2,
      costUsd: 0.1,
      organizationId: undefined,
      sessionId: undefined,
      raw: undefined,
    });
  });
});
