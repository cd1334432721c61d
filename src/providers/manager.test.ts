import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import type { DevpulseConfig } from "../config/schema.js";
import { createInteraction, type SessionAggregate } from "../engine/models.js";
import { MemoryStore } from "../storage/memory.js";
import { ProviderManager, summarizeUsage } from "./manager.js";
import { isProviderModel, reconcileUsage } from "./reconcile.js";
import type { ProviderName, UsageProvider, UsageRecord } from "./types.js";

const NOW = new Date("2026-03-10T12:00:00Z");

function record(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    provider: "openai",
    date: "2026-03-10",
    model: "gpt-4o",
    requests: 2,
    inputTokens: 1000,
    outputTokens: 500,
    totalTokens: 1500,
    costUsd: 0.5,
    ...overrides,
  };
}

function session(id: string, start: string, models: string[]): SessionAggregate {
  const startTime = new Date(start);
  return {
    sessionId: id,
    startTime,
    totalInteractions: models.length,
    totalTokens: 0,
    totalRequestTokens: 0,
    totalResponseTokens: 0,
    serviceVersion: "1.0.0",
    interactions: models.map((m, i) => createInteraction(`${id}_${i}`, id, startTime, { modelName: m })),
    attributes: {},
  };
}

function fakeProvider(name: ProviderName, fetchUsage: UsageProvider["fetchUsage"]): UsageProvider {
  return { name, enabled: true, initialize: vi.fn(async () => {}), fetchUsage };
}

function providersConfig(): DevpulseConfig["providers"] {
  return {
    openai: { ...DEFAULT_CONFIG.providers.openai, enabled: true, apiKey: "test-secret" },
    anthropic: { ...DEFAULT_CONFIG.providers.anthropic, enabled: true, apiKey: "test-secret" },
  };
}

describe("reconcileUsage", () => {
  it("recognizes provider model families", () => {
    expect(isProviderModel("openai", "gpt-4o")).toBe(true);
    expect(isProviderModel("openai", "o1-mini")).toBe(true);
    expect(isProviderModel("openai", "claude-3-opus")).toBe(false);
    expect(isProviderModel("anthropic", "Claude-3-Opus")).toBe(true);
  });

  it("attributes a record to the earliest matching session of the same day", () => {
    const sessions = [
      session("late", "2026-03-10T15:00:00Z", ["gpt-4o"]),
      session("claude-only", "2026-03-10T08:00:00Z", ["claude-3-opus"]),
      session("early", "2026-03-10T09:00:00Z", ["gpt-4o-mini"]),
      session("yesterday", "2026-03-09T09:00:00Z", ["gpt-4o"]),
    ];
    const [openai, anthropic, unmatched] = reconcileUsage(
      [record(), record({ provider: "anthropic", model: "claude-3-opus" }), record({ date: "2026-03-01" })],
      sessions,
    );

    expect(openai?.sessionId).toBe("early");
    expect(anthropic?.sessionId).toBe("claude-only");
    expect(unmatched?.sessionId).toBeUndefined();
  });
});

describe("summarizeUsage", () => {
  it("totals by model and by day", () => {
    const summary = summarizeUsage(
      "openai",
      [
        record({ date: "2026-03-10", model: "gpt-4o", costUsd: 1, totalTokens: 100, requests: 1 }),
        record({ date: "2026-03-09", model: "gpt-4o", costUsd: 2, totalTokens: 200, requests: 2 }),
        record({ date: "2026-03-10", model: "o1", costUsd: 4, totalTokens: 400, requests: 4 }),
      ],
      7,
    );

    expect(summary).toEqual({
      provider: "openai",
      periodDays: 7,
      totalCost: 7,
      totalTokens: 700,
      totalRequests: 7,
      byModel: {
        "gpt-4o": { cost: 3, tokens: 300, requests: 3 },
        o1: { cost: 4, tokens: 400, requests: 4 },
      },
      dailyBreakdown: [
        { date: "2026-03-09", cost: 2, tokens: 200, requests: 2 },
        { date: "2026-03-10", cost: 5, tokens: 500, requests: 5 },
      ],
    });
  });
});

describe("ProviderManager", () => {
  let manager: ProviderManager | undefined;

  afterEach(() => {
    manager?.stop();
    manager = undefined;
  });

  it("activates only providers whose configuration is valid", async () => {
    const config = providersConfig();
    config.anthropic.apiKey = undefined;
    const openai = fakeProvider("openai", vi.fn(async () => []));
    const anthropic = fakeProvider("anthropic", vi.fn(async () => []));
    manager = new ProviderManager(config, { store: new MemoryStore(), sessions: () => [], providers: [openai, anthropic] });

    expect(await manager.initialize()).toEqual(["openai"]);
    expect(manager.isActive("anthropic")).toBe(false);
    expect(anthropic.initialize).not.toHaveBeenCalled();
    expect(manager.getSummary()).toEqual({ configured: ["openai", "anthropic"], active: ["openai"], running: [] });
  });

  it("leaves out a provider whose initialize throws", async () => {
    const broken: UsageProvider = {
      name: "openai",
      enabled: true,
      initialize: async () => {
        throw new Error("nope");
      },
      fetchUsage: async () => [],
    };
    manager = new ProviderManager(providersConfig(), { store: new MemoryStore(), sessions: () => [], providers: [broken] });

    expect(await manager.initialize()).toEqual([]);
    expect(manager.healthChecks()[0]).toEqual({
      provider: "openai",
      status: "unhealthy",
      enabled: true,
      running: false,
      error: "provider failed to initialize",
    });
  });

  it("collects, reconciles and stores usage", async () => {
    const store = new MemoryStore();
    const openai = fakeProvider("openai", vi.fn(async () => [record()]));
    manager = new ProviderManager(providersConfig(), {
      store,
      sessions: () => [session("s1", "2026-03-10T10:00:00Z", ["gpt-4o"])],
      providers: [openai],
      now: () => NOW,
    });
    await manager.initialize();

    const records = await manager.collect("openai", 3);

    expect(openai.fetchUsage).toHaveBeenCalledWith(3);
    expect(records[0]?.sessionId).toBe("s1");
    expect(await store.listUsageRecords("openai", "2026-03-01")).toEqual([{ ...record(), sessionId: "s1" }]);
    expect(manager.healthChecks()[0]).toEqual({
      provider: "openai",
      status: "healthy",
      enabled: true,
      running: false,
      lastCollectedAt: NOW.toISOString(),
    });
  });

  it("rejects collection for an inactive provider", async () => {
    manager = new ProviderManager(providersConfig(), { store: new MemoryStore(), sessions: () => [], providers: [] });
    await expect(manager.collect("anthropic")).rejects.toThrow("anthropic: provider is not active");
  });

  it("reports per-provider results from collectAll", async () => {
    const openai = fakeProvider("openai", vi.fn(async () => [record(), record({ model: "o1" })]));
    const anthropic = fakeProvider(
      "anthropic",
      vi.fn(async () => {
        throw new Error("upstream down");
      }),
    );
    manager = new ProviderManager(providersConfig(), {
      store: new MemoryStore(),
      sessions: () => [],
      providers: [openai, anthropic],
    });
    await manager.initialize();

    expect(await manager.collectAll()).toEqual({ openai: { records: 2 }, anthropic: { error: "upstream down" } });
    const anthropicHealth = manager.healthChecks().find((h) => h.provider === "anthropic");
    expect(anthropicHealth?.status).toBe("unhealthy");
    expect(anthropicHealth?.error).toBe("upstream down");
  });

  it("summarizes stored usage within the window", async () => {
    const store = new MemoryStore();
    await store.saveUsageRecords([
      record({ date: "2026-03-01", costUsd: 10 }),
      record({ date: "2026-03-09", costUsd: 1 }),
      record({ date: "2026-03-10", costUsd: 2 }),
    ]);
    manager = new ProviderManager(providersConfig(), {
      store,
      sessions: () => [],
      providers: [fakeProvider("openai", async () => [])],
      now: () => NOW,
    });
    await manager.initialize();

    const summary = await manager.getUsageSummary("openai", 7);
    expect(summary.totalCost).toBe(3);
    expect(summary.dailyBreakdown.map((d) => d.date)).toEqual(["2026-03-09", "2026-03-10"]);
    expect(Object.keys(await manager.getAllUsageSummaries())).toEqual(["openai"]);
  });

  it("schedules active providers until stopped", async () => {
    const openai = fakeProvider("openai", vi.fn(async () => []));
    manager = new ProviderManager(providersConfig(), { store: new MemoryStore(), sessions: () => [], providers: [openai] });
    await manager.initialize();

    manager.start();
    expect(manager.getSummary().running).toEqual(["openai"]);
    await vi.waitFor(() => expect(openai.fetchUsage).toHaveBeenCalledWith(1));

    manager.stop();
    expect(manager.getSummary().running).toEqual([]);
  });
});
