import { Chalk } from "chalk";
import { describe, expect, it, vi } from "vitest";
import { AggregationEngine } from "../engine/aggregation-engine.js";
import { METRIC_NAMES } from "../engine/metric-handlers.js";
import { QueryFacade } from "../engine/query.js";
import { metricEnvelope } from "../telemetry/envelopes.js";
import { LiveDashboard } from "./dashboard.js";
import { ConsoleFormatter } from "./formatter.js";

const CLOCK = new Date("2025-01-01T09:05:03Z");
const T = new Date("2025-01-01T09:00:00Z");

const resourceAttributes = {
  "session.id": "S1",
  "project.path": "/work/app",
  "service.version": "1.2.3",
  "user.email": "dev@example.com",
};

function populatedEngine(): AggregationEngine {
  const engine = new AggregationEngine({ clock: () => CLOCK });
  const metric = (name: string, dataPoints: Array<{ value: number; attributes?: Record<string, string> }>) =>
    engine.ingest(metricEnvelope({ name, resourceAttributes, timestamp: T, dataPoints }));

  metric(METRIC_NAMES.tokenUsage, [
    { value: 120, attributes: { model: "claude-3-5-sonnet", type: "input" } },
    { value: 30, attributes: { model: "claude-3-5-sonnet", type: "output" } },
  ]);
  metric(METRIC_NAMES.costUsage, [{ value: 0.0123 }]);
  metric(METRIC_NAMES.linesOfCode, [
    { value: 40, attributes: { type: "added" } },
    { value: 10, attributes: { type: "removed" } },
  ]);
  metric(METRIC_NAMES.toolDecision, [
    { value: 1, attributes: { decision: "accept", tool_name: "Edit" } },
    { value: 1, attributes: { decision: "reject", tool_name: "Write" } },
  ]);
  metric(METRIC_NAMES.commitCount, [{ value: 2 }]);
  return engine;
}

const plain = () => new ConsoleFormatter({ color: new Chalk({ level: 0 }), timeZone: "UTC" });

describe("ConsoleFormatter", () => {
  it("renders every session detail it knows about", () => {
    const session = populatedEngine().getSession("S1");
    expect(session).toBeDefined();
    if (!session) return;

    expect(plain().session(session).split("\n")).toEqual([
      "Session: S1 [ACTIVE]",
      "  Started: 09:05:03",
      "  Duration: Ongoing",
      "  Interactions: 1",
      "  Total Tokens: 150",
      "  Project: /work/app",
      "  Version: 1.2.3",
      "  Cost: $0.012300",
      "  User: dev@example.com",
      "  Code: +40 -10 (+30 net)",
      "  Tools: 1/2 accepted (Edit, Write)",
      "  Git: 2 commits",
    ]);
  });

  it("renders an interaction", () => {
    const interaction = populatedEngine().getSession("S1")?.interactions[0];
    expect(interaction).toBeDefined();
    if (!interaction) return;

    expect(plain().interaction(interaction)).toBe(
      ["  → 09:00:00 - S1_claud", "    Tokens: 120 → 30 (total: 150)", "    Model: claude-3-5-sonnet"].join("\n"),
    );
  });

  it("centers headers within the rule", () => {
    const rule = "=".repeat(60);
    expect(plain().header("Hi")).toBe(`\n${rule}\n${" ".repeat(29)}Hi${" ".repeat(29)}\n${rule}\n`);
  });

  it("renders statistics", () => {
    const text = plain().statistics({
      totalSessions: 3,
      activeSessions: 1,
      totalInteractions: 7,
      totalTokens: 900,
      totalEvents: 42,
    });
    expect(text).toBe(
      [
        "Total Sessions: 3",
        "Active Sessions: 1",
        "Total Interactions: 7",
        "Total Tokens: 900",
        "Total Events: 42",
      ].join("\n"),
    );
  });

  it("summarizes ended sessions with their duration in minutes", () => {
    const engine = populatedEngine();
    engine.endSession("S1", new Date("2025-01-01T09:35:03Z"));
    const text = plain().summaries(new QueryFacade(engine).getSessionSummaries());

    expect(text).toBe(
      [
        "S1 [ENDED]",
        "  Time: 2025-01-01 09:05:03 (30.0m)",
        "  Tokens: 150",
        "  Interactions: 1",
        "  Models: claude-3-5-sonnet",
        "  Project: /work/app",
        "",
      ].join("\n"),
    );
  });

  it("says so when there are no sessions", () => {
    expect(plain().sessionList([])).toBe("No sessions found");
    expect(plain().summaries([])).toBe("No sessions found");
  });

  it("draws proportional bars", () => {
    expect(plain().bar(5, 10, 4)).toBe("██░░");
    expect(plain().bar(0, 0, 3)).toBe("░░░");
  });

  it("renders a provider usage summary", () => {
    const text = plain().usage({
      provider: "openai",
      periodDays: 7,
      totalCost: 1.5,
      totalTokens: 1500,
      totalRequests: 12,
      byModel: { "gpt-4o": { cost: 1.5, tokens: 1500, requests: 12 } },
      dailyBreakdown: [],
    });
    expect(text.split("\n")).toEqual([
      "  openai usage (last 7 days)",
      "  ─────────────────────────────────────────────",
      "  ├─ Total Cost       $1.5000",
      "  ├─ Total Tokens     1,500",
      "  └─ Total Requests   12",
      "",
      "  Cost by Model",
      `  ${"gpt-4o".padEnd(22)} ${"█".repeat(20)}  $1.5000`,
    ]);
  });
});

describe("LiveDashboard", () => {
  it("redraws stats, active and recent sessions", () => {
    const write = vi.fn<(text: string) => void>();
    const dashboard = new LiveDashboard(new QueryFacade(populatedEngine(), () => CLOCK), {
      formatter: plain(),
      write,
      clock: () => CLOCK,
    });

    dashboard.redraw();

    expect(write).toHaveBeenCalledTimes(1);
    const screen = write.mock.calls[0]?.[0] ?? "";
    expect(screen.startsWith("\x1b[2J\x1b[H")).toBe(true);
    expect(screen).toContain("Total Sessions: 1");
    expect(screen).toContain(" Active Sessions ");
    expect(screen).toContain(" Recent Sessions ");
    expect(screen).toContain("  Recent Interactions:");
    expect(screen.endsWith("Last Updated: 09:05:03\nPress Ctrl+C to stop\n")).toBe(true);
  });

  it("starts and stops its timer", () => {
    vi.useFakeTimers();
    try {
      const write = vi.fn<(text: string) => void>();
      const dashboard = new LiveDashboard(new QueryFacade(populatedEngine()), { formatter: plain(), write, refreshMs: 1000 });
      dashboard.start();
      vi.advanceTimersByTime(2500);
      expect(write).toHaveBeenCalledTimes(3);
      dashboard.stop();
      vi.advanceTimersByTime(5000);
      expect(write).toHaveBeenCalledTimes(3);
      expect(dashboard.running).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
