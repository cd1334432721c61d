import { describe, expect, it } from "vitest";
import { metricEnvelope } from "../telemetry/envelopes.js";
import { AggregationEngine } from "./aggregation-engine.js";
import { METRIC_NAMES } from "./metric-handlers.js";
import { QueryFacade } from "./query.js";

const NOW = new Date("2025-03-10T12:00:00.000Z");

function setup() {
  let clock = new Date("2025-03-09T08:00:00.000Z");
  const engine = new AggregationEngine({ clock: () => clock });
  const query = new QueryFacade(engine, () => NOW);

  const tokens = (sessionId: string, model: string, input: number, output: number, at: string) =>
    engine.ingest(
      metricEnvelope({
        name: METRIC_NAMES.tokenUsage,
        resourceAttributes: { "session.id": sessionId },
        timestamp: new Date(at),
        dataPoints: [
          { value: input, attributes: { model, type: "input" } },
          { value: output, attributes: { model, type: "output" } },
        ],
      }),
    );

  tokens("old", "claude-a", 100, 100, "2025-03-09T08:00:00Z");
  clock = new Date("2025-03-10T09:00:00.000Z");
  tokens("new", "claude-a", 10, 20, "2025-03-10T09:00:00Z");
  tokens("new", "claude-b", 5, 5, "2025-03-10T09:00:01Z");
  engine.ingest(
    metricEnvelope({
      name: METRIC_NAMES.costUsage,
      resourceAttributes: { "session.id": "new" },
      dataPoints: [{ value: 0.5 }],
    }),
  );
  engine.endSession("old", new Date("2025-03-09T08:30:00.000Z"));
  return { engine, query };
}

describe("QueryFacade", () => {
  it("lists sessions newest first and separates active ones", () => {
    const { query } = setup();
    expect(query.listSessions().map((s) => s.sessionId)).toEqual(["new", "old"]);
    expect(query.getActiveSessions().map((s) => s.sessionId)).toEqual(["new"]);
    expect(query.getSession("nope")).toBeUndefined();
  });

  it("recomputes statistics on every call", () => {
    const { engine, query } = setup();
    expect(query.getStats()).toEqual({
      totalSessions: 2,
      activeSessions: 1,
      totalInteractions: 3,
      totalTokens: 240,
      totalEvents: 4,
    });
    engine.endSession("new");
    expect(query.getStats().activeSessions).toBe(0);
  });

  it("summarizes a session", () => {
    const { query } = setup();
    expect(query.getSessionSummary("old")).toEqual({
      sessionId: "old",
      startTime: new Date("2025-03-09T08:00:00.000Z"),
      endTime: new Date("2025-03-09T08:30:00.000Z"),
      durationMinutes: 30,
      totalInteractions: 1,
      totalTokens: 200,
      averageTokensPerInteraction: 200,
      modelsUsed: ["claude-a"],
      projectPath: undefined,
    });
    expect(query.getSessionSummaries().map((s) => s.averageTokensPerInteraction)).toEqual([20, 200]);
  });

  it("returns interactions and newest-first events", () => {
    const { query } = setup();
    expect(query.getSessionInteractions("new")?.map((i) => i.modelName)).toEqual(["claude-a", "claude-b"]);
    expect(query.getSessionInteractions("missing")).toBeUndefined();
    const events = query.getEvents(2);
    expect(events).toHaveLength(2);
    expect(events[0]?.kind).toBe("metric");
    expect(events[0]?.kind === "metric" ? events[0].payload.name : "").toBe(METRIC_NAMES.costUsage);
  });

  it("builds dashboard data over the requested window", () => {
    const { query } = setup();
    const oneDay = query.getDashboardData(1);
    expect(oneDay.totals.sessions).toBe(1);
    expect(oneDay.totals.tokens).toBe(40);
    expect(oneDay.totals.costUsd).toBe(0.5);
    expect(oneDay.byModel).toEqual([
      { model: "claude-a", interactions: 1, tokens: 30 },
      { model: "claude-b", interactions: 1, tokens: 10 },
    ]);

    const week = query.getDashboardData(7);
    expect(week.daily.map((d) => [d.date, d.sessions, d.tokens])).toEqual([
      ["2025-03-09", 1, 200],
      ["2025-03-10", 1, 40],
    ]);
    expect(week.byModel[0]).toEqual({ model: "claude-a", interactions: 2, tokens: 230 });
  });
});
