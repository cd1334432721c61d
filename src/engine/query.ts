import type { EventEnvelope } from "../telemetry/types.js";
import type { AggregationEngine } from "./aggregation-engine.js";
import {
  isActive,
  summarizeSession,
  type InteractionAggregate,
  type SessionAggregate,
  type SessionSummary,
} from "./models.js";

export interface EngineStats {
  totalSessions: number;
  activeSessions: number;
  totalInteractions: number;
  totalTokens: number;
  totalEvents: number;
}

export interface ModelBreakdown {
  model: string;
  interactions: number;
  tokens: number;
}

export interface DailyBreakdown {
  /** YYYY-MM-DD, UTC */
  date: string;
  sessions: number;
  interactions: number;
  tokens: number;
  costUsd: number;
}

export interface DashboardData {
  periodDays: number;
  totals: {
    sessions: number;
    activeSessions: number;
    interactions: number;
    tokens: number;
    requestTokens: number;
    responseTokens: number;
    costUsd: number;
    linesAdded: number;
    linesRemoved: number;
  };
  byModel: ModelBreakdown[];
  daily: DailyBreakdown[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

function numberAttr(session: SessionAggregate, key: string): number {
  const value = session.attributes[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/** Read-only views over the engine's live tables. Every call recomputes. */
export class QueryFacade {
  constructor(
    private readonly engine: AggregationEngine,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Newest first. */
  listSessions(): SessionAggregate[] {
    return this.engine.getSessions().sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
  }

  getSession(sessionId: string): SessionAggregate | undefined {
    return this.engine.getSession(sessionId);
  }

  getActiveSessions(): SessionAggregate[] {
    return this.listSessions().filter(isActive);
  }

  getStats(): EngineStats {
    const sessions = this.engine.getSessions();
    let activeSessions = 0;
    let totalInteractions = 0;
    let totalTokens = 0;
    for (const s of sessions) {
      if (isActive(s)) activeSessions++;
      totalInteractions += s.totalInteractions;
      totalTokens += s.totalTokens;
    }
    return {
      totalSessions: sessions.length,
      activeSessions,
      totalInteractions,
      totalTokens,
      totalEvents: this.engine.totalEvents,
    };
  }

  getSessionSummaries(): SessionSummary[] {
    return this.listSessions().map(summarizeSession);
  }

  getSessionSummary(sessionId: string): SessionSummary | undefined {
    const session = this.engine.getSession(sessionId);
    return session ? summarizeSession(session) : undefined;
  }

  getSessionInteractions(sessionId: string): InteractionAggregate[] | undefined {
    return this.engine.getSession(sessionId)?.interactions.slice();
  }

  /** Newest first. */
  getEvents(limit?: number): EventEnvelope[] {
    const events = this.engine.getEventHistory().slice().reverse();
    return limit === undefined ? events : events.slice(0, Math.max(0, limit));
  }

  getDashboardData(days = 7): DashboardData {
    const since = this.clock().getTime() - days * DAY_MS;
    const sessions = this.engine.getSessions().filter((s) => s.startTime.getTime() >= since);

    const totals: DashboardData["totals"] = {
      sessions: sessions.length,
      activeSessions: 0,
      interactions: 0,
      tokens: 0,
      requestTokens: 0,
      responseTokens: 0,
      costUsd: 0,
      linesAdded: 0,
      linesRemoved: 0,
    };
    const byModel = new Map<string, ModelBreakdown>();
    const daily = new Map<string, DailyBreakdown>();

    for (const s of sessions) {
      if (isActive(s)) totals.activeSessions++;
      totals.interactions += s.totalInteractions;
      totals.tokens += s.totalTokens;
      totals.requestTokens += s.totalRequestTokens;
      totals.responseTokens += s.totalResponseTokens;
      const cost = numberAttr(s, "total_cost_usd");
      totals.costUsd += cost;
      totals.linesAdded += numberAttr(s, "lines_added");
      totals.linesRemoved += numberAttr(s, "lines_removed");

      const date = s.startTime.toISOString().slice(0, 10);
      let day = daily.get(date);
      if (!day) {
        day = { date, sessions: 0, interactions: 0, tokens: 0, costUsd: 0 };
        daily.set(date, day);
      }
      day.sessions++;
      day.interactions += s.totalInteractions;
      day.tokens += s.totalTokens;
      day.costUsd += cost;

      for (const i of s.interactions) {
        const model = i.modelName ?? "unknown";
        let entry = byModel.get(model);
        if (!entry) {
          entry = { model, interactions: 0, tokens: 0 };
          byModel.set(model, entry);
        }
        entry.interactions++;
        entry.tokens += i.totalTokens;
      }
    }

    return {
      periodDays: days,
      totals,
      byModel: [...byModel.values()].sort((a, b) => b.tokens - a.tokens),
      daily: [...daily.values()].sort((a, b) => a.date.localeCompare(b.date)),
    };
  }
}
