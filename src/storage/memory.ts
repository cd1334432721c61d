import type { InteractionAggregate, SessionAggregate } from "../engine/models.js";
import type { ProviderName, UsageRecord } from "../providers/types.js";
import type { EventEnvelope } from "../telemetry/types.js";
import { retentionCutoff, type EventStore } from "./index.js";

export interface StoredSession {
  sessionId: string;
  startTime: Date;
  endTime?: Date;
  totalInteractions: number;
  totalTokens: number;
  attributes: SessionAggregate["attributes"];
}

export class MemoryStore implements EventStore {
  private events: EventEnvelope[] = [];
  private sessions = new Map<string, StoredSession>();
  private interactions = new Map<string, InteractionAggregate>();
  private usage = new Map<string, UsageRecord>();

  async init(): Promise<void> {}

  async saveEvent(envelope: EventEnvelope): Promise<void> {
    this.events.push(envelope);
  }

  async upsertSession(session: SessionAggregate): Promise<void> {
    // Snapshot: the engine keeps mutating its own object.
    this.sessions.set(session.sessionId, {
      sessionId: session.sessionId,
      startTime: session.startTime,
      endTime: session.endTime,
      totalInteractions: session.totalInteractions,
      totalTokens: session.totalTokens,
      attributes: structuredClone(session.attributes),
    });
  }

  async upsertInteraction(interaction: InteractionAggregate): Promise<void> {
    this.interactions.set(interaction.interactionId, { ...interaction, attributes: structuredClone(interaction.attributes) });
  }

  async saveUsageRecords(records: UsageRecord[]): Promise<void> {
    for (const r of records) this.usage.set(usageKey(r), r);
  }

  async listUsageRecords(provider: ProviderName, since: string): Promise<UsageRecord[]> {
    return [...this.usage.values()]
      .filter((r) => r.provider === provider && r.date >= since)
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  async cleanupOldData(retentionDays: number): Promise<number> {
    const cutoff = retentionCutoff(retentionDays);
    const cutoffDate = cutoff.toISOString().slice(0, 10);
    let removed = 0;

    const keptEvents = this.events.filter((e) => e.receivedAt >= cutoff);
    removed += this.events.length - keptEvents.length;
    this.events = keptEvents;

    for (const [id, s] of this.sessions) {
      if (s.endTime && s.endTime < cutoff) {
        this.sessions.delete(id);
        removed++;
        for (const [iid, i] of this.interactions) {
          if (i.sessionId === id) {
            this.interactions.delete(iid);
            removed++;
          }
        }
      }
    }
    for (const [key, r] of this.usage) {
      if (r.date < cutoffDate) {
        this.usage.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async close(): Promise<void> {}

  getSession(id: string): StoredSession | undefined {
    return this.sessions.get(id);
  }

  getInteraction(id: string): InteractionAggregate | undefined {
    return this.interactions.get(id);
  }

  get eventCount(): number {
    return this.events.length;
  }
}

/** One row per provider, day and model; a later collection replaces the earlier one. */
export function usageKey(r: UsageRecord): string {
  return `${r.provider}:${r.date}:${r.model}`;
}
