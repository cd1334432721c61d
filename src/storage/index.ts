import type { InteractionAggregate, SessionAggregate } from "../engine/models.js";
import type { ProviderName, UsageRecord } from "../providers/types.js";
import type { EventEnvelope } from "../telemetry/types.js";

export interface EventStore {
  init(): Promise<void>;
  saveEvent(envelope: EventEnvelope): Promise<void>;
  upsertSession(session: SessionAggregate): Promise<void>;
  upsertInteraction(interaction: InteractionAggregate): Promise<void>;
  saveUsageRecords(records: UsageRecord[]): Promise<void>;
  /** Records whose date is on or after `since` (YYYY-MM-DD), oldest first. */
  listUsageRecords(provider: ProviderName, since: string): Promise<UsageRecord[]>;
  /** Deletes events, ended sessions and usage rows older than the window; returns rows removed. */
  cleanupOldData(retentionDays: number): Promise<number>;
  close(): Promise<void>;
}

export function retentionCutoff(retentionDays: number, now = new Date()): Date {
  return new Date(now.getTime() - retentionDays * 24 * 60 * 60 * 1000);
}
