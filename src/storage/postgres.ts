import { readFile } from "node:fs/promises";
import { and, asc, eq, gte, inArray, isNotNull, lt } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg, { type Pool } from "pg";
import { resolveSessionId, SPAN_SESSION_ID_KEYS } from "../engine/aggregation-engine.js";
import type { InteractionAggregate, SessionAggregate } from "../engine/models.js";
import { errorMessage, StorageError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { isProviderName, type ProviderName, type UsageRecord } from "../providers/types.js";
import type { EventEnvelope } from "../telemetry/types.js";
import { retentionCutoff, type EventStore } from "./index.js";
import {
  interactions,
  providerUsage,
  sessions,
  telemetryEvents,
  type InteractionRow,
  type ProviderUsageRow,
  type SessionRow,
  type TelemetryEventRow,
} from "./schema.js";

const log = createLogger("postgres");

const SCHEMA_FILE = new URL("../../sql/schema.sql", import.meta.url);

export function eventToRow(envelope: EventEnvelope): TelemetryEventRow {
  return {
    id: envelope.id,
    kind: envelope.kind,
    name: envelope.kind === "log" ? null : envelope.payload.name,
    sessionId: resolveSessionId(envelope.resourceAttributes, SPAN_SESSION_ID_KEYS) ?? null,
    timestamp: envelope.timestamp,
    receivedAt: envelope.receivedAt,
    scope: envelope.scope,
    resourceAttributes: envelope.resourceAttributes,
    payload: envelope.payload,
  };
}

export function sessionToRow(session: SessionAggregate, now = new Date()): SessionRow {
  return {
    sessionId: session.sessionId,
    startTime: session.startTime,
    endTime: session.endTime ?? null,
    totalDurationMs: session.totalDurationMs ?? null,
    totalInteractions: session.totalInteractions,
    totalTokens: session.totalTokens,
    totalRequestTokens: session.totalRequestTokens,
    totalResponseTokens: session.totalResponseTokens,
    projectPath: session.projectPath ?? null,
    userId: session.userId ?? null,
    serviceVersion: session.serviceVersion,
    attributes: session.attributes,
    updatedAt: now,
  };
}

export function interactionToRow(interaction: InteractionAggregate): InteractionRow {
  return {
    interactionId: interaction.interactionId,
    sessionId: interaction.sessionId,
    timestamp: interaction.timestamp,
    requestTokens: interaction.requestTokens,
    responseTokens: interaction.responseTokens,
    totalTokens: interaction.totalTokens,
    modelName: interaction.modelName ?? null,
    responseTimeMs: interaction.responseTimeMs ?? null,
    attributes: interaction.attributes,
  };
}

/** Rows written by another version may name a provider this build does not know. */
export function rowToUsageRecord(row: ProviderUsageRow): UsageRecord | undefined {
  if (!isProviderName(row.provider)) return undefined;
  return {
    provider: row.provider,
    date: row.date,
    model: row.model,
    requests: row.requests,
    inputTokens: row.inputTokens,
    outputTokens: row.outputTokens,
    totalTokens: row.totalTokens,
    costUsd: row.costUsd,
    organizationId: row.organizationId ?? undefined,
    sessionId: row.sessionId ?? undefined,
    raw: row.raw ?? undefined,
  };
}

export class PostgresStore implements EventStore {
  private readonly pool: Pool;
  private readonly db: NodePgDatabase;

  constructor(databaseUrl: string) {
    this.pool = new pg.Pool({ connectionString: databaseUrl, max: 10 });
    this.pool.on("error", (err) => log.error(`Idle client error: ${err.message}`));
    this.db = drizzle(this.pool);
  }

  async init(): Promise<void> {
    try {
      const ddl = await readFile(SCHEMA_FILE, "utf8");
      await this.pool.query(ddl);
      log.info("Database schema ready");
    } catch (err) {
      throw new StorageError(`Failed to initialize database: ${errorMessage(err)}`, { cause: err });
    }
  }

  async saveEvent(envelope: EventEnvelope): Promise<void> {
    await this.db.insert(telemetryEvents).values(eventToRow(envelope)).onConflictDoNothing();
  }

  async upsertSession(session: SessionAggregate): Promise<void> {
    const row = sessionToRow(session);
    const { sessionId: _id, ...update } = row;
    await this.db.insert(sessions).values(row).onConflictDoUpdate({ target: sessions.sessionId, set: update });
  }

  async upsertInteraction(interaction: InteractionAggregate): Promise<void> {
    const row = interactionToRow(interaction);
    const { interactionId: _id, ...update } = row;
    await this.db
      .insert(interactions)
      .values(row)
      .onConflictDoUpdate({ target: interactions.interactionId, set: update });
  }

  async saveUsageRecords(records: UsageRecord[]): Promise<void> {
    if (records.length === 0) return;
    const collectedAt = new Date();
    await this.db.transaction(async (tx) => {
      for (const r of records) {
        const update = {
          requests: r.requests,
          inputTokens: r.inputTokens,
          outputTokens: r.outputTokens,
          totalTokens: r.totalTokens,
          costUsd: r.costUsd,
          organizationId: r.organizationId ?? null,
          sessionId: r.sessionId ?? null,
          raw: r.raw ?? null,
          collectedAt,
        };
        await tx
          .insert(providerUsage)
          .values({ provider: r.provider, date: r.date, model: r.model, ...update })
          .onConflictDoUpdate({ target: [providerUsage.provider, providerUsage.date, providerUsage.model], set: update });
      }
    });
  }

  async listUsageRecords(provider: ProviderName, since: string): Promise<UsageRecord[]> {
    const rows = await this.db
      .select()
      .from(providerUsage)
      .where(and(eq(providerUsage.provider, provider), gte(providerUsage.date, since)))
      .orderBy(asc(providerUsage.date), asc(providerUsage.model));
    return rows.flatMap((row) => rowToUsageRecord(row) ?? []);
  }

  async cleanupOldData(retentionDays: number): Promise<number> {
    const cutoff = retentionCutoff(retentionDays);
    const cutoffDate = cutoff.toISOString().slice(0, 10);

    const events = await this.db.delete(telemetryEvents).where(lt(telemetryEvents.receivedAt, cutoff));
    const ended = await this.db
      .delete(sessions)
      .where(and(isNotNull(sessions.endTime), lt(sessions.endTime, cutoff)))
      .returning({ sessionId: sessions.sessionId });
    const endedIds = ended.map((s) => s.sessionId);
    const orphaned =
      endedIds.length > 0
        ? await this.db.delete(interactions).where(inArray(interactions.sessionId, endedIds))
        : undefined;
    const usage = await this.db.delete(providerUsage).where(lt(providerUsage.date, cutoffDate));

    return (events.rowCount ?? 0) + ended.length + (orphaned?.rowCount ?? 0) + (usage.rowCount ?? 0);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
