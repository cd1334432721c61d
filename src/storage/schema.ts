import { date, doublePrecision, index, integer, jsonb, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";
import type { AttributeMap, EventEnvelope } from "../telemetry/types.js";

// Mirrors sql/schema.sql, which creates these tables on init().

export const telemetryEvents = pgTable(
  "telemetry_events",
  {
    id: text("id").primaryKey(),
    kind: text("kind").notNull(),
    name: text("name"),
    sessionId: text("session_id"),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    receivedAt: timestamp("received_at", { withTimezone: true }).notNull(),
    scope: text("scope").notNull(),
    resourceAttributes: jsonb("resource_attributes").$type<AttributeMap>().notNull(),
    // Dates inside the payload come back as ISO strings.
    payload: jsonb("payload").$type<EventEnvelope["payload"]>().notNull(),
  },
  (t) => ({
    sessionIdx: index("telemetry_events_session_idx").on(t.sessionId),
    receivedIdx: index("telemetry_events_received_idx").on(t.receivedAt),
  }),
);

export const sessions = pgTable("sessions", {
  sessionId: text("session_id").primaryKey(),
  startTime: timestamp("start_time", { withTimezone: true }).notNull(),
  endTime: timestamp("end_time", { withTimezone: true }),
  totalDurationMs: doublePrecision("total_duration_ms"),
  totalInteractions: integer("total_interactions").notNull(),
  totalTokens: integer("total_tokens").notNull(),
  totalRequestTokens: integer("total_request_tokens").notNull(),
  totalResponseTokens: integer("total_response_tokens").notNull(),
  projectPath: text("project_path"),
  userId: text("user_id"),
  serviceVersion: text("service_version").notNull(),
  attributes: jsonb("attributes").$type<AttributeMap>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

export const interactions = pgTable(
  "interactions",
  {
    interactionId: text("interaction_id").primaryKey(),
    sessionId: text("session_id").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    requestTokens: integer("request_tokens").notNull(),
    responseTokens: integer("response_tokens").notNull(),
    totalTokens: integer("total_tokens").notNull(),
    modelName: text("model_name"),
    responseTimeMs: doublePrecision("response_time_ms"),
    attributes: jsonb("attributes").$type<AttributeMap>().notNull(),
  },
  (t) => ({
    sessionIdx: index("interactions_session_idx").on(t.sessionId),
  }),
);

export const providerUsage = pgTable(
  "provider_usage",
  {
    provider: text("provider").notNull(),
    date: date("date", { mode: "string" }).notNull(),
    model: text("model").notNull(),
    requests: integer("requests").notNull(),
    inputTokens: integer("input_tokens").notNull(),
    outputTokens: integer("output_tokens").notNull(),
    totalTokens: integer("total_tokens").notNull(),
    costUsd: doublePrecision("cost_usd").notNull(),
    organizationId: text("organization_id"),
    sessionId: text("session_id"),
    raw: jsonb("raw").$type<AttributeMap>(),
    collectedAt: timestamp("collected_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.provider, t.date, t.model] }),
  }),
);

export type TelemetryEventRow = typeof telemetryEvents.$inferInsert;
export type SessionRow = typeof sessions.$inferInsert;
export type InteractionRow = typeof interactions.$inferInsert;
export type ProviderUsageRow = typeof providerUsage.$inferSelect;
