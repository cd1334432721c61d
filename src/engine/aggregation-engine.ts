import { errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { NullSink, type StorageSink } from "../storage/sink.js";
import { getString } from "../telemetry/attributes.js";
import type {
  AttributeMap,
  EventEnvelope,
  LogEnvelope,
  MetricEnvelope,
  SpanEnvelope,
} from "../telemetry/types.js";
import { METRIC_HANDLERS, type HandlerOutcome, type MetricContext } from "./metric-handlers.js";
import {
  createInteraction,
  markEnded,
  recomputeTotals,
  type InteractionAggregate,
  type SessionAggregate,
} from "./models.js";
import { appendLogEvent } from "./session-attributes.js";

const log = createLogger("aggregation-engine");

export const SESSION_ID_KEYS = ["session.id"] as const;
/** Spans are seen with either naming. */
export const SPAN_SESSION_ID_KEYS = ["session.id", "claude.session_id"] as const;
export const AI_SPAN_MARKERS = ["ai_interaction", "claude"] as const;

export const DEFAULT_MAX_EVENT_HISTORY = 1000;

export interface IngestResult {
  envelopeId: string;
  kind: EventEnvelope["kind"];
  sessionId?: string;
  outcome: HandlerOutcome;
}

export type EngineChange =
  | { type: "session:created"; session: SessionAggregate }
  | { type: "session:updated"; session: SessionAggregate }
  | { type: "session:ended"; session: SessionAggregate };

export type EngineListener = (change: EngineChange) => void;

export interface AggregationEngineOptions {
  sink?: StorageSink;
  /** Raw envelopes kept for display; older ones are dropped. */
  maxEventHistory?: number;
  clock?: () => Date;
}

/** Tracks what one ingest call touched so notifications go out once, after the mutation. */
interface Mutation {
  session?: SessionAggregate;
  created: boolean;
  changed: boolean;
  interactions: Set<InteractionAggregate>;
}

export function resolveSessionId(attrs: AttributeMap, keys: readonly string[] = SESSION_ID_KEYS): string | undefined {
  for (const key of keys) {
    const id = getString(attrs, key);
    if (id) return id;
  }
  return undefined;
}

export function isAiInteractionSpan(name: string): boolean {
  const lower = name.toLowerCase();
  return AI_SPAN_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Rebuilds sessions and interactions from a stream of telemetry envelopes.
 *
 * `ingest` is synchronous and runs to completion on the event loop, so one
 * call never observes another's half-applied mutation. Storage and
 * listeners are notified after the tables are consistent and are never
 * awaited.
 */
export class AggregationEngine {
  private readonly sessions = new Map<string, SessionAggregate>();
  private readonly interactions = new Map<string, InteractionAggregate>();
  private history: EventEnvelope[] = [];
  private eventCount = 0;
  private readonly listeners = new Set<EngineListener>();
  private readonly sink: StorageSink;
  private readonly maxEventHistory: number;
  private readonly clock: () => Date;

  constructor(options: AggregationEngineOptions = {}) {
    this.sink = options.sink ?? new NullSink();
    this.maxEventHistory = Math.max(0, options.maxEventHistory ?? DEFAULT_MAX_EVENT_HISTORY);
    this.clock = options.clock ?? (() => new Date());
  }

  ingest(envelope: EventEnvelope): IngestResult {
    this.record(envelope);
    const mutation: Mutation = { created: false, changed: false, interactions: new Set() };

    let outcome: HandlerOutcome;
    try {
      outcome = this.dispatch(envelope, mutation);
    } catch (err) {
      // Aggregates stay as far as the handler got; the envelope contributes nothing more.
      outcome = { status: "degraded", reason: `handler fault: ${errorMessage(err)}` };
      log.warn(`Handler fault on ${envelope.kind} envelope ${envelope.id}: ${errorMessage(err)}`);
    }

    if (outcome.status !== "applied") {
      log.debug(`${envelope.kind} envelope ${envelope.id} ${outcome.status}: ${outcome.reason}`);
    }

    this.publish(mutation);
    return {
      envelopeId: envelope.id,
      kind: envelope.kind,
      sessionId: mutation.session?.sessionId,
      outcome,
    };
  }

  ingestAll(envelopes: Iterable<EventEnvelope>): IngestResult[] {
    const results: IngestResult[] = [];
    for (const envelope of envelopes) results.push(this.ingest(envelope));
    return results;
  }

  /** Sets the end time once; later calls leave it untouched. */
  endSession(sessionId: string, endTime: Date = this.clock()): SessionAggregate | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (markEnded(session, endTime)) {
      log.info(`Session ${sessionId} ended after ${Math.round((session.totalDurationMs ?? 0) / 1000)}s`);
      this.sink.store({ kind: "session", session });
      this.emit({ type: "session:ended", session });
    }
    return session;
  }

  getSession(sessionId: string): SessionAggregate | undefined {
    return this.sessions.get(sessionId);
  }

  getSessions(): SessionAggregate[] {
    return [...this.sessions.values()];
  }

  getInteraction(interactionId: string): InteractionAggregate | undefined {
    return this.interactions.get(interactionId);
  }

  /** Retained raw envelopes, oldest first. */
  getEventHistory(): readonly EventEnvelope[] {
    return this.history;
  }

  /** Every envelope ever ingested, including the ones dropped from history. */
  get totalEvents(): number {
    return this.eventCount;
  }

  onChange(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  clear(): void {
    this.sessions.clear();
    this.interactions.clear();
    this.history = [];
    this.eventCount = 0;
    log.info("Engine state cleared");
  }

  private record(envelope: EventEnvelope): void {
    this.eventCount++;
    if (this.maxEventHistory > 0) {
      this.history.push(envelope);
      if (this.history.length > this.maxEventHistory) {
        this.history.splice(0, this.history.length - this.maxEventHistory);
      }
    }
    this.sink.store({ kind: "event", envelope });
  }

  private dispatch(envelope: EventEnvelope, mutation: Mutation): HandlerOutcome {
    switch (envelope.kind) {
      case "metric":
        return this.handleMetric(envelope, mutation);
      case "span":
        return this.handleSpan(envelope, mutation);
      case "log":
        return this.handleLog(envelope, mutation);
    }
  }

  private handleMetric(envelope: MetricEnvelope, mutation: Mutation): HandlerOutcome {
    const sessionId = resolveSessionId(envelope.resourceAttributes);
    if (!sessionId) {
      return { status: "skipped", reason: `metric ${envelope.payload.name || "<unnamed>"} has no session id` };
    }
    const session = this.ensureSession(sessionId, envelope.resourceAttributes, mutation);

    const handler = METRIC_HANDLERS.get(envelope.payload.name);
    if (!handler) {
      log.debug(`Unhandled metric ${envelope.payload.name || "<unnamed>"} for session ${sessionId}`);
      return { status: "skipped", reason: `unhandled metric ${envelope.payload.name || "<unnamed>"}` };
    }

    const ctx: MetricContext = {
      session,
      envelope,
      resolveInteraction: (id, create) => this.resolveInteraction(session, id, create, mutation),
    };
    mutation.changed = true;
    const outcome = handler(ctx);
    recomputeTotals(session);
    return outcome;
  }

  private handleSpan(envelope: SpanEnvelope, mutation: Mutation): HandlerOutcome {
    const sessionId = resolveSessionId(envelope.resourceAttributes, SPAN_SESSION_ID_KEYS);
    if (!sessionId) {
      return { status: "skipped", reason: `span ${envelope.payload.name} has no session id` };
    }
    const session = this.ensureSession(sessionId, envelope.resourceAttributes, mutation);

    const span = envelope.payload;
    if (!isAiInteractionSpan(span.name)) {
      return { status: "skipped", reason: `span ${span.name} is not an AI interaction` };
    }

    const id = span.spanId || `${sessionId}_${Math.floor(envelope.timestamp.getTime() / 1000)}`;
    const owner = this.interactions.get(id)?.sessionId;
    if (owner !== undefined && owner !== sessionId) {
      return { status: "degraded", reason: `span ${id} already belongs to session ${owner}` };
    }
    const resolved = this.resolveInteraction(
      session,
      id,
      () => createInteraction(id, sessionId, envelope.timestamp, { attributes: { ...span.attributes } }),
      mutation,
    );
    if (!resolved) return { status: "skipped", reason: `span ${id} could not be linked` };
    const { interaction } = resolved;
    // Last processed wins for both fields.
    if (span.durationMs !== undefined) interaction.responseTimeMs = span.durationMs;
    const model = getString(span.attributes, "model.name") ?? getString(span.attributes, "model");
    if (model) interaction.modelName = model;

    mutation.changed = true;
    mutation.interactions.add(interaction);
    recomputeTotals(session);
    return span.durationMs === undefined
      ? { status: "degraded", reason: `span ${id} has no usable duration` }
      : { status: "applied" };
  }

  private handleLog(envelope: LogEnvelope, mutation: Mutation): HandlerOutcome {
    const sessionId = resolveSessionId(envelope.resourceAttributes);
    if (!sessionId) {
      // Never creates a session; nothing to attach to.
      return { status: "skipped", reason: "log has no session id" };
    }
    const session = this.ensureSession(sessionId, envelope.resourceAttributes, mutation);
    const { severityText, body, attributes } = envelope.payload;
    appendLogEvent(session.attributes, {
      timestamp: envelope.timestamp.toISOString(),
      severity: severityText || "INFO",
      body,
      attributes,
    });
    mutation.changed = true;
    return { status: "applied" };
  }

  private ensureSession(sessionId: string, resourceAttrs: AttributeMap, mutation: Mutation): SessionAggregate {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        sessionId,
        // Processing time: emitted timestamps are not trusted for session start.
        startTime: this.clock(),
        totalInteractions: 0,
        totalTokens: 0,
        totalRequestTokens: 0,
        totalResponseTokens: 0,
        projectPath: getString(resourceAttrs, "project.path"),
        userId: getString(resourceAttrs, "user.id"),
        serviceVersion: getString(resourceAttrs, "service.version") ?? "unknown",
        interactions: [],
        attributes: { ...identityAttributes(resourceAttrs), ...resourceAttrs },
      };
      this.sessions.set(sessionId, session);
      mutation.created = true;
      log.info(`New session ${sessionId}`);
    }
    mutation.session = session;
    return session;
  }

  private resolveInteraction(
    session: SessionAggregate,
    interactionId: string,
    create: () => InteractionAggregate,
    mutation: Mutation,
  ): { interaction: InteractionAggregate; created: boolean } | undefined {
    let interaction = this.interactions.get(interactionId);
    if (interaction && interaction.sessionId !== session.sessionId) {
      log.warn(`Interaction ${interactionId} belongs to session ${interaction.sessionId}, not ${session.sessionId}`);
      return undefined;
    }
    let created = false;
    if (!interaction) {
      interaction = create();
      this.interactions.set(interactionId, interaction);
      created = true;
    }
    if (!session.interactions.includes(interaction)) {
      session.interactions.push(interaction);
    }
    mutation.interactions.add(interaction);
    return { interaction, created };
  }

  private publish(mutation: Mutation): void {
    const { session } = mutation;
    if (!session || (!mutation.created && !mutation.changed)) return;
    for (const interaction of mutation.interactions) {
      this.sink.store({ kind: "interaction", interaction });
    }
    this.sink.store({ kind: "session", session });
    this.emit({ type: mutation.created ? "session:created" : "session:updated", session });
  }

  private emit(change: EngineChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        log.warn(`Change listener failed: ${errorMessage(err)}`);
      }
    }
  }
}

function identityAttributes(attrs: AttributeMap): AttributeMap {
  const identity: AttributeMap = {};
  const pairs: Array<[string, string]> = [
    ["service_name", "service.name"],
    ["user_email", "user.email"],
    ["organization_id", "organization.id"],
    ["user_account_uuid", "user.account_uuid"],
  ];
  for (const [target, source] of pairs) {
    const value = attrs[source];
    if (value !== undefined) identity[target] = value;
  }
  return identity;
}
