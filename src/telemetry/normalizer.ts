import { randomUUID } from "node:crypto";
import type { ZodType, ZodTypeDef } from "zod";
import { ProcessorError } from "../errors.js";
import { decodeAnyValue, decodeKeyValues, getString, nanosDiffMs, nanosToDate, toNumber } from "./attributes.js";
import {
  ExportLogsRequestSchema,
  ExportMetricsRequestSchema,
  ExportTraceRequestSchema,
  type ExportLogsRequest,
  type ExportMetricsRequest,
  type ExportTraceRequest,
  type OtlpLogRecord,
  type OtlpMetric,
  type OtlpSpan,
} from "./otlp-schema.js";
import type {
  AttributeMap,
  DataPoint,
  LogEnvelope,
  MetricEnvelope,
  MetricPayload,
  SpanEnvelope,
} from "./types.js";

export const SESSION_ID_KEY = "session.id";

function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, signal: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ProcessorError(`Malformed OTLP ${signal} request: ${issues.slice(0, 5).join("; ")}`);
  }
  return result.data;
}

export function parseMetricsRequest(body: unknown): ExportMetricsRequest {
  return parseRequest(ExportMetricsRequestSchema, body, "metrics");
}

export function parseTraceRequest(body: unknown): ExportTraceRequest {
  return parseRequest(ExportTraceRequestSchema, body, "traces");
}

export function parseLogsRequest(body: unknown): ExportLogsRequest {
  return parseRequest(ExportLogsRequestSchema, body, "logs");
}

export function normalizeMetrics(request: ExportMetricsRequest, receivedAt = new Date()): MetricEnvelope[] {
  const envelopes: MetricEnvelope[] = [];
  for (const rm of request.resourceMetrics) {
    const resourceAttrs = decodeKeyValues(rm.resource?.attributes);
    for (const sm of rm.scopeMetrics ?? []) {
      const scope = sm.scope?.name || "unknown";
      for (const metric of sm.metrics ?? []) {
        const payload = toMetricPayload(metric);
        // Each envelope gets its own copy: session.id is lifted per metric.
        const attrs: AttributeMap = { ...resourceAttrs };
        const sessionId = payload.dataPoints[0] ? getString(payload.dataPoints[0].attributes, SESSION_ID_KEY) : undefined;
        if (sessionId) attrs[SESSION_ID_KEY] = sessionId;
        envelopes.push({
          id: randomUUID(),
          kind: "metric",
          timestamp: payload.dataPoints[0]?.time ?? receivedAt,
          receivedAt,
          resourceAttributes: attrs,
          scope,
          payload,
        });
      }
    }
  }
  return envelopes;
}

function toMetricPayload(metric: OtlpMetric): MetricPayload {
  const base = { name: metric.name, description: metric.description ?? "", unit: metric.unit ?? "" };
  const numberPoints = (points: NonNullable<NonNullable<OtlpMetric["sum"]>["dataPoints"]>): DataPoint[] =>
    points.map((dp) => ({
      attributes: decodeKeyValues(dp.attributes),
      value: toNumber(dp.asDouble) ?? toNumber(dp.asInt),
      startTime: nanosToDate(dp.startTimeUnixNano),
      time: nanosToDate(dp.timeUnixNano),
    }));

  if (metric.gauge) {
    return { ...base, metricType: "gauge", dataPoints: numberPoints(metric.gauge.dataPoints ?? []) };
  }
  if (metric.sum) {
    return { ...base, metricType: "sum", dataPoints: numberPoints(metric.sum.dataPoints ?? []) };
  }
  if (metric.histogram) {
    return {
      ...base,
      metricType: "histogram",
      dataPoints: (metric.histogram.dataPoints ?? []).map((dp) => ({
        attributes: decodeKeyValues(dp.attributes),
        startTime: nanosToDate(dp.startTimeUnixNano),
        time: nanosToDate(dp.timeUnixNano),
        count: toNumber(dp.count),
        sum: toNumber(dp.sum),
        bucketCounts: (dp.bucketCounts ?? []).map((c) => toNumber(c) ?? 0),
        explicitBounds: dp.explicitBounds ?? [],
      })),
    };
  }
  return { ...base, metricType: "unknown", dataPoints: [] };
}

export function normalizeTraces(request: ExportTraceRequest, receivedAt = new Date()): SpanEnvelope[] {
  const envelopes: SpanEnvelope[] = [];
  for (const rs of request.resourceSpans) {
    const resourceAttrs = decodeKeyValues(rs.resource?.attributes);
    for (const ss of rs.scopeSpans ?? []) {
      const scope = ss.scope?.name || "unknown";
      for (const span of ss.spans ?? []) {
        envelopes.push(toSpanEnvelope(span, resourceAttrs, scope, receivedAt));
      }
    }
  }
  return envelopes;
}

function toSpanEnvelope(span: OtlpSpan, resourceAttrs: AttributeMap, scope: string, receivedAt: Date): SpanEnvelope {
  const startTime = nanosToDate(span.startTimeUnixNano);
  return {
    id: randomUUID(),
    kind: "span",
    timestamp: startTime ?? receivedAt,
    receivedAt,
    resourceAttributes: { ...resourceAttrs },
    scope,
    payload: {
      traceId: (span.traceId ?? "").toLowerCase(),
      spanId: (span.spanId ?? "").toLowerCase(),
      parentSpanId: span.parentSpanId ? span.parentSpanId.toLowerCase() : undefined,
      name: span.name,
      kind: span.kind ?? 0,
      startTime,
      endTime: nanosToDate(span.endTimeUnixNano),
      durationMs: nanosDiffMs(span.startTimeUnixNano, span.endTimeUnixNano),
      attributes: decodeKeyValues(span.attributes),
      status: { code: span.status?.code ?? 0, message: span.status?.message ?? "" },
    },
  };
}

export function normalizeLogs(request: ExportLogsRequest, receivedAt = new Date()): LogEnvelope[] {
  const envelopes: LogEnvelope[] = [];
  for (const rl of request.resourceLogs) {
    const resourceAttrs = decodeKeyValues(rl.resource?.attributes);
    for (const sl of rl.scopeLogs ?? []) {
      const scope = sl.scope?.name || "unknown";
      for (const record of sl.logRecords ?? []) {
        envelopes.push(toLogEnvelope(record, resourceAttrs, scope, receivedAt));
      }
    }
  }
  return envelopes;
}

function toLogEnvelope(record: OtlpLogRecord, resourceAttrs: AttributeMap, scope: string, receivedAt: Date): LogEnvelope {
  const attributes = decodeKeyValues(record.attributes);
  const attrs: AttributeMap = { ...resourceAttrs };
  const sessionId = getString(attributes, SESSION_ID_KEY);
  if (sessionId) attrs[SESSION_ID_KEY] = sessionId;
  const time = nanosToDate(record.timeUnixNano);
  const observedTime = nanosToDate(record.observedTimeUnixNano);
  return {
    id: randomUUID(),
    kind: "log",
    timestamp: time ?? observedTime ?? receivedAt,
    receivedAt,
    resourceAttributes: attrs,
    scope,
    payload: {
      severityNumber: record.severityNumber ?? 0,
      severityText: record.severityText ?? "",
      body: decodeAnyValue(record.body),
      attributes,
      observedTime,
      traceId: record.traceId ? record.traceId.toLowerCase() : undefined,
      spanId: record.spanId ? record.spanId.toLowerCase() : undefined,
    },
  };
}
