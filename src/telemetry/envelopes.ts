import { randomUUID } from "node:crypto";
import type {
  AttributeMap,
  AttributeValue,
  DataPoint,
  LogEnvelope,
  MetricEnvelope,
  MetricType,
  SpanEnvelope,
} from "./types.js";

// Builders for envelopes that did not come off the wire (demo feed, replays).

interface EnvelopeInit {
  resourceAttributes: AttributeMap;
  timestamp?: Date;
  receivedAt?: Date;
  scope?: string;
}

export interface MetricInit extends EnvelopeInit {
  name: string;
  metricType?: MetricType;
  unit?: string;
  dataPoints: Array<{ value?: number; attributes?: AttributeMap }>;
}

export function metricEnvelope(init: MetricInit): MetricEnvelope {
  const receivedAt = init.receivedAt ?? new Date();
  const timestamp = init.timestamp ?? receivedAt;
  const dataPoints: DataPoint[] = init.dataPoints.map((dp) => ({
    attributes: dp.attributes ?? {},
    value: dp.value,
    time: timestamp,
  }));
  return {
    id: randomUUID(),
    kind: "metric",
    timestamp,
    receivedAt,
    resourceAttributes: init.resourceAttributes,
    scope: init.scope ?? "devpulse",
    payload: {
      name: init.name,
      description: "",
      unit: init.unit ?? "",
      metricType: init.metricType ?? "sum",
      dataPoints,
    },
  };
}

export interface SpanInit extends EnvelopeInit {
  name: string;
  spanId: string;
  traceId?: string;
  durationMs?: number;
  attributes?: AttributeMap;
}

export function spanEnvelope(init: SpanInit): SpanEnvelope {
  const receivedAt = init.receivedAt ?? new Date();
  const timestamp = init.timestamp ?? receivedAt;
  return {
    id: randomUUID(),
    kind: "span",
    timestamp,
    receivedAt,
    resourceAttributes: init.resourceAttributes,
    scope: init.scope ?? "devpulse",
    payload: {
      traceId: init.traceId ?? "",
      spanId: init.spanId,
      name: init.name,
      kind: 1,
      startTime: timestamp,
      endTime: init.durationMs === undefined ? undefined : new Date(timestamp.getTime() + init.durationMs),
      durationMs: init.durationMs,
      attributes: init.attributes ?? {},
      status: { code: 0, message: "" },
    },
  };
}

export interface LogInit extends EnvelopeInit {
  body: AttributeValue;
  severityText?: string;
  attributes?: AttributeMap;
}

export function logEnvelope(init: LogInit): LogEnvelope {
  const receivedAt = init.receivedAt ?? new Date();
  return {
    id: randomUUID(),
    kind: "log",
    timestamp: init.timestamp ?? receivedAt,
    receivedAt,
    resourceAttributes: init.resourceAttributes,
    scope: init.scope ?? "devpulse",
    payload: {
      severityNumber: 9,
      severityText: init.severityText ?? "INFO",
      body: init.body,
      attributes: init.attributes ?? {},
    },
  };
}
