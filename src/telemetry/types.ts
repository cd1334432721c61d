/** Decoded attribute value: a closed, recursive variant. */
export type AttributeValue = string | number | boolean | null | AttributeValue[] | AttributeMap;

export interface AttributeMap {
  [key: string]: AttributeValue;
}

export type EnvelopeKind = "metric" | "span" | "log";

export type MetricType = "gauge" | "sum" | "histogram" | "unknown";

export interface DataPoint {
  attributes: AttributeMap;
  /** Absent when the datapoint carried neither asInt nor asDouble. */
  value?: number;
  startTime?: Date;
  time?: Date;
  count?: number;
  sum?: number;
  bucketCounts?: number[];
  explicitBounds?: number[];
}

export interface MetricPayload {
  name: string;
  description: string;
  unit: string;
  metricType: MetricType;
  dataPoints: DataPoint[];
}

export interface SpanPayload {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTime?: Date;
  endTime?: Date;
  durationMs?: number;
  attributes: AttributeMap;
  status: { code: number; message: string };
}

export interface LogPayload {
  severityNumber: number;
  severityText: string;
  body: AttributeValue;
  attributes: AttributeMap;
  observedTime?: Date;
  traceId?: string;
  spanId?: string;
}

interface EnvelopeBase {
  id: string;
  /** Source timestamp carried by the signal, or the receive time when it has none. */
  timestamp: Date;
  receivedAt: Date;
  resourceAttributes: AttributeMap;
  scope: string;
}

export interface MetricEnvelope extends EnvelopeBase {
  kind: "metric";
  payload: MetricPayload;
}

export interface SpanEnvelope extends EnvelopeBase {
  kind: "span";
  payload: SpanPayload;
}

export interface LogEnvelope extends EnvelopeBase {
  kind: "log";
  payload: LogPayload;
}

export type EventEnvelope = MetricEnvelope | SpanEnvelope | LogEnvelope;
