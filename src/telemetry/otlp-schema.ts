import { z } from "zod";

// OTLP/HTTP JSON encoding. 64-bit integers arrive as decimal strings,
// trace and span ids as hex strings.

export interface OtlpAnyValue {
  stringValue?: string;
  boolValue?: boolean;
  intValue?: string | number;
  doubleValue?: string | number;
  arrayValue?: { values?: OtlpAnyValue[] };
  kvlistValue?: { values?: OtlpKeyValue[] };
  bytesValue?: string;
}

export interface OtlpKeyValue {
  key: string;
  value?: OtlpAnyValue;
}

const NumberLike = z.union([z.number(), z.string()]);

export const AnyValueSchema: z.ZodType<OtlpAnyValue> = z.lazy(() =>
  z.object({
    stringValue: z.string().optional(),
    boolValue: z.boolean().optional(),
    intValue: NumberLike.optional(),
    doubleValue: NumberLike.optional(),
    arrayValue: z.object({ values: z.array(AnyValueSchema).optional() }).optional(),
    kvlistValue: z.object({ values: z.array(KeyValueSchema).optional() }).optional(),
    bytesValue: z.string().optional(),
  }),
);

export const KeyValueSchema: z.ZodType<OtlpKeyValue> = z.lazy(() =>
  z.object({
    key: z.string(),
    value: AnyValueSchema.optional(),
  }),
);

const Attributes = z.array(KeyValueSchema).optional();

const ResourceSchema = z.object({ attributes: Attributes }).optional();

const ScopeSchema = z.object({ name: z.string().optional(), version: z.string().optional() }).optional();

const NumberDataPointSchema = z.object({
  attributes: Attributes,
  startTimeUnixNano: NumberLike.optional(),
  timeUnixNano: NumberLike.optional(),
  asInt: NumberLike.optional(),
  asDouble: NumberLike.optional(),
});

const HistogramDataPointSchema = z.object({
  attributes: Attributes,
  startTimeUnixNano: NumberLike.optional(),
  timeUnixNano: NumberLike.optional(),
  count: NumberLike.optional(),
  sum: NumberLike.optional(),
  bucketCounts: z.array(NumberLike).optional(),
  explicitBounds: z.array(z.number()).optional(),
});

const MetricSchema = z.object({
  name: z.string().default(""),
  description: z.string().optional(),
  unit: z.string().optional(),
  gauge: z.object({ dataPoints: z.array(NumberDataPointSchema).optional() }).optional(),
  sum: z
    .object({
      dataPoints: z.array(NumberDataPointSchema).optional(),
      aggregationTemporality: z.number().optional(),
      isMonotonic: z.boolean().optional(),
    })
    .optional(),
  histogram: z.object({ dataPoints: z.array(HistogramDataPointSchema).optional() }).optional(),
});

export const ExportMetricsRequestSchema = z.object({
  resourceMetrics: z
    .array(
      z.object({
        resource: ResourceSchema,
        scopeMetrics: z
          .array(z.object({ scope: ScopeSchema, metrics: z.array(MetricSchema).optional() }))
          .optional(),
      }),
    )
    .default([]),
});

const SpanSchema = z.object({
  traceId: z.string().optional(),
  spanId: z.string().optional(),
  parentSpanId: z.string().optional(),
  name: z.string().default(""),
  kind: z.number().optional(),
  startTimeUnixNano: NumberLike.optional(),
  endTimeUnixNano: NumberLike.optional(),
  attributes: Attributes,
  status: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

export const ExportTraceRequestSchema = z.object({
  resourceSpans: z
    .array(
      z.object({
        resource: ResourceSchema,
        scopeSpans: z.array(z.object({ scope: ScopeSchema, spans: z.array(SpanSchema).optional() })).optional(),
      }),
    )
    .default([]),
});

const LogRecordSchema = z.object({
  timeUnixNano: NumberLike.optional(),
  observedTimeUnixNano: NumberLike.optional(),
  severityNumber: z.number().optional(),
  severityText: z.string().optional(),
  body: AnyValueSchema.optional(),
  attributes: Attributes,
  traceId: z.string().optional(),
  spanId: z.string().optional(),
  flags: z.number().optional(),
});

export const ExportLogsRequestSchema = z.object({
  resourceLogs: z
    .array(
      z.object({
        resource: ResourceSchema,
        scopeLogs: z.array(z.object({ scope: ScopeSchema, logRecords: z.array(LogRecordSchema).optional() })).optional(),
      }),
    )
    .default([]),
});

export type ExportMetricsRequest = z.infer<typeof ExportMetricsRequestSchema>;
export type ExportTraceRequest = z.infer<typeof ExportTraceRequestSchema>;
export type ExportLogsRequest = z.infer<typeof ExportLogsRequestSchema>;
export type OtlpMetric = z.infer<typeof MetricSchema>;
export type OtlpSpan = z.infer<typeof SpanSchema>;
export type OtlpLogRecord = z.infer<typeof LogRecordSchema>;
export type OtlpNumberLike = z.infer<typeof NumberLike>;
