import { describe, expect, it } from "vitest";
import { ProcessorError } from "../errors.js";
import {
  normalizeLogs,
  normalizeMetrics,
  normalizeTraces,
  parseLogsRequest,
  parseMetricsRequest,
  parseTraceRequest,
} from "./normalizer.js";

const RECEIVED = new Date("2025-02-01T00:00:00.000Z");
const resource = {
  attributes: [
    { key: "service.name", value: { stringValue: "claude-code" } },
    { key: "service.version", value: { stringValue: "1.0.0" } },
  ],
};

describe("normalizeMetrics", () => {
  it("builds one envelope per metric and lifts the session id from the first datapoint", () => {
    const request = parseMetricsRequest({
      resourceMetrics: [
        {
          resource,
          scopeMetrics: [
            {
              scope: { name: "com.anthropic.claude_code" },
              metrics: [
                {
                  name: "claude_code.token.usage",
                  unit: "tokens",
                  sum: {
                    dataPoints: [
                      {
                        timeUnixNano: "1735689600000000000",
                        asInt: "150",
                        attributes: [
                          { key: "session.id", value: { stringValue: "S1" } },
                          { key: "type", value: { stringValue: "input" } },
                        ],
                      },
                    ],
                  },
                },
                { name: "claude_code.cost.usage", gauge: { dataPoints: [{ asDouble: 0.02 }] } },
              ],
            },
          ],
        },
      ],
    });

    const [tokens, cost] = normalizeMetrics(request, RECEIVED);
    expect(tokens?.kind).toBe("metric");
    expect(tokens?.scope).toBe("com.anthropic.claude_code");
    expect(tokens?.timestamp).toEqual(new Date("2025-01-01T00:00:00.000Z"));
    expect(tokens?.resourceAttributes).toEqual({
      "service.name": "claude-code",
      "service.version": "1.0.0",
      "session.id": "S1",
    });
    expect(tokens?.payload).toMatchObject({ name: "claude_code.token.usage", unit: "tokens", metricType: "sum" });
    expect(tokens?.payload.dataPoints[0]?.value).toBe(150);

    // The lifted id stays on the envelope it came from.
    expect(cost?.resourceAttributes["session.id"]).toBeUndefined();
    expect(cost?.timestamp).toEqual(RECEIVED);
    expect(cost?.payload.metricType).toBe("gauge");
    expect(cost?.payload.dataPoints[0]?.value).toBe(0.02);
  });

  it("keeps a datapoint without a value", () => {
    const request = parseMetricsRequest({
      resourceMetrics: [{ scopeMetrics: [{ metrics: [{ name: "m", sum: { dataPoints: [{}] } }] }] }],
    });
    const [envelope] = normalizeMetrics(request, RECEIVED);
    expect(envelope?.scope).toBe("unknown");
    expect(envelope?.payload.dataPoints[0]?.value).toBeUndefined();
  });

  it("rejects a request of the wrong shape", () => {
    expect(() => parseMetricsRequest({ resourceMetrics: "nope" })).toThrow(ProcessorError);
    expect(() => parseMetricsRequest({ resourceMetrics: "nope" })).toThrow(
      "Malformed OTLP metrics request: resourceMetrics: Expected array, received string",
    );
  });
});

describe("normalizeTraces", () => {
  it("computes the span duration and lowercases ids", () => {
    const request = parseTraceRequest({
      resourceSpans: [
        {
          resource: { attributes: [{ key: "session.id", value: { stringValue: "S1" } }] },
          scopeSpans: [
            {
              spans: [
                {
                  traceId: "ABCDEF",
                  spanId: "0A1B",
                  name: "claude.request",
                  startTimeUnixNano: "1735689600000000000",
                  endTimeUnixNano: "1735689601500000000",
                  attributes: [{ key: "model.name", value: { stringValue: "claude-x" } }],
                },
              ],
            },
          ],
        },
      ],
    });
    const [span] = normalizeTraces(request, RECEIVED);
    expect(span?.timestamp).toEqual(new Date("2025-01-01T00:00:00.000Z"));
    expect(span?.payload.spanId).toBe("0a1b");
    expect(span?.payload.traceId).toBe("abcdef");
    expect(span?.payload.durationMs).toBe(1500);
    expect(span?.payload.attributes).toEqual({ "model.name": "claude-x" });
  });
});

describe("normalizeLogs", () => {
  it("lifts the record's session id into the resource attributes", () => {
    const request = parseLogsRequest({
      resourceLogs: [
        {
          resource,
          scopeLogs: [
            {
              logRecords: [
                {
                  observedTimeUnixNano: "1735689602000000000",
                  severityText: "WARN",
                  body: { stringValue: "tool failed" },
                  attributes: [{ key: "session.id", value: { stringValue: "S7" } }],
                },
              ],
            },
          ],
        },
      ],
    });
    const [entry] = normalizeLogs(request, RECEIVED);
    expect(entry?.resourceAttributes["session.id"]).toBe("S7");
    expect(entry?.timestamp).toEqual(new Date("2025-01-01T00:00:02.000Z"));
    expect(entry?.payload.body).toBe("tool failed");
    expect(entry?.payload.severityText).toBe("WARN");
  });

  it("accepts an empty request", () => {
    expect(normalizeLogs(parseLogsRequest({}), RECEIVED)).toEqual([]);
  });
});
