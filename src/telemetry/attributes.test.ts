import { describe, expect, it } from "vitest";
import { decodeAnyValue, decodeKeyValues, getString, nanosDiffMs, nanosToDate } from "./attributes.js";

describe("decodeAnyValue", () => {
  it("decodes scalars, with 64-bit ints sent as strings", () => {
    expect(decodeAnyValue({ stringValue: "x" })).toBe("x");
    expect(decodeAnyValue({ boolValue: false })).toBe(false);
    expect(decodeAnyValue({ intValue: "42" })).toBe(42);
    expect(decodeAnyValue({ doubleValue: 0.5 })).toBe(0.5);
    expect(decodeAnyValue({})).toBeNull();
    expect(decodeAnyValue(undefined)).toBeNull();
  });

  it("decodes nested arrays and key-value lists", () => {
    expect(
      decodeAnyValue({
        kvlistValue: {
          values: [
            { key: "tags", value: { arrayValue: { values: [{ stringValue: "a" }, { intValue: 2 }] } } },
            { key: "empty", value: {} },
          ],
        },
      }),
    ).toEqual({ tags: ["a", 2] });
  });

  it("renders bytes as hex", () => {
    expect(decodeAnyValue({ bytesValue: Buffer.from([0xde, 0xad]).toString("base64") })).toBe("dead");
  });
});

describe("decodeKeyValues", () => {
  it("omits keys without a value", () => {
    expect(decodeKeyValues([{ key: "a", value: { stringValue: "1" } }, { key: "b" }])).toEqual({ a: "1" });
    expect(decodeKeyValues(undefined)).toEqual({});
  });
});

describe("time helpers", () => {
  it("converts nanosecond timestamps", () => {
    expect(nanosToDate("1735689600123000000")).toEqual(new Date("2025-01-01T00:00:00.123Z"));
    expect(nanosToDate("0")).toBeUndefined();
    expect(nanosToDate("not-a-number")).toBeUndefined();
  });

  it("computes durations in milliseconds", () => {
    expect(nanosDiffMs("1000000000", "1250500000")).toBe(250.5);
    expect(nanosDiffMs("2000", "1000")).toBeUndefined();
    expect(nanosDiffMs(undefined, "1000")).toBeUndefined();
  });
});

describe("getString", () => {
  it("stringifies numbers and booleans", () => {
    expect(getString({ a: 7, b: true, c: ["x"] }, "a")).toBe("7");
    expect(getString({ a: 7, b: true, c: ["x"] }, "b")).toBe("true");
    expect(getString({ a: 7, b: true, c: ["x"] }, "c")).toBeUndefined();
  });
});
