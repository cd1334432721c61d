import type { OtlpAnyValue, OtlpKeyValue, OtlpNumberLike } from "./otlp-schema.js";
import type { AttributeMap, AttributeValue } from "./types.js";

/** Convert an OTLP AnyValue into a plain value. Unset values decode to null. */
export function decodeAnyValue(value: OtlpAnyValue | undefined): AttributeValue {
  if (!value) return null;
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.boolValue !== undefined) return value.boolValue;
  if (value.intValue !== undefined) return toNumber(value.intValue) ?? null;
  if (value.doubleValue !== undefined) return toNumber(value.doubleValue) ?? null;
  if (value.arrayValue !== undefined) {
    return (value.arrayValue.values ?? []).map(decodeAnyValue);
  }
  if (value.kvlistValue !== undefined) {
    return decodeKeyValues(value.kvlistValue.values);
  }
  if (value.bytesValue !== undefined) {
    return Buffer.from(value.bytesValue, "base64").toString("hex");
  }
  return null;
}

/** Keys whose value is unset are left out, matching how exporters omit them. */
export function decodeKeyValues(list: OtlpKeyValue[] | undefined): AttributeMap {
  const attrs: AttributeMap = {};
  for (const kv of list ?? []) {
    const decoded = decodeAnyValue(kv.value);
    if (decoded !== null) attrs[kv.key] = decoded;
  }
  return attrs;
}

export function toNumber(value: OtlpNumberLike | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isNaN(n) ? undefined : n;
}

/** Nanoseconds since epoch (decimal string or number) to a Date; 0 means unset. */
export function nanosToDate(value: OtlpNumberLike | undefined): Date | undefined {
  if (value === undefined) return undefined;
  let millis: number;
  if (typeof value === "number") {
    millis = value / 1_000_000;
  } else {
    if (!/^\d+$/.test(value)) return undefined;
    millis = Number(BigInt(value) / 1_000_000n);
  }
  if (millis <= 0 || !Number.isFinite(millis)) return undefined;
  return new Date(millis);
}

/** Difference of two nanosecond timestamps in (fractional) milliseconds. */
export function nanosDiffMs(start: OtlpNumberLike | undefined, end: OtlpNumberLike | undefined): number | undefined {
  if (start === undefined || end === undefined) return undefined;
  const s = toBigInt(start);
  const e = toBigInt(end);
  if (s === undefined || e === undefined || s === 0n || e < s) return undefined;
  return Number(e - s) / 1_000_000;
}

function toBigInt(value: OtlpNumberLike): bigint | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? BigInt(Math.trunc(value)) : undefined;
  }
  return /^\d+$/.test(value) ? BigInt(value) : undefined;
}

export function getString(attrs: AttributeMap, key: string): string | undefined {
  const v = attrs[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return undefined;
}

export function getNumber(attrs: AttributeMap, key: string): number | undefined {
  const v = attrs[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function isAttributeMap(value: AttributeValue | undefined): value is AttributeMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
