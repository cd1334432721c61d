import { getNumber, isAttributeMap } from "../telemetry/attributes.js";
import type { AttributeMap, AttributeValue } from "../telemetry/types.js";

export const LOG_BUFFER_CAP = 100;
export const LOG_BUFFER_KEEP = 50;

export type ToolDecisionCounts = { accepted: number; rejected: number };

export type ToolDecisionTally = {
  total: number;
  accepted: number;
  rejected: number;
  tools_used_list: string[];
  decisions_by_tool: { [tool: string]: ToolDecisionCounts };
};

export type SessionLogEntry = {
  timestamp: string;
  severity: string;
  body: AttributeValue;
  attributes: AttributeMap;
};

export function addToCounter(attrs: AttributeMap, key: string, delta: number): number {
  const next = (getNumber(attrs, key) ?? 0) + delta;
  attrs[key] = next;
  return next;
}

function countAt(map: AttributeMap, key: string): number {
  return getNumber(map, key) ?? 0;
}

/** Reads the tally back out of the bag; anything malformed starts from zero. */
export function readToolDecisions(value: AttributeValue | undefined): ToolDecisionTally {
  const tally: ToolDecisionTally = { total: 0, accepted: 0, rejected: 0, tools_used_list: [], decisions_by_tool: {} };
  if (!isAttributeMap(value)) return tally;

  tally.total = countAt(value, "total");
  tally.accepted = countAt(value, "accepted");
  tally.rejected = countAt(value, "rejected");
  const tools = value.tools_used_list;
  if (Array.isArray(tools)) {
    tally.tools_used_list = tools.filter((t): t is string => typeof t === "string");
  }
  const byTool = value.decisions_by_tool;
  if (isAttributeMap(byTool)) {
    for (const [tool, counts] of Object.entries(byTool)) {
      if (!isAttributeMap(counts)) continue;
      tally.decisions_by_tool[tool] = { accepted: countAt(counts, "accepted"), rejected: countAt(counts, "rejected") };
    }
  }
  return tally;
}

export function readLogEvents(attrs: AttributeMap): AttributeValue[] {
  const value = attrs.log_events;
  return Array.isArray(value) ? value : [];
}

/** Appends to the capped log tail; past the cap only the newest entries survive. */
export function appendLogEvent(attrs: AttributeMap, entry: SessionLogEntry): number {
  let events = readLogEvents(attrs);
  events.push(entry);
  if (events.length > LOG_BUFFER_CAP) {
    events = events.slice(-LOG_BUFFER_KEEP);
  }
  attrs.log_events = events;
  return events.length;
}
