import type { AttributeMap } from "../telemetry/types.js";

export const PROVIDER_NAMES = ["openai", "anthropic"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** One provider's usage for one model on one UTC day. */
export interface UsageRecord {
  provider: ProviderName;
  /** YYYY-MM-DD */
  date: string;
  model: string;
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  organizationId?: string;
  /** Local session this usage was reconciled against, if any. */
  sessionId?: string;
  raw?: AttributeMap;
}

export interface ModelUsage {
  cost: number;
  tokens: number;
  requests: number;
}

export interface ProviderUsageSummary {
  provider: ProviderName;
  periodDays: number;
  totalCost: number;
  totalTokens: number;
  totalRequests: number;
  byModel: Record<string, ModelUsage>;
  dailyBreakdown: Array<ModelUsage & { date: string }>;
}

export interface ProviderHealth {
  provider: ProviderName;
  status: "healthy" | "unhealthy";
  enabled: boolean;
  running: boolean;
  lastCollectedAt?: string;
  error?: string;
}

export interface UsageProvider {
  readonly name: ProviderName;
  readonly enabled: boolean;
  initialize(): Promise<void>;
  /** Fetches usage for the last `daysBack` days (today included). */
  fetchUsage(daysBack: number): Promise<UsageRecord[]>;
}
