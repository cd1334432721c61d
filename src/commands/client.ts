import { z, type ZodType, type ZodTypeDef } from "zod";
import type { SessionSummary } from "../engine/models.js";
import { PROVIDER_NAMES } from "../providers/types.js";

export const DEFAULT_API_URL = "http://localhost:8000";

export class ApiClientError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ApiClientError";
  }
}

export const HealthSchema = z.object({
  status: z.string(),
  sessions: z.number(),
  activeSessions: z.number(),
  wsClients: z.number(),
});

const InteractionSchema = z.object({
  interactionId: z.string(),
  timestamp: z.coerce.date(),
  requestTokens: z.number(),
  responseTokens: z.number(),
  totalTokens: z.number(),
  modelName: z.string().optional(),
  responseTimeMs: z.number().optional(),
});

const SessionSchema = z.object({
  sessionId: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date().optional(),
  totalDurationMs: z.number().optional(),
  totalInteractions: z.number(),
  totalTokens: z.number(),
  projectPath: z.string().optional(),
  interactions: z.array(InteractionSchema),
});

export const SessionPageSchema = z.object({
  total: z.number(),
  sessions: z.array(SessionSchema),
});

export const SessionSummarySchema = z.object({
  sessionId: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date().optional(),
  durationMinutes: z.number().optional(),
  totalInteractions: z.number(),
  totalTokens: z.number(),
  averageTokensPerInteraction: z.number(),
  modelsUsed: z.array(z.string()),
  projectPath: z.string().optional(),
});

export const InteractionListSchema = z.object({
  count: z.number(),
  interactions: z.array(InteractionSchema),
});

const ModelUsageSchema = z.object({ cost: z.number(), tokens: z.number(), requests: z.number() });

export const UsageSummarySchema = z.object({
  provider: z.enum(PROVIDER_NAMES),
  periodDays: z.number(),
  totalCost: z.number(),
  totalTokens: z.number(),
  totalRequests: z.number(),
  byModel: z.record(ModelUsageSchema),
  dailyBreakdown: z.array(ModelUsageSchema.extend({ date: z.string() })),
});

export const AllUsageSchema = z.object({
  periodDays: z.number(),
  providers: z.record(UsageSummarySchema),
});

export type ApiSession = z.infer<typeof SessionSchema>;

/** Same shape the server's summary endpoint returns, derived from a listed session. */
export function toSummary(session: ApiSession): SessionSummary {
  const models = new Set<string>();
  for (const i of session.interactions) if (i.modelName) models.add(i.modelName);
  return {
    sessionId: session.sessionId,
    startTime: session.startTime,
    endTime: session.endTime,
    durationMinutes: session.totalDurationMs !== undefined ? session.totalDurationMs / 60_000 : undefined,
    totalInteractions: session.totalInteractions,
    totalTokens: session.totalTokens,
    averageTokensPerInteraction: session.totalInteractions === 0 ? 0 : session.totalTokens / session.totalInteractions,
    modelsUsed: [...models],
    projectPath: session.projectPath,
  };
}

/** GETs a JSON document from a running collector and validates it. */
export async function getJson<T>(
  baseUrl: string,
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  timeoutMs = 5000,
): Promise<T> {
  const res = await fetch(new URL(path, baseUrl), { signal: AbortSignal.timeout(timeoutMs) });
  const body: unknown = await res.json();
  if (!res.ok) {
    const parsedError = z.object({ error: z.string() }).safeParse(body);
    throw new ApiClientError(parsedError.success ? parsedError.data.error : `HTTP ${res.status}`, res.status);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new ApiClientError(`Unexpected response from ${path}`);
  return parsed.data;
}
