import type { AttributeMap } from "../telemetry/types.js";

export interface InteractionAggregate {
  interactionId: string;
  sessionId: string;
  timestamp: Date;
  requestTokens: number;
  responseTokens: number;
  /** Always requestTokens + responseTokens. */
  totalTokens: number;
  modelName?: string;
  responseTimeMs?: number;
  attributes: AttributeMap;
}

export interface SessionAggregate {
  sessionId: string;
  startTime: Date;
  endTime?: Date;
  totalDurationMs?: number;
  totalInteractions: number;
  totalTokens: number;
  totalRequestTokens: number;
  totalResponseTokens: number;
  projectPath?: string;
  userId?: string;
  serviceVersion: string;
  /** Discovery order, not timestamp order. */
  interactions: InteractionAggregate[];
  attributes: AttributeMap;
}

export interface SessionSummary {
  sessionId: string;
  startTime: Date;
  endTime?: Date;
  durationMinutes?: number;
  totalInteractions: number;
  totalTokens: number;
  averageTokensPerInteraction: number;
  modelsUsed: string[];
  projectPath?: string;
}

export function createInteraction(
  interactionId: string,
  sessionId: string,
  timestamp: Date,
  init: { requestTokens?: number; responseTokens?: number; modelName?: string; attributes?: AttributeMap } = {},
): InteractionAggregate {
  const requestTokens = init.requestTokens ?? 0;
  const responseTokens = init.responseTokens ?? 0;
  return {
    interactionId,
    sessionId,
    timestamp,
    requestTokens,
    responseTokens,
    totalTokens: requestTokens + responseTokens,
    modelName: init.modelName,
    attributes: init.attributes ?? {},
  };
}

/** Redelivered or split token emissions add up; they never overwrite. */
export function addTokens(interaction: InteractionAggregate, request: number, response: number): void {
  interaction.requestTokens += request;
  interaction.responseTokens += response;
  interaction.totalTokens = interaction.requestTokens + interaction.responseTokens;
}

export function recomputeTotals(session: SessionAggregate): void {
  let total = 0;
  let request = 0;
  let response = 0;
  for (const i of session.interactions) {
    total += i.totalTokens;
    request += i.requestTokens;
    response += i.responseTokens;
  }
  session.totalInteractions = session.interactions.length;
  session.totalTokens = total;
  session.totalRequestTokens = request;
  session.totalResponseTokens = response;
}

export function isActive(session: SessionAggregate): boolean {
  return session.endTime === undefined;
}

/** Returns false when the session had already ended; the first end time stays. */
export function markEnded(session: SessionAggregate, endTime: Date): boolean {
  if (session.endTime) return false;
  session.endTime = endTime;
  session.totalDurationMs = Math.max(0, endTime.getTime() - session.startTime.getTime());
  return true;
}

export function averageTokensPerInteraction(session: SessionAggregate): number {
  return session.totalInteractions === 0 ? 0 : session.totalTokens / session.totalInteractions;
}

export function modelsUsed(session: SessionAggregate): string[] {
  const models = new Set<string>();
  for (const i of session.interactions) {
    if (i.modelName) models.add(i.modelName);
  }
  return [...models];
}

export function summarizeSession(session: SessionAggregate): SessionSummary {
  return {
    sessionId: session.sessionId,
    startTime: session.startTime,
    endTime: session.endTime,
    durationMinutes: session.totalDurationMs !== undefined ? session.totalDurationMs / 60_000 : undefined,
    totalInteractions: session.totalInteractions,
    totalTokens: session.totalTokens,
    averageTokensPerInteraction: averageTokensPerInteraction(session),
    modelsUsed: modelsUsed(session),
    projectPath: session.projectPath,
  };
}
