import type { SessionAggregate } from "../engine/models.js";
import type { ProviderName, UsageRecord } from "./types.js";

const MODEL_FAMILIES: Record<ProviderName, (model: string) => boolean> = {
  openai: (model) => model.startsWith("gpt") || /^o\d/.test(model),
  anthropic: (model) => model.includes("claude"),
};

export function isProviderModel(provider: ProviderName, model: string): boolean {
  return MODEL_FAMILIES[provider](model.toLowerCase());
}

/**
 * Provider usage is daily and org-wide, so attribution is a heuristic: a
 * record goes to the earliest session that started on the same UTC day and
 * used a model of that provider's family. Records with no candidate stay
 * unattributed.
 */
export function reconcileUsage(records: UsageRecord[], sessions: SessionAggregate[]): UsageRecord[] {
  const ordered = [...sessions].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  return records.map((record) => {
    const match = ordered.find(
      (s) =>
        s.startTime.toISOString().slice(0, 10) === record.date &&
        s.interactions.some((i) => i.modelName !== undefined && isProviderModel(record.provider, i.modelName)),
    );
    return match ? { ...record, sessionId: match.sessionId } : record;
  });
}
