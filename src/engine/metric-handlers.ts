import { getString } from "../telemetry/attributes.js";
import type { DataPoint, MetricEnvelope } from "../telemetry/types.js";
import { addTokens, createInteraction, type InteractionAggregate, type SessionAggregate } from "./models.js";
import { addToCounter, readToolDecisions } from "./session-attributes.js";

export const METRIC_NAMES = {
  tokenUsage: "claude_code.token.usage",
  costUsage: "claude_code.cost.usage",
  linesOfCode: "claude_code.lines_of_code.count",
  toolDecision: "claude_code.code_edit_tool.decision",
  sessionCount: "claude_code.session.count",
  pullRequestCount: "claude_code.pull_request.count",
  commitCount: "claude_code.commit.count",
} as const;

export type HandlerOutcome =
  | { status: "applied" }
  | { status: "degraded"; reason: string }
  | { status: "skipped"; reason: string };

export interface MetricContext {
  session: SessionAggregate;
  envelope: MetricEnvelope;
  /**
   * Resolve an interaction by id, creating and linking it through `create` when unseen.
   * Undefined when the id is already owned by another session.
   */
  resolveInteraction(
    interactionId: string,
    create: () => InteractionAggregate,
  ): { interaction: InteractionAggregate; created: boolean } | undefined;
}

export type MetricHandler = (ctx: MetricContext) => HandlerOutcome;

/** Collects data-quality notes while a handler reads values. */
class ValueReader {
  private readonly notes = new Set<string>();

  read(dp: DataPoint): number {
    const v = dp.value;
    if (v === undefined) {
      this.notes.add("datapoint without value counted as 0");
      return 0;
    }
    if (!Number.isFinite(v) || v < 0) {
      this.notes.add(`invalid value ${v} clamped to 0`);
      return 0;
    }
    return v;
  }

  note(message: string): void {
    this.notes.add(message);
  }

  outcome(): HandlerOutcome {
    return this.notes.size === 0 ? { status: "applied" } : { status: "degraded", reason: [...this.notes].join("; ") };
  }
}

type TokenType = "input" | "output" | "cacheRead" | "cacheCreation";

const TOKEN_TYPES: readonly TokenType[] = ["input", "output", "cacheRead", "cacheCreation"];

function isTokenType(value: string | undefined): value is TokenType {
  return value !== undefined && TOKEN_TYPES.some((type) => type === value);
}

// `_` separates the parts, so it is escaped inside them.
function idPart(value: string): string {
  return value.replace(/%/g, "%25").replace(/_/g, "%5F");
}

/**
 * Sub-second re-emissions for the same session and model share an id and
 * merge into one interaction.
 */
export function tokenInteractionId(sessionId: string, model: string, timestamp: Date): string {
  return `${idPart(sessionId)}_${idPart(model)}_${Math.floor(timestamp.getTime() / 1000)}`;
}

const handleTokenUsage: MetricHandler = ({ session, envelope, resolveInteraction }) => {
  const reader = new ValueReader();
  const byModel = new Map<string, Record<TokenType, number>>();

  for (const dp of envelope.payload.dataPoints) {
    const model = getString(dp.attributes, "model") ?? "unknown";
    const type = getString(dp.attributes, "type");
    let tokens = byModel.get(model);
    if (!tokens) {
      tokens = { input: 0, output: 0, cacheRead: 0, cacheCreation: 0 };
      byModel.set(model, tokens);
    }
    const value = Math.trunc(reader.read(dp));
    if (isTokenType(type)) tokens[type] += value;
  }

  for (const [model, tokens] of byModel) {
    if (tokens.input <= 0 && tokens.output <= 0) continue;
    const id = tokenInteractionId(session.sessionId, model, envelope.timestamp);
    const resolved = resolveInteraction(id, () =>
      createInteraction(id, session.sessionId, envelope.timestamp, {
        requestTokens: tokens.input,
        responseTokens: tokens.output,
        modelName: model,
        attributes: {
          cache_read_tokens: tokens.cacheRead,
          cache_creation_tokens: tokens.cacheCreation,
          ...envelope.resourceAttributes,
        },
      }),
    );
    if (!resolved) {
      reader.note(`interaction ${id} belongs to another session`);
      continue;
    }
    const { interaction, created } = resolved;
    if (!created) {
      addTokens(interaction, tokens.input, tokens.output);
      addToCounter(interaction.attributes, "cache_read_tokens", tokens.cacheRead);
      addToCounter(interaction.attributes, "cache_creation_tokens", tokens.cacheCreation);
    }
  }
  return reader.outcome();
};

const handleCostUsage: MetricHandler = ({ session, envelope }) => {
  const reader = new ValueReader();
  let total = 0;
  for (const dp of envelope.payload.dataPoints) total += reader.read(dp);
  // The assistant emits cumulative cost, so the latest total replaces the old one.
  session.attributes.total_cost_usd = total;
  return reader.outcome();
};

const handleLinesOfCode: MetricHandler = ({ session, envelope }) => {
  const reader = new ValueReader();
  let added = 0;
  let removed = 0;
  for (const dp of envelope.payload.dataPoints) {
    const value = Math.trunc(reader.read(dp));
    const type = getString(dp.attributes, "type");
    if (type === "added") added += value;
    else if (type === "removed") removed += value;
  }
  const attrs = session.attributes;
  const totalAdded = addToCounter(attrs, "lines_added", added);
  const totalRemoved = addToCounter(attrs, "lines_removed", removed);
  attrs.lines_net_change = totalAdded - totalRemoved;
  return reader.outcome();
};

const handleToolDecision: MetricHandler = ({ session, envelope }) => {
  const tally = readToolDecisions(session.attributes.tool_decisions);
  for (const dp of envelope.payload.dataPoints) {
    const decision = getString(dp.attributes, "decision") ?? "unknown";
    const tool = getString(dp.attributes, "tool_name") ?? "unknown";

    tally.total += 1;
    if (!tally.tools_used_list.includes(tool)) tally.tools_used_list.push(tool);
    const perTool = (tally.decisions_by_tool[tool] ??= { accepted: 0, rejected: 0 });
    if (decision === "accept") {
      tally.accepted += 1;
      perTool.accepted += 1;
    } else if (decision === "reject") {
      tally.rejected += 1;
      perTool.rejected += 1;
    }
  }
  session.attributes.tool_decisions = tally;
  return { status: "applied" };
};

const handleSessionCount: MetricHandler = ({ session, envelope }) => {
  const reader = new ValueReader();
  for (const dp of envelope.payload.dataPoints) {
    session.attributes.session_count = Math.trunc(reader.read(dp));
  }
  return reader.outcome();
};

function summingHandler(key: string): MetricHandler {
  return ({ session, envelope }) => {
    const reader = new ValueReader();
    let total = 0;
    for (const dp of envelope.payload.dataPoints) total += Math.trunc(reader.read(dp));
    addToCounter(session.attributes, key, total);
    return reader.outcome();
  };
}

export const METRIC_HANDLERS: ReadonlyMap<string, MetricHandler> = new Map<string, MetricHandler>([
  [METRIC_NAMES.tokenUsage, handleTokenUsage],
  [METRIC_NAMES.costUsage, handleCostUsage],
  [METRIC_NAMES.linesOfCode, handleLinesOfCode],
  [METRIC_NAMES.toolDecision, handleToolDecision],
  [METRIC_NAMES.sessionCount, handleSessionCount],
  [METRIC_NAMES.pullRequestCount, summingHandler("pull_requests_created")],
  [METRIC_NAMES.commitCount, summingHandler("commits_created")],
]);
