import chalk, { type ChalkInstance } from "chalk";
import type { InteractionAggregate, SessionAggregate, SessionSummary } from "../engine/models.js";
import type { EngineStats } from "../engine/query.js";
import { readToolDecisions } from "../engine/session-attributes.js";
import type { ProviderUsageSummary } from "../providers/types.js";
import { getNumber, getString } from "../telemetry/attributes.js";

const WIDTH = 60;

export interface FormatterOptions {
  /** Defaults to the process's local zone. */
  timeZone?: string;
  color?: ChalkInstance;
}

/** Renders engine data as colored console text. Every method returns a string. */
export class ConsoleFormatter {
  private readonly c: ChalkInstance;
  private readonly time: Intl.DateTimeFormat;
  private readonly dateTime: Intl.DateTimeFormat;

  constructor(options: FormatterOptions = {}) {
    this.c = options.color ?? chalk;
    const clock = { hour: "2-digit", minute: "2-digit", second: "2-digit", hourCycle: "h23" } as const;
    this.time = new Intl.DateTimeFormat("en-GB", { ...clock, timeZone: options.timeZone });
    // sv-SE renders as `YYYY-MM-DD HH:MM:SS`.
    this.dateTime = new Intl.DateTimeFormat("sv-SE", {
      ...clock,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      timeZone: options.timeZone,
    });
  }

  header(title: string): string {
    const rule = this.c.blue("=".repeat(WIDTH));
    const pad = Math.max(0, WIDTH - title.length);
    const centered = " ".repeat(Math.floor(pad / 2)) + title + " ".repeat(Math.ceil(pad / 2));
    return `\n${rule}\n${this.c.bold(centered)}\n${rule}\n`;
  }

  formatTime(date: Date): string {
    return this.time.format(date);
  }

  formatDateTime(date: Date): string {
    return this.dateTime.format(date);
  }

  session(session: SessionAggregate): string {
    const { c } = this;
    const status = session.endTime ? c.yellow("ENDED") : c.green("ACTIVE");
    const duration =
      session.totalDurationMs !== undefined ? `${(session.totalDurationMs / 1000).toFixed(1)}s` : "Ongoing";
    const attrs = session.attributes;

    const lines = [
      `Session: ${c.cyan(session.sessionId)} [${status}]`,
      `  Started: ${this.formatTime(session.startTime)}`,
      `  Duration: ${duration}`,
      `  Interactions: ${c.magenta(String(session.totalInteractions))}`,
      `  Total Tokens: ${c.yellow(String(session.totalTokens))}`,
    ];
    if (session.projectPath) lines.push(`  Project: ${session.projectPath}`);
    if (session.serviceVersion !== "unknown") lines.push(`  Version: ${session.serviceVersion}`);

    const cost = getNumber(attrs, "total_cost_usd") ?? 0;
    if (cost > 0) lines.push(`  Cost: $${cost.toFixed(6)}`);

    const email = getString(attrs, "user_email");
    if (email) lines.push(`  User: ${email}`);

    const added = getNumber(attrs, "lines_added") ?? 0;
    const removed = getNumber(attrs, "lines_removed") ?? 0;
    if (added > 0 || removed > 0) {
      const net = added - removed;
      lines.push(`  Code: ${c.green(`+${added}`)} ${c.red(`-${removed}`)} (${net >= 0 ? "+" : ""}${net} net)`);
    }

    const tools = readToolDecisions(attrs.tool_decisions);
    if (tools.total > 0) {
      lines.push(`  Tools: ${tools.accepted}/${tools.total} accepted (${tools.tools_used_list.join(", ")})`);
    }

    const commits = getNumber(attrs, "commits_created") ?? 0;
    const prs = getNumber(attrs, "pull_requests_created") ?? 0;
    const git: string[] = [];
    if (commits > 0) git.push(`${commits} commits`);
    if (prs > 0) git.push(`${prs} PRs`);
    if (git.length > 0) lines.push(`  Git: ${git.join(", ")}`);

    return lines.join("\n");
  }

  interaction(interaction: InteractionAggregate): string {
    const lines = [
      `  ${this.c.green("→")} ${this.formatTime(interaction.timestamp)} - ${interaction.interactionId.slice(0, 8)}`,
      `    Tokens: ${interaction.requestTokens} → ${interaction.responseTokens} (total: ${interaction.totalTokens})`,
    ];
    if (interaction.modelName) lines.push(`    Model: ${interaction.modelName}`);
    if (interaction.responseTimeMs) lines.push(`    Response Time: ${Math.round(interaction.responseTimeMs)}ms`);
    return lines.join("\n");
  }

  statistics(stats: EngineStats): string {
    const { c } = this;
    return [
      `Total Sessions: ${c.cyan(String(stats.totalSessions))}`,
      `Active Sessions: ${c.green(String(stats.activeSessions))}`,
      `Total Interactions: ${c.magenta(String(stats.totalInteractions))}`,
      `Total Tokens: ${c.yellow(String(stats.totalTokens))}`,
      `Total Events: ${c.blue(String(stats.totalEvents))}`,
    ].join("\n");
  }

  /** Each session followed by its three most recent interactions. */
  sessionList(sessions: SessionAggregate[]): string {
    if (sessions.length === 0) return this.c.yellow("No sessions found");
    const out: string[] = [];
    for (const session of sessions) {
      out.push(this.session(session));
      const recent = [...session.interactions]
        .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
        .slice(0, 3);
      if (recent.length > 0) {
        out.push(this.c.bold("  Recent Interactions:"));
        for (const i of recent) out.push(this.interaction(i));
      }
      out.push("");
    }
    return out.join("\n");
  }

  summaries(summaries: SessionSummary[]): string {
    if (summaries.length === 0) return this.c.yellow("No sessions found");
    const { c } = this;
    const out: string[] = [];
    for (const s of summaries) {
      const status = s.endTime ? c.yellow("ENDED") : c.green("ACTIVE");
      const duration = s.durationMinutes !== undefined ? `${s.durationMinutes.toFixed(1)}m` : "Ongoing";
      out.push(`${c.cyan(s.sessionId)} [${status}]`);
      out.push(`  Time: ${this.formatDateTime(s.startTime)} (${duration})`);
      out.push(`  Tokens: ${c.yellow(String(s.totalTokens))}`);
      out.push(`  Interactions: ${s.totalInteractions}`);
      if (s.modelsUsed.length > 0) out.push(`  Models: ${s.modelsUsed.join(", ")}`);
      if (s.projectPath) out.push(`  Project: ${s.projectPath}`);
      out.push("");
    }
    return out.join("\n");
  }

  usage(summary: ProviderUsageSummary): string {
    const { c } = this;
    const out = [
      c.bold(`  ${summary.provider} usage`) + c.gray(` (last ${summary.periodDays} days)`),
      c.gray("  ─────────────────────────────────────────────"),
      `  ${c.gray("├─")} Total Cost       ${c.white("$" + summary.totalCost.toFixed(4))}`,
      `  ${c.gray("├─")} Total Tokens     ${c.white(summary.totalTokens.toLocaleString("en-US"))}`,
      `  ${c.gray("└─")} Total Requests   ${c.white(summary.totalRequests.toLocaleString("en-US"))}`,
    ];
    const models = Object.entries(summary.byModel).sort(([, a], [, b]) => b.cost - a.cost);
    if (models.length > 0) {
      const max = Math.max(...models.map(([, m]) => m.cost));
      out.push("", c.bold("  Cost by Model"));
      for (const [model, m] of models) {
        out.push(`  ${c.white(model.padEnd(22))} ${this.bar(m.cost, max, 20)}  ${c.white("$" + m.cost.toFixed(4))}`);
      }
    }
    return out.join("\n");
  }

  bar(value: number, max: number, width: number): string {
    const filled = max > 0 ? Math.round((width * value) / max) : 0;
    const pct = max > 0 ? (value / max) * 100 : 0;
    const color = pct < 40 ? this.c.green : pct < 70 ? this.c.yellow : this.c.red;
    return color("█".repeat(filled)) + this.c.gray("░".repeat(width - filled));
  }
}
