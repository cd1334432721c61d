import type { QueryFacade } from "../engine/query.js";
import { ConsoleFormatter } from "./formatter.js";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";
const RECENT_SESSIONS = 5;

export interface DashboardOptions {
  refreshMs?: number;
  formatter?: ConsoleFormatter;
  write?: (text: string) => void;
  clock?: () => Date;
}

/** Full-screen console view redrawn on a timer. */
export class LiveDashboard {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly formatter: ConsoleFormatter;
  private readonly write: (text: string) => void;
  private readonly clock: () => Date;

  constructor(
    private readonly query: QueryFacade,
    private readonly options: DashboardOptions = {},
  ) {
    this.formatter = options.formatter ?? new ConsoleFormatter();
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.redraw();
    this.timer = setInterval(() => this.redraw(), this.options.refreshMs ?? 2000);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  redraw(): void {
    this.write(CLEAR_SCREEN + this.render() + "\n");
  }

  render(): string {
    const f = this.formatter;
    const out = [f.header("AI Development Analytics - Live Dashboard"), f.statistics(this.query.getStats())];

    const active = this.query.getActiveSessions();
    if (active.length > 0) {
      out.push(f.header("Active Sessions"), f.sessionList(active));
    }
    const recent = this.query.listSessions().slice(0, RECENT_SESSIONS);
    if (recent.length > 0) {
      out.push(f.header("Recent Sessions"), f.sessionList(recent));
    }

    out.push("", `Last Updated: ${f.formatTime(this.clock())}`, "Press Ctrl+C to stop");
    return out.join("\n");
  }

  printSummary(): void {
    const f = this.formatter;
    this.write(f.header("Session Summary") + "\n" + f.summaries(this.query.getSessionSummaries()) + "\n");
  }
}
