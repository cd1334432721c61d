import chalk from "chalk";
import { ConsoleFormatter } from "../display/formatter.js";
import { errorMessage } from "../errors.js";
import {
  DEFAULT_API_URL,
  getJson,
  InteractionListSchema,
  SessionPageSchema,
  SessionSummarySchema,
  toSummary,
} from "./client.js";

export interface SessionsOptions {
  api?: string;
  limit?: string;
}

export async function sessionsCommand(options: SessionsOptions): Promise<void> {
  const api = options.api ?? DEFAULT_API_URL;
  const limit = Number.parseInt(options.limit ?? "20", 10) || 20;
  const f = new ConsoleFormatter();
  try {
    const page = await getJson(api, `/sessions?limit=${limit}`, SessionPageSchema);
    console.log(f.header(`Sessions (${page.sessions.length} of ${page.total})`));
    console.log(f.summaries(page.sessions.map(toSummary)));
  } catch (err) {
    console.log(chalk.red(`  Could not list sessions from ${api}: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
}

export async function sessionCommand(sessionId: string, options: SessionsOptions): Promise<void> {
  const api = options.api ?? DEFAULT_API_URL;
  const f = new ConsoleFormatter();
  const id = encodeURIComponent(sessionId);
  try {
    const summary = await getJson(api, `/sessions/${id}/summary`, SessionSummarySchema);
    const { interactions } = await getJson(api, `/sessions/${id}/interactions`, InteractionListSchema);
    console.log(f.header(`Session Details: ${sessionId}`));
    console.log(f.summaries([summary]));
    if (interactions.length > 0) {
      console.log(f.header("All Interactions"));
      const ordered = [...interactions].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
      for (const i of ordered) {
        console.log(f.interaction({ ...i, sessionId, attributes: {} }));
      }
    }
  } catch (err) {
    console.log(chalk.red(`  ${errorMessage(err)}`));
    process.exitCode = 1;
  }
}
