import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AggregationEngine } from "../engine/aggregation-engine.js";
import type { QueryFacade } from "../engine/query.js";
import { errorMessage, ProviderError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { ProviderManager } from "../providers/manager.js";
import { isProviderName, type ProviderName } from "../providers/types.js";
import { VERSION } from "../version.js";
import { applyCors, close, HttpError, intParam, listen, requestUrl, sendJson } from "./http.js";

const log = createLogger("api");

export const DEFAULT_API_PORT = 8000;

export interface ApiServerDeps {
  engine: AggregationEngine;
  query: QueryFacade;
  providers: ProviderManager;
  /** Connected WebSocket clients, reported by /health. */
  wsClients?: () => number;
}

export interface ApiServerOptions {
  host?: string;
  port?: number;
}

interface RouteContext {
  url: URL;
  params: string[];
}

type Handler = (ctx: RouteContext) => unknown | Promise<unknown>;

interface Route {
  method: "GET" | "POST";
  pattern: RegExp;
  handler: Handler;
}

const MAX_DAYS = 365;

function decodePathParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    if (err instanceof URIError) throw new HttpError(400, `Malformed path segment: ${value}`);
    throw err;
  }
}

/** REST surface over the query facade and the provider manager. */
export class ApiServer {
  private server: Server | null = null;
  private readonly routes: Route[];

  constructor(
    private readonly deps: ApiServerDeps,
    private readonly options: ApiServerOptions = {},
  ) {
    this.routes = this.buildRoutes();
  }

  /** The underlying server, so the WebSocket feed can share its port. */
  get httpServer(): Server | null {
    return this.server;
  }

  async start(): Promise<number> {
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error(`Unhandled API error: ${errorMessage(err)}`);
        if (!res.headersSent) sendJson(res, 500, { error: "Internal error" });
      });
    });
    let port: number;
    try {
      port = await listen(this.server, this.options.port ?? DEFAULT_API_PORT, this.options.host);
    } catch (err) {
      this.server = null;
      throw err;
    }
    log.info(`REST API listening on ${this.options.host ?? "0.0.0.0"}:${port}`);
    return port;
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    const server = this.server;
    this.server = null;
    await close(server);
  }

  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    applyCors(res);
    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = requestUrl(req);
    for (const route of this.routes) {
      if (route.method !== req.method) continue;
      const match = route.pattern.exec(url.pathname);
      if (!match) continue;
      try {
        const params = match.slice(1).map(decodePathParam);
        sendJson(res, 200, await route.handler({ url, params }));
      } catch (err) {
        if (err instanceof HttpError) {
          sendJson(res, err.status, { error: err.message });
          return;
        }
        if (err instanceof ProviderError) {
          log.warn(`${req.method} ${url.pathname}: ${err.message}`);
          sendJson(res, 502, { error: err.message });
          return;
        }
        throw err;
      }
      return;
    }
    sendJson(res, 404, { error: `Not found: ${req.method ?? "GET"} ${url.pathname}` });
  }

  private buildRoutes(): Route[] {
    const { engine, query, providers } = this.deps;
    const days = (url: URL) => intParam(url, "days", 7, 1, MAX_DAYS);
    const daysBack = (url: URL) => intParam(url, "days_back", 1, 1, MAX_DAYS);
    const first = (params: string[]) => params[0] ?? "";

    return [
      { method: "GET", pattern: /^\/$/, handler: () => ({ message: "devpulse telemetry API", version: VERSION }) },
      {
        method: "GET",
        pattern: /^\/health$/,
        handler: () => {
          const stats = query.getStats();
          return {
            status: "healthy",
            sessions: stats.totalSessions,
            activeSessions: stats.activeSessions,
            wsClients: this.deps.wsClients?.() ?? 0,
          };
        },
      },
      {
        method: "GET",
        pattern: /^\/sessions$/,
        handler: ({ url }) => {
          const limit = intParam(url, "limit", 50, 1, 1000);
          const offset = intParam(url, "offset", 0);
          const sessions = query.listSessions();
          return { total: sessions.length, limit, offset, sessions: sessions.slice(offset, offset + limit) };
        },
      },
      {
        method: "GET",
        pattern: /^\/sessions\/active$/,
        handler: () => {
          const sessions = query.getActiveSessions();
          return { count: sessions.length, sessions };
        },
      },
      {
        method: "GET",
        pattern: /^\/sessions\/([^/]+)$/,
        handler: ({ params }) => found(query.getSession(first(params)), `Session ${first(params)} not found`),
      },
      {
        method: "POST",
        pattern: /^\/sessions\/([^/]+)\/end$/,
        handler: ({ params }) => found(engine.endSession(first(params)), `Session ${first(params)} not found`),
      },
      {
        method: "GET",
        pattern: /^\/sessions\/([^/]+)\/summary$/,
        handler: ({ params }) => found(query.getSessionSummary(first(params)), `Session ${first(params)} not found`),
      },
      {
        method: "GET",
        pattern: /^\/sessions\/([^/]+)\/interactions$/,
        handler: ({ params }) => {
          const interactions = found(
            query.getSessionInteractions(first(params)),
            `Session ${first(params)} not found`,
          );
          return { sessionId: first(params), count: interactions.length, interactions };
        },
      },
      { method: "GET", pattern: /^\/stats$/, handler: () => query.getStats() },
      {
        method: "GET",
        pattern: /^\/events$/,
        handler: ({ url }) => ({ events: query.getEvents(intParam(url, "limit", 100, 1, 1000)) }),
      },
      {
        method: "GET",
        pattern: /^\/analytics\/dashboard$/,
        handler: ({ url }) => query.getDashboardData(days(url)),
      },
      {
        method: "GET",
        pattern: /^\/analytics\/providers$/,
        handler: () => ({ summary: providers.getSummary(), health: providers.healthChecks() }),
      },
      {
        method: "GET",
        pattern: /^\/analytics\/usage$/,
        handler: async ({ url }) => ({ periodDays: days(url), providers: await providers.getAllUsageSummaries(days(url)) }),
      },
      {
        method: "GET",
        pattern: /^\/analytics\/usage\/([^/]+)$/,
        handler: ({ url, params }) => providers.getUsageSummary(this.activeProvider(first(params)), days(url)),
      },
      {
        method: "POST",
        pattern: /^\/analytics\/collect$/,
        handler: async ({ url }) => ({ results: await providers.collectAll(daysBack(url)) }),
      },
      {
        method: "POST",
        pattern: /^\/analytics\/collect\/([^/]+)$/,
        handler: async ({ url, params }) => {
          const name = this.activeProvider(first(params));
          const records = await providers.collect(name, daysBack(url));
          return { provider: name, records: records.length };
        },
      },
    ];
  }

  private activeProvider(value: string): ProviderName {
    if (!isProviderName(value)) throw new HttpError(400, `Unknown provider ${value}`);
    if (!this.deps.providers.isActive(value)) throw new HttpError(404, `Provider ${value} is not active`);
    return value;
  }
}

function found<T>(value: T | undefined, message: string): T {
  if (value === undefined) throw new HttpError(404, message);
  return value;
}
