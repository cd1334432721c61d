import { createServer, type Server } from "node:http";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { z } from "zod";
import type { AggregationEngine, EngineChange } from "../engine/aggregation-engine.js";
import { summarizeSession, type SessionSummary } from "../engine/models.js";
import type { EngineStats, QueryFacade } from "../engine/query.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { close, listen } from "../api/http.js";

const log = createLogger("ws");

export const DEFAULT_WS_PORT = 8001;
const HEARTBEAT_MS = 30_000;
const STATS_INTERVAL_MS = 5_000;

export type FeedMessage =
  | { type: EngineChange["type"]; payload: SessionSummary }
  | { type: "stats"; payload: EngineStats };

export type FeedTopic = FeedMessage["type"];

const FEED_TOPICS = ["session:created", "session:updated", "session:ended", "stats"] as const satisfies readonly FeedTopic[];

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), topics: z.array(z.enum(FEED_TOPICS)) }),
  z.object({ type: z.literal("ping") }),
]);

interface Client {
  ws: WebSocket;
  /** Empty means every topic. */
  subscriptions: Set<FeedTopic>;
  alive: boolean;
}

export interface WSServerOptions {
  heartbeatMs?: number;
  statsIntervalMs?: number;
}

/** Pushes session changes and periodic stats to connected dashboards. */
export class WSServer {
  private wss: WebSocketServer | null = null;
  private ownServer: Server | null = null;
  private clients = new Set<Client>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private statsTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly engine: AggregationEngine,
    private readonly query: QueryFacade,
    private readonly options: WSServerOptions = {},
  ) {}

  /** Standalone server on its own port; resolves with the bound port. */
  async start(port: number, host?: string): Promise<number> {
    this.wss = new WebSocketServer({ noServer: true });
    this.ownServer = createServer((_req, res) => {
      res.writeHead(426, { "Content-Type": "text/plain" });
      res.end("Upgrade Required");
    });
    this.bindUpgrade(this.ownServer);
    let bound: number;
    try {
      bound = await listen(this.ownServer, port, host);
    } catch (err) {
      this.ownServer = null;
      this.wss = null;
      throw err;
    }
    this.setup();
    log.info(`WebSocket feed listening on ${host ?? "0.0.0.0"}:${bound}`);
    return bound;
  }

  /** Shares an existing HTTP server, used when the feed and the REST API use one port. */
  attachToServer(server: Server): void {
    this.wss = new WebSocketServer({ noServer: true });
    this.bindUpgrade(server);
    this.setup();
    log.info("WebSocket feed attached to the API server");
  }

  broadcast(message: FeedMessage): void {
    const data = JSON.stringify(message);
    for (const c of this.clients) {
      if (c.ws.readyState !== WebSocket.OPEN) continue;
      if (c.subscriptions.size > 0 && !c.subscriptions.has(message.type)) continue;
      c.ws.send(data);
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.heartbeat) clearInterval(this.heartbeat);
    if (this.statsTimer) clearInterval(this.statsTimer);
    this.heartbeat = this.statsTimer = null;
    for (const c of this.clients) c.ws.terminate();
    this.clients.clear();
    const wss = this.wss;
    this.wss = null;
    if (wss) await new Promise<void>((resolve) => wss.close(() => resolve()));
    const own = this.ownServer;
    this.ownServer = null;
    if (own) await close(own);
  }

  private bindUpgrade(server: Server): void {
    server.on("upgrade", (req, socket, head) => {
      const wss = this.wss;
      if (!wss) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => wss.emit("connection", ws, req));
    });
  }

  private setup(): void {
    const wss = this.wss;
    if (!wss) return;
    wss.on("connection", (ws) => this.onConnection(ws));

    this.unsubscribe = this.engine.onChange((change) => {
      this.broadcast({ type: change.type, payload: summarizeSession(change.session) });
    });

    this.heartbeat = setInterval(() => {
      for (const c of this.clients) {
        if (!c.alive) {
          c.ws.terminate();
          this.clients.delete(c);
          continue;
        }
        c.alive = false;
        c.ws.ping();
      }
    }, this.options.heartbeatMs ?? HEARTBEAT_MS);

    this.statsTimer = setInterval(() => {
      if (this.clients.size > 0) this.broadcast({ type: "stats", payload: this.query.getStats() });
    }, this.options.statsIntervalMs ?? STATS_INTERVAL_MS);
  }

  private onConnection(ws: WebSocket): void {
    const c: Client = { ws, subscriptions: new Set(), alive: true };
    this.clients.add(c);
    log.debug(`Client connected (${this.clients.size} total)`);

    ws.on("pong", () => {
      c.alive = true;
    });
    ws.on("message", (data) => this.onMessage(c, data));
    ws.on("close", () => {
      this.clients.delete(c);
      log.debug(`Client disconnected (${this.clients.size} total)`);
    });
    ws.on("error", (err) => log.warn(`Client socket error: ${errorMessage(err)}`));

    ws.send(JSON.stringify({ type: "stats", payload: this.query.getStats() } satisfies FeedMessage));
  }

  private onMessage(c: Client, data: RawData): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch (err) {
      c.ws.send(JSON.stringify({ type: "error", error: `Invalid JSON: ${errorMessage(err)}` }));
      return;
    }
    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      c.ws.send(JSON.stringify({ type: "error", error: "Unsupported message" }));
      return;
    }
    const message = parsed.data;
    switch (message.type) {
      case "subscribe":
        c.subscriptions = new Set(message.topics);
        c.ws.send(JSON.stringify({ type: "subscribed", topics: message.topics }));
        break;
      case "ping":
        c.ws.send(JSON.stringify({ type: "pong" }));
        break;
    }
  }
}
