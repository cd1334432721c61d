import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AggregationEngine } from "../engine/aggregation-engine.js";
import { applyCors, close, HttpError, listen, mediaType, readBody, requestUrl, sendJson } from "../api/http.js";
import { errorMessage, ProcessorError, ReceiverError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import {
  normalizeLogs,
  normalizeMetrics,
  normalizeTraces,
  parseLogsRequest,
  parseMetricsRequest,
  parseTraceRequest,
} from "./normalizer.js";
import type { EventEnvelope } from "./types.js";

const log = createLogger("otlp-receiver");

export const DEFAULT_OTLP_PORT = 4318;

type Decoder = (body: unknown, receivedAt: Date) => EventEnvelope[];

const ROUTES: ReadonlyMap<string, Decoder> = new Map<string, Decoder>([
  ["/v1/metrics", (body, at) => normalizeMetrics(parseMetricsRequest(body), at)],
  ["/v1/traces", (body, at) => normalizeTraces(parseTraceRequest(body), at)],
  ["/v1/logs", (body, at) => normalizeLogs(parseLogsRequest(body), at)],
]);

export interface ReceiverOptions {
  host?: string;
  port?: number;
}

export interface ReceiverStats {
  requests: number;
  envelopes: number;
  rejected: number;
}

/** OTLP/HTTP endpoint accepting the JSON encoding of metrics, traces and logs. */
export class OtlpReceiver {
  private server: Server | null = null;
  private readonly stats: ReceiverStats = { requests: 0, envelopes: 0, rejected: 0 };

  constructor(
    private readonly engine: AggregationEngine,
    private readonly options: ReceiverOptions = {},
  ) {}

  async start(): Promise<number> {
    if (this.server) throw new ReceiverError("Receiver already started");
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error(`Unhandled receiver error: ${errorMessage(err)}`);
        if (!res.headersSent) sendJson(res, 500, { error: "Internal error" });
      });
    });
    try {
      const port = await listen(this.server, this.options.port ?? DEFAULT_OTLP_PORT, this.options.host);
      log.info(`OTLP/HTTP receiver listening on ${this.options.host ?? "0.0.0.0"}:${port}`);
      return port;
    } catch (err) {
      this.server = null;
      throw new ReceiverError(`Failed to start OTLP receiver: ${errorMessage(err)}`, { cause: err });
    }
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    const server = this.server;
    this.server = null;
    await close(server);
  }

  getStats(): ReceiverStats {
    return { ...this.stats };
  }

  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    applyCors(res);
    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const { pathname } = requestUrl(req);
    if (req.method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    const decode = ROUTES.get(pathname);
    if (!decode) {
      sendJson(res, 404, { error: `Unknown endpoint ${pathname}` });
      return;
    }
    if (req.method !== "POST") {
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    this.stats.requests++;
    try {
      const envelopes = await this.decode(req, decode);
      this.engine.ingestAll(envelopes);
      this.stats.envelopes += envelopes.length;
      log.debug(`${pathname}: ingested ${envelopes.length} envelopes`);
      sendJson(res, 200, { partialSuccess: {} });
    } catch (err) {
      this.stats.rejected++;
      if (err instanceof HttpError) {
        log.warn(`${pathname}: ${err.status} ${err.message}`);
        sendJson(res, err.status, { error: err.message });
        return;
      }
      throw err;
    }
  }

  private async decode(req: IncomingMessage, decode: Decoder): Promise<EventEnvelope[]> {
    const type = mediaType(req);
    if (type !== "application/json") {
      // Drain so the client sees the response rather than a reset.
      req.resume();
      throw new HttpError(415, `Unsupported content type ${type || "<none>"}; only OTLP JSON is accepted`);
    }
    const raw = await readBody(req);
    let body: unknown;
    try {
      body = JSON.parse(raw.toString("utf8"));
    } catch (err) {
      throw new HttpError(400, `Invalid JSON: ${errorMessage(err)}`);
    }
    try {
      return decode(body, new Date());
    } catch (err) {
      if (err instanceof ProcessorError) throw new HttpError(400, err.message);
      throw err;
    }
  }
}
