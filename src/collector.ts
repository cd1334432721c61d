import { ApiServer } from "./api/server.js";
import type { DevpulseConfig } from "./config/schema.js";
import { SampleDataGenerator, type DemoFeed } from "./demo/sample-data.js";
import { LiveDashboard } from "./display/dashboard.js";
import { AggregationEngine } from "./engine/aggregation-engine.js";
import { QueryFacade } from "./engine/query.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logging/logger.js";
import { ProviderManager } from "./providers/manager.js";
import type { ProviderDeps } from "./providers/base.js";
import type { EventStore } from "./storage/index.js";
import { MemoryStore } from "./storage/memory.js";
import { PostgresStore } from "./storage/postgres.js";
import { StoreSink } from "./storage/sink.js";
import { OtlpReceiver } from "./telemetry/receiver.js";
import { WSServer } from "./ws/server.js";

const log = createLogger("collector");

const RETENTION_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface CollectorOptions {
  /** Feed generated sessions into the engine. */
  demo?: boolean;
  /** Overrides the store chosen by config.storage. */
  store?: EventStore;
  providerDeps?: ProviderDeps;
}

export interface BoundPorts {
  otlp: number;
  api: number;
  ws: number;
}

export function createStore(config: DevpulseConfig): EventStore {
  if (config.storage === "postgres" && config.databaseUrl) return new PostgresStore(config.databaseUrl);
  return new MemoryStore();
}

/** Wires receiver, engine, storage, providers and the outward surfaces into one process. */
export class Collector {
  readonly store: EventStore;
  readonly sink: StoreSink;
  readonly engine: AggregationEngine;
  readonly query: QueryFacade;
  readonly providers: ProviderManager;
  readonly receiver: OtlpReceiver;
  readonly wsServer: WSServer;
  readonly api: ApiServer;
  readonly dashboard: LiveDashboard | null;
  private demoFeed: DemoFeed | null = null;
  private retentionTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;

  constructor(
    private readonly config: DevpulseConfig,
    private readonly options: CollectorOptions = {},
  ) {
    this.store = options.store ?? createStore(config);
    this.sink = new StoreSink(this.store);
    this.engine = new AggregationEngine({ sink: this.sink, maxEventHistory: config.maxEventHistory });
    this.query = new QueryFacade(this.engine);
    this.providers = new ProviderManager(config.providers, {
      store: this.store,
      sessions: () => this.engine.getSessions(),
      deps: options.providerDeps,
    });
    this.receiver = new OtlpReceiver(this.engine, { host: config.host, port: config.otlpPort });
    this.wsServer = new WSServer(this.engine, this.query);
    this.api = new ApiServer(
      { engine: this.engine, query: this.query, providers: this.providers, wsClients: () => this.wsServer.getClientCount() },
      { host: config.host, port: config.apiPort },
    );
    this.dashboard = config.dashboard.enabled ? new LiveDashboard(this.query, { refreshMs: config.dashboard.refreshMs }) : null;
  }

  /** Brings every part up in order; on failure, whatever already started is stopped again. */
  async start(): Promise<BoundPorts> {
    if (this.started) throw new Error("Collector already started");
    this.started = true;
    try {
      return await this.startParts();
    } catch (err) {
      log.error(`Startup failed: ${errorMessage(err)}`);
      await this.stop().catch((stopErr: unknown) => log.error(`Cleanup after failed start: ${errorMessage(stopErr)}`));
      throw err;
    }
  }

  /** Stops intake first, then the surfaces, then drains pending writes. */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.demoFeed?.stop();
    this.demoFeed = null;
    if (this.retentionTimer) clearInterval(this.retentionTimer);
    this.retentionTimer = null;
    this.providers.stop();
    this.dashboard?.stop();
    await this.receiver.stop();
    await this.wsServer.stop();
    await this.api.stop();
    await this.sink.flush();
    if (this.sink.failureCount > 0) log.warn(`${this.sink.failureCount} storage writes failed during this run`);
    await this.store.close();
  }

  private async startParts(): Promise<BoundPorts> {
    await this.store.init();

    const active = await this.providers.initialize();
    if (active.length > 0) {
      this.providers.start();
      log.info(`Usage collection active for ${active.join(", ")}`);
    }

    const otlp = await this.receiver.start();
    const api = await this.api.start();
    let ws = api;
    const httpServer = this.api.httpServer;
    if (this.config.wsPort === this.config.apiPort && httpServer) {
      this.wsServer.attachToServer(httpServer);
    } else {
      ws = await this.wsServer.start(this.config.wsPort, this.config.host);
    }

    this.runRetention();
    this.retentionTimer = setInterval(() => this.runRetention(), RETENTION_INTERVAL_MS);

    if (this.options.demo) this.demoFeed = new SampleDataGenerator().startContinuous(this.engine);
    this.dashboard?.start();
    return { otlp, api, ws };
  }

  private runRetention(): void {
    const days = this.config.logRetentionDays;
    this.store
      .cleanupOldData(days)
      .then((count) => {
        if (count > 0) log.info(`Retention removed ${count} records older than ${days} days`);
      })
      .catch((err: unknown) => log.error(`Retention cleanup failed: ${errorMessage(err)}`));
  }
}
