export { ApiServer, DEFAULT_API_PORT, type ApiServerDeps, type ApiServerOptions } from "./api/server.js";
export { Collector, createStore, type BoundPorts, type CollectorOptions } from "./collector.js";
export { CONFIG_FILE, DEFAULT_CONFIG } from "./config/defaults.js";
export { loadConfig, validateProviderConfigs, type LoadConfigOptions } from "./config/loader.js";
export type { ConfigPatch, DevpulseConfig, ProviderConfig } from "./config/schema.js";
export { SampleDataGenerator, type DemoFeed } from "./demo/sample-data.js";
export { LiveDashboard } from "./display/dashboard.js";
export { ConsoleFormatter } from "./display/formatter.js";
export { AggregationEngine, type EngineChange, type IngestResult } from "./engine/aggregation-engine.js";
export type { InteractionAggregate, SessionAggregate, SessionSummary } from "./engine/models.js";
export { QueryFacade, type EngineStats } from "./engine/query.js";
export * from "./errors.js";
export { createLogger, setLogLevel, type LogLevel } from "./logging/logger.js";
export { ProviderManager, summarizeUsage } from "./providers/manager.js";
export { calculateCost } from "./providers/pricing.js";
export type { ProviderName, ProviderUsageSummary, UsageRecord } from "./providers/types.js";
export type { EventStore } from "./storage/index.js";
export { MemoryStore } from "./storage/memory.js";
export { PostgresStore } from "./storage/postgres.js";
export { NullSink, StoreSink, type StorageSink } from "./storage/sink.js";
export { DEFAULT_OTLP_PORT, OtlpReceiver } from "./telemetry/receiver.js";
export type { EventEnvelope } from "./telemetry/types.js";
export { WSServer, type FeedMessage } from "./ws/server.js";
