import { Cron } from "croner";
import { validateProviderConfig } from "../config/loader.js";
import type { DevpulseConfig } from "../config/schema.js";
import type { SessionAggregate } from "../engine/models.js";
import { errorMessage, ProviderError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { EventStore } from "../storage/index.js";
import { AnthropicUsageProvider } from "./anthropic.js";
import { utcDate, type ProviderDeps } from "./base.js";
import { OpenAIUsageProvider } from "./openai.js";
import { reconcileUsage } from "./reconcile.js";
import {
  PROVIDER_NAMES,
  type ModelUsage,
  type ProviderHealth,
  type ProviderName,
  type ProviderUsageSummary,
  type UsageProvider,
  type UsageRecord,
} from "./types.js";

const log = createLogger("provider-manager");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProviderManagerOptions {
  store: EventStore;
  /** Sessions that collected usage is reconciled against. */
  sessions: () => SessionAggregate[];
  deps?: ProviderDeps;
  /** Replaces the built-in clients; used by tests and embedders. */
  providers?: UsageProvider[];
  now?: () => Date;
}

export type CollectionResult = { records: number } | { error: string };

interface ProviderState {
  provider: UsageProvider;
  lastCollectedAt?: Date;
  lastError?: string;
}

export function createProviders(config: DevpulseConfig["providers"], deps: ProviderDeps = {}): UsageProvider[] {
  return [new OpenAIUsageProvider(config.openai, deps), new AnthropicUsageProvider(config.anthropic, deps)];
}

export function summarizeUsage(provider: ProviderName, records: UsageRecord[], days: number): ProviderUsageSummary {
  const byModel: Record<string, ModelUsage> = {};
  const daily = new Map<string, ModelUsage & { date: string }>();
  let totalCost = 0;
  let totalTokens = 0;
  let totalRequests = 0;

  for (const r of records) {
    totalCost += r.costUsd;
    totalTokens += r.totalTokens;
    totalRequests += r.requests;

    const model = (byModel[r.model] ??= { cost: 0, tokens: 0, requests: 0 });
    model.cost += r.costUsd;
    model.tokens += r.totalTokens;
    model.requests += r.requests;

    let day = daily.get(r.date);
    if (!day) {
      day = { date: r.date, cost: 0, tokens: 0, requests: 0 };
      daily.set(r.date, day);
    }
    day.cost += r.costUsd;
    day.tokens += r.totalTokens;
    day.requests += r.requests;
  }

  return {
    provider,
    periodDays: days,
    totalCost,
    totalTokens,
    totalRequests,
    byModel,
    dailyBreakdown: [...daily.values()].sort((a, b) => a.date.localeCompare(b.date)),
  };
}

/**
 * Owns the usage providers: which are active, when they collect, and where
 * their records go.
 */
export class ProviderManager {
  private readonly states = new Map<ProviderName, ProviderState>();
  private readonly jobs = new Map<ProviderName, Cron>();
  private readonly providers: UsageProvider[];
  private readonly now: () => Date;

  constructor(
    private readonly config: DevpulseConfig["providers"],
    private readonly options: ProviderManagerOptions,
  ) {
    this.providers = options.providers ?? createProviders(config, options.deps);
    this.now = options.now ?? (() => new Date());
  }

  /** Activates every enabled, valid provider; a failing one is logged and left out. */
  async initialize(): Promise<ProviderName[]> {
    for (const provider of this.providers) {
      if (!provider.enabled) continue;
      const issues = validateProviderConfig(this.config[provider.name]);
      if (issues.length > 0) {
        log.warn(`Skipping ${provider.name}: ${issues.join("; ")}`);
        continue;
      }
      try {
        await provider.initialize();
        this.states.set(provider.name, { provider });
      } catch (err) {
        log.error(`Failed to initialize ${provider.name}: ${errorMessage(err)}`);
      }
    }
    log.info(`Active usage providers: ${[...this.states.keys()].join(", ") || "none"}`);
    return [...this.states.keys()];
  }

  /** Schedules collection per provider and runs a first collection right away. */
  start(): void {
    for (const name of this.states.keys()) {
      if (this.jobs.has(name)) continue;
      const job = new Cron(this.config[name].schedule, { name: `usage:${name}`, protect: true }, async () => {
        await this.collectLogged(name);
      });
      this.jobs.set(name, job);
      void this.collectLogged(name);
      log.info(`Scheduled ${name} usage collection (${this.config[name].schedule})`);
    }
  }

  stop(): void {
    for (const job of this.jobs.values()) job.stop();
    this.jobs.clear();
  }

  isActive(name: ProviderName): boolean {
    return this.states.has(name);
  }

  get activeProviders(): ProviderName[] {
    return [...this.states.keys()];
  }

  async collect(name: ProviderName, daysBack = 1): Promise<UsageRecord[]> {
    const state = this.states.get(name);
    if (!state) throw new ProviderError(name, "provider is not active");
    try {
      const fetched = await state.provider.fetchUsage(daysBack);
      const records = reconcileUsage(fetched, this.options.sessions());
      await this.options.store.saveUsageRecords(records);
      state.lastCollectedAt = this.now();
      state.lastError = undefined;
      return records;
    } catch (err) {
      state.lastError = errorMessage(err);
      throw err;
    }
  }

  async collectAll(daysBack = 1): Promise<Partial<Record<ProviderName, CollectionResult>>> {
    const names = [...this.states.keys()];
    const settled = await Promise.allSettled(names.map((name) => this.collect(name, daysBack)));
    const results: Partial<Record<ProviderName, CollectionResult>> = {};
    settled.forEach((outcome, index) => {
      const name = names[index];
      if (!name) return;
      results[name] =
        outcome.status === "fulfilled" ? { records: outcome.value.length } : { error: errorMessage(outcome.reason) };
    });
    return results;
  }

  async getUsageSummary(name: ProviderName, days = 7): Promise<ProviderUsageSummary> {
    const since = utcDate(new Date(this.now().getTime() - days * DAY_MS));
    const records = await this.options.store.listUsageRecords(name, since);
    return summarizeUsage(name, records, days);
  }

  async getAllUsageSummaries(days = 7): Promise<Partial<Record<ProviderName, ProviderUsageSummary>>> {
    const summaries: Partial<Record<ProviderName, ProviderUsageSummary>> = {};
    for (const name of this.states.keys()) {
      summaries[name] = await this.getUsageSummary(name, days);
    }
    return summaries;
  }

  healthChecks(): ProviderHealth[] {
    return PROVIDER_NAMES.map((name) => {
      const state = this.states.get(name);
      const health: ProviderHealth = {
        provider: name,
        status: state && !state.lastError ? "healthy" : "unhealthy",
        enabled: this.config[name].enabled,
        running: this.jobs.has(name),
      };
      if (state?.lastCollectedAt) health.lastCollectedAt = state.lastCollectedAt.toISOString();
      if (state?.lastError) health.error = state.lastError;
      else if (!state) health.error = this.config[name].enabled ? "provider failed to initialize" : "provider disabled";
      return health;
    });
  }

  getSummary(): { configured: ProviderName[]; active: ProviderName[]; running: ProviderName[] } {
    return {
      configured: PROVIDER_NAMES.filter((name) => this.config[name].enabled),
      active: this.activeProviders,
      running: [...this.jobs.keys()],
    };
  }

  private async collectLogged(name: ProviderName): Promise<void> {
    try {
      const records = await this.collect(name);
      log.info(`Stored ${records.length} ${name} usage records`);
    } catch (err) {
      log.error(`Scheduled ${name} collection failed: ${errorMessage(err)}`);
    }
  }
}
