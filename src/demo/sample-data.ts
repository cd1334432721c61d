import type { AggregationEngine } from "../engine/aggregation-engine.js";
import { METRIC_NAMES } from "../engine/metric-handlers.js";
import { createLogger } from "../logging/logger.js";
import { calculateCost } from "../providers/pricing.js";
import { logEnvelope, metricEnvelope, spanEnvelope } from "../telemetry/envelopes.js";
import type { AttributeMap, EventEnvelope } from "../telemetry/types.js";

const log = createLogger("demo");

/** Uniform in [0, 1). */
export type Rng = () => number;

const MODELS = ["claude-3-5-sonnet-20241022", "claude-3-5-haiku-20241022", "claude-3-opus-20240229"] as const;

const PROMPT_TYPES = [
  "code_generation",
  "code_explanation",
  "debugging",
  "refactoring",
  "documentation",
  "testing",
  "general",
] as const;

type PromptType = (typeof PROMPT_TYPES)[number];

const PROJECTS = [
  "/home/user/projects/web-app",
  "/home/user/projects/api-service",
  "/home/user/projects/data-pipeline",
  "/home/user/projects/mobile-app",
];

const TOOLS = ["Edit", "Write", "MultiEdit", "NotebookEdit"];

/** [request min, request max, response min, response max] */
const TOKEN_RANGES: Partial<Record<PromptType, [number, number, number, number]>> = {
  code_generation: [100, 500, 200, 1000],
  code_explanation: [150, 800, 100, 600],
  debugging: [200, 600, 150, 400],
};
const DEFAULT_TOKEN_RANGE: [number, number, number, number] = [50, 300, 50, 400];

export interface DemoSession {
  sessionId: string;
  resource: AttributeMap;
  /** Running total; the cost metric reports it cumulatively. */
  costUsd: number;
  interactions: number;
}

export interface GeneratedSession {
  session: DemoSession;
  envelopes: EventEnvelope[];
  /** Set when the simulated session finished. */
  endTime?: Date;
}

export interface DemoFeed {
  stop(): void;
}

export interface SampleDataOptions {
  rng?: Rng;
  clock?: () => Date;
}

/** Simulated coding-assistant telemetry, shaped like what the receiver decodes. */
export class SampleDataGenerator {
  private readonly rng: Rng;
  private readonly clock: () => Date;
  private sequence = 0;

  constructor(options: SampleDataOptions = {}) {
    this.rng = options.rng ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
  }

  createSession(): DemoSession {
    const seq = String(++this.sequence).padStart(3, "0");
    const sessionId = `demo-${seq}-${this.int(1000, 9999)}`;
    const user = this.int(1, 100);
    return {
      sessionId,
      costUsd: 0,
      interactions: 0,
      resource: {
        "session.id": sessionId,
        "service.name": "claude-code",
        "service.version": "1.2.3",
        "project.path": this.pick(PROJECTS),
        "user.id": `user_${user}`,
        "user.email": `user_${user}@example.com`,
      },
    };
  }

  /** Every envelope one assistant turn produces at `at`. */
  interaction(session: DemoSession, at: Date = this.clock()): EventEnvelope[] {
    const model = this.pick(MODELS);
    const promptType = this.pick(PROMPT_TYPES);
    const [reqMin, reqMax, resMin, resMax] = TOKEN_RANGES[promptType] ?? DEFAULT_TOKEN_RANGE;
    const input = this.int(reqMin, reqMax);
    const output = this.int(resMin, resMax);
    const cacheRead = this.int(0, 2000);
    const responseTimeMs = this.responseTime(model);
    const resourceAttributes = session.resource;
    const index = session.interactions++;

    session.costUsd += calculateCost("anthropic", model, input, output);

    const envelopes: EventEnvelope[] = [
      metricEnvelope({
        name: METRIC_NAMES.tokenUsage,
        resourceAttributes,
        timestamp: at,
        unit: "tokens",
        dataPoints: [
          { value: input, attributes: { model, type: "input" } },
          { value: output, attributes: { model, type: "output" } },
          { value: cacheRead, attributes: { model, type: "cacheRead" } },
        ],
      }),
      metricEnvelope({
        name: METRIC_NAMES.costUsage,
        resourceAttributes,
        timestamp: at,
        unit: "USD",
        dataPoints: [{ value: session.costUsd, attributes: { model } }],
      }),
    ];

    if (this.chance(0.5)) {
      envelopes.push(
        metricEnvelope({
          name: METRIC_NAMES.linesOfCode,
          resourceAttributes,
          timestamp: at,
          dataPoints: [
            { value: this.int(1, 80), attributes: { type: "added" } },
            { value: this.int(0, 40), attributes: { type: "removed" } },
          ],
        }),
      );
    }
    if (this.chance(0.4)) {
      const decision = this.chance(0.8) ? "accept" : "reject";
      envelopes.push(
        metricEnvelope({
          name: METRIC_NAMES.toolDecision,
          resourceAttributes,
          timestamp: at,
          dataPoints: [{ value: 1, attributes: { decision, tool_name: this.pick(TOOLS) } }],
        }),
      );
    }
    if (this.chance(0.1)) {
      envelopes.push(
        metricEnvelope({ name: METRIC_NAMES.commitCount, resourceAttributes, timestamp: at, dataPoints: [{ value: 1 }] }),
      );
    }
    if (this.chance(0.3)) {
      envelopes.push(
        spanEnvelope({
          name: "claude_ai_interaction",
          spanId: `${session.sessionId}_span_${index}`,
          traceId: `${session.sessionId}_trace`,
          resourceAttributes,
          timestamp: at,
          durationMs: responseTimeMs,
          attributes: { "model.name": model, "prompt.type": promptType },
        }),
      );
    }
    envelopes.push(
      logEnvelope({
        body: "claude_code.api_request",
        resourceAttributes,
        timestamp: at,
        attributes: { model, duration_ms: responseTimeMs, input_tokens: input, output_tokens: output },
      }),
    );
    return envelopes;
  }

  /** A complete back-dated session of `count` turns (3 to 15 when omitted). */
  session(count = this.int(3, 15)): GeneratedSession {
    const session = this.createSession();
    const now = this.clock().getTime();
    let at = now - (this.int(5, 120) * 60 + this.int(0, 59)) * 1000;
    const envelopes: EventEnvelope[] = [];
    for (let i = 0; i < count; i++) {
      envelopes.push(...this.interaction(session, new Date(at)));
      at += (this.int(1, 10) * 60 + this.int(0, 59)) * 1000;
    }
    const generated: GeneratedSession = { session, envelopes };
    if (this.chance(0.7)) generated.endTime = new Date(at);
    return generated;
  }

  /**
   * Feeds `engine` one turn per tick, keeping up to `maxSessions` demo
   * sessions open and ending one now and then.
   */
  startContinuous(engine: AggregationEngine, intervalMs = 3000, maxSessions = 3): DemoFeed {
    const active: DemoSession[] = [];
    const tick = () => {
      if (active.length < maxSessions && (active.length === 0 || this.chance(0.3))) {
        active.push(this.createSession());
      }
      const index = this.int(0, active.length - 1);
      const session = active[index];
      if (!session) return;
      engine.ingestAll(this.interaction(session));
      if (session.interactions >= 3 && this.chance(0.1)) {
        engine.endSession(session.sessionId);
        active.splice(index, 1);
        log.debug(`Demo session ${session.sessionId} ended after ${session.interactions} turns`);
      }
    };
    const timer = setInterval(tick, intervalMs);
    log.info(`Demo feed started (every ${intervalMs}ms)`);
    return {
      stop: () => {
        clearInterval(timer);
        log.info("Demo feed stopped");
      },
    };
  }

  private responseTime(model: string): number {
    if (model.includes("opus")) return this.int(2000, 8000);
    if (model.includes("haiku")) return this.int(500, 2000);
    return this.int(1000, 4000);
  }

  private int(min: number, max: number): number {
    return min + Math.floor(this.rng() * (max - min + 1));
  }

  private chance(p: number): boolean {
    return this.rng() < p;
  }

  private pick<T>(items: readonly T[]): T {
    const item = items[this.int(0, items.length - 1)];
    if (item === undefined) throw new RangeError("pick from an empty list");
    return item;
  }
}
