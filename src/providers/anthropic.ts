import { z } from "zod";
import { HttpUsageProvider, type UsagePage } from "./base.js";
import { calculateCost } from "./pricing.js";
import type { UsageRecord } from "./types.js";

export const ANTHROPIC_VERSION = "2023-06-01";

const MessagesResultSchema = z.object({
  model: z.string().nullish(),
  uncached_input_tokens: z.number().default(0),
  cache_read_input_tokens: z.number().default(0),
  cache_creation: z
    .object({
      ephemeral_1h_input_tokens: z.number().default(0),
      ephemeral_5m_input_tokens: z.number().default(0),
    })
    .nullish(),
  output_tokens: z.number().default(0),
});

const BucketSchema = z.object({
  starting_at: z.string(),
  ending_at: z.string(),
  results: z.array(MessagesResultSchema).default([]),
});

const PageSchema = z.object({
  data: z.array(BucketSchema),
  has_more: z.boolean().default(false),
  next_page: z.string().nullish(),
});

type MessagesBucket = z.infer<typeof BucketSchema>;

/**
 * Organization messages usage report. The report carries token counts only,
 * so `requests` stays 0; cache reads and writes count as input tokens.
 */
export class AnthropicUsageProvider extends HttpUsageProvider<MessagesBucket> {
  readonly name = "anthropic" as const;

  protected endpoint(): URL {
    return new URL(`${this.config.baseUrl.replace(/\/+$/, "")}/v1/organizations/usage_report/messages`);
  }

  protected headers(apiKey: string): Record<string, string> {
    return {
      "x-api-key": apiKey,
      "anthropic-version": ANTHROPIC_VERSION,
      "Content-Type": "application/json",
    };
  }

  protected query(start: Date, end: Date, limit: number): URLSearchParams {
    const params = new URLSearchParams({
      starting_at: start.toISOString(),
      ending_at: end.toISOString(),
      bucket_width: "1d",
      limit: String(limit),
    });
    params.append("group_by[]", "model");
    return params;
  }

  protected pageSchema(): z.ZodType<UsagePage<MessagesBucket>, z.ZodTypeDef, unknown> {
    return PageSchema;
  }

  protected toRecords(buckets: MessagesBucket[]): UsageRecord[] {
    const byKey = new Map<string, UsageRecord>();
    for (const bucket of buckets) {
      const date = bucket.starting_at.slice(0, 10);
      for (const result of bucket.results) {
        const model = result.model ?? "unknown";
        const cacheWrite =
          (result.cache_creation?.ephemeral_1h_input_tokens ?? 0) + (result.cache_creation?.ephemeral_5m_input_tokens ?? 0);
        const key = `${date}:${model}`;
        let record = byKey.get(key);
        if (!record) {
          record = {
            provider: "anthropic",
            date,
            model,
            requests: 0,
            inputTokens: 0,
            outputTokens: 0,
            totalTokens: 0,
            costUsd: 0,
            organizationId: this.config.organizationId,
            raw: { bucket_start: bucket.starting_at, bucket_end: bucket.ending_at },
          };
          byKey.set(key, record);
        }
        record.inputTokens += result.uncached_input_tokens + result.cache_read_input_tokens + cacheWrite;
        record.outputTokens += result.output_tokens;
      }
    }
    return [...byKey.values()]
      .filter((r) => r.inputTokens > 0 || r.outputTokens > 0)
      .map((r) => ({
        ...r,
        totalTokens: r.inputTokens + r.outputTokens,
        costUsd: calculateCost("anthropic", r.model, r.inputTokens, r.outputTokens),
      }));
  }
}
