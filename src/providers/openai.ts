import { z } from "zod";
import { HttpUsageProvider, utcDate, type UsagePage } from "./base.js";
import { calculateCost } from "./pricing.js";
import type { UsageRecord } from "./types.js";

const CompletionsResultSchema = z.object({
  model: z.string().nullish(),
  input_tokens: z.number().default(0),
  output_tokens: z.number().default(0),
  input_cached_tokens: z.number().default(0),
  num_model_requests: z.number().default(0),
  project_id: z.string().nullish(),
});

const BucketSchema = z.object({
  start_time: z.number(),
  end_time: z.number(),
  results: z.array(CompletionsResultSchema).default([]),
});

const PageSchema = z.object({
  data: z.array(BucketSchema),
  has_more: z.boolean().default(false),
  next_page: z.string().nullish(),
});

type CompletionsBucket = z.infer<typeof BucketSchema>;

/** Organization completions usage: `GET /organization/usage/completions`, grouped by model per day. */
export class OpenAIUsageProvider extends HttpUsageProvider<CompletionsBucket> {
  readonly name = "openai" as const;

  protected endpoint(): URL {
    return new URL(`${this.config.baseUrl.replace(/\/+$/, "")}/organization/usage/completions`);
  }

  protected headers(apiKey: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    };
    if (this.config.organizationId) headers["OpenAI-Organization"] = this.config.organizationId;
    return headers;
  }

  protected query(start: Date, end: Date, limit: number): URLSearchParams {
    return new URLSearchParams({
      start_time: String(Math.floor(start.getTime() / 1000)),
      end_time: String(Math.floor(end.getTime() / 1000)),
      bucket_width: "1d",
      group_by: "model",
      limit: String(limit),
    });
  }

  protected pageSchema(): z.ZodType<UsagePage<CompletionsBucket>, z.ZodTypeDef, unknown> {
    return PageSchema;
  }

  protected toRecords(buckets: CompletionsBucket[]): UsageRecord[] {
    const byKey = new Map<string, UsageRecord>();
    for (const bucket of buckets) {
      const date = utcDate(new Date(bucket.start_time * 1000));
      for (const result of bucket.results) {
        const model = result.model ?? "unknown";
        const key = `${date}:${model}`;
        let record = byKey.get(key);
        if (!record) {
          record = {
            provider: "openai",
            date,
            model,
            requests: 0,
            inputTokens: 0,
            outputTokens: 0,
            totalTokens: 0,
            costUsd: 0,
            organizationId: this.config.organizationId,
            raw: { bucket_start: bucket.start_time, bucket_end: bucket.end_time, input_cached_tokens: 0 },
          };
          byKey.set(key, record);
        }
        record.requests += result.num_model_requests;
        record.inputTokens += result.input_tokens;
        record.outputTokens += result.output_tokens;
        if (record.raw) {
          const cached = record.raw.input_cached_tokens;
          record.raw.input_cached_tokens = (typeof cached === "number" ? cached : 0) + result.input_cached_tokens;
        }
      }
    }
    return [...byKey.values()]
      .filter((r) => r.requests > 0 || r.inputTokens > 0 || r.outputTokens > 0)
      .map((r) => ({
        ...r,
        totalTokens: r.inputTokens + r.outputTokens,
        costUsd: calculateCost("openai", r.model, r.inputTokens, r.outputTokens),
      }));
  }
}
