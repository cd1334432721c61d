import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { ProviderName } from "./types.js";

const log = createLogger("pricing");

const PRICING_FILE = new URL("../../data/pricing.json", import.meta.url);

/** USD per 1K tokens. */
const ModelPriceSchema = z.object({ input: z.number().nonnegative(), output: z.number().nonnegative() });

const ProviderPricingSchema = z
  .object({ default: z.string(), models: z.record(ModelPriceSchema) })
  .refine((p) => p.default in p.models, { message: "default model must have a price" });

const PricingTableSchema = z.object({ openai: ProviderPricingSchema, anthropic: ProviderPricingSchema });

export type ModelPrice = z.infer<typeof ModelPriceSchema>;
export type PricingTable = z.infer<typeof PricingTableSchema>;

let cached: PricingTable | undefined;

export function loadPricing(): PricingTable {
  if (cached) return cached;
  const parsed = PricingTableSchema.safeParse(JSON.parse(readFileSync(PRICING_FILE, "utf8")));
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid pricing table",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  cached = parsed.data;
  return cached;
}

/**
 * Price key for a model: the exact name, else the longest key the name
 * contains (dated releases such as `gpt-4o-2024-08-06`), else the
 * provider default.
 */
export function resolvePriceKey(provider: ProviderName, model: string, table = loadPricing()): string {
  const { models, default: fallback } = table[provider];
  const name = model.toLowerCase();
  if (name in models) return name;

  let best: string | undefined;
  for (const key of Object.keys(models)) {
    if (name.includes(key) && (!best || key.length > best.length)) best = key;
  }
  if (best) return best;

  log.warn(`Unknown ${provider} model '${model}', using ${fallback} pricing`);
  return fallback;
}

export function calculateCost(
  provider: ProviderName,
  model: string,
  inputTokens: number,
  outputTokens: number,
  table = loadPricing(),
): number {
  const key = resolvePriceKey(provider, model, table);
  const price = table[provider].models[key] ?? { input: 0, output: 0 };
  return (inputTokens / 1000) * price.input + (outputTokens / 1000) * price.output;
}

export function supportedModels(provider: ProviderName, table = loadPricing()): string[] {
  return Object.keys(table[provider].models);
}
