import chalk from "chalk";
import { ConsoleFormatter } from "../display/formatter.js";
import { errorMessage } from "../errors.js";
import { isProviderName } from "../providers/types.js";
import { AllUsageSchema, DEFAULT_API_URL, getJson, UsageSummarySchema } from "./client.js";

export interface UsageOptions {
  api?: string;
  days?: string;
}

export async function usageCommand(provider: string | undefined, options: UsageOptions): Promise<void> {
  const api = options.api ?? DEFAULT_API_URL;
  const days = Number.parseInt(options.days ?? "7", 10) || 7;
  const f = new ConsoleFormatter();

  if (provider !== undefined && !isProviderName(provider)) {
    console.log(chalk.red(`  Unknown provider ${provider}; expected openai or anthropic`));
    process.exitCode = 1;
    return;
  }

  console.log();
  try {
    if (provider) {
      console.log(f.usage(await getJson(api, `/analytics/usage/${provider}?days=${days}`, UsageSummarySchema)));
    } else {
      const all = await getJson(api, `/analytics/usage?days=${days}`, AllUsageSchema);
      const summaries = Object.values(all.providers);
      if (summaries.length === 0) console.log(chalk.yellow("  No usage providers are active"));
      for (const summary of summaries) {
        console.log(f.usage(summary));
        console.log();
      }
    }
  } catch (err) {
    console.log(chalk.red(`  Could not fetch usage from ${api}: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
  console.log();
}
