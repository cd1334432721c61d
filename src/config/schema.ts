import { z } from "zod";

export const LogLevelSchema = z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * One shape, built twice: `checked` adds the value bounds. A config file is
 * read with the unchecked shape so that bound violations from every layer are
 * reported together once the layers are merged.
 */
function configObject(checked: boolean) {
  const num = (bound: (n: z.ZodNumber) => z.ZodNumber) => (checked ? bound(z.number()) : z.number());
  const str = (bound: (s: z.ZodString) => z.ZodString) => (checked ? bound(z.string()) : z.string());
  const port = () => num((n) => n.int().min(0).max(65535));

  // Retry and timeout bounds are checked by validateProviderConfigs, which
  // disables the one provider instead of refusing to start.
  const provider = z.object({
    enabled: z.boolean(),
    apiKey: str((s) => s.min(1)).optional(),
    organizationId: str((s) => s.min(1)).optional(),
    baseUrl: str((s) => s.url()),
    /** Cron pattern for scheduled collection. */
    schedule: str((s) => s.min(1)),
    timeoutMs: num((n) => n.int()),
    maxRetries: num((n) => n.int()),
  });

  return z.object({
    host: str((s) => s.min(1)),
    otlpPort: port(),
    apiPort: port(),
    /** Same value as apiPort serves WebSocket on the API server. */
    wsPort: port(),
    storage: z.enum(["memory", "postgres"]),
    databaseUrl: str((s) => s.min(1)).optional(),
    maxEventHistory: num((n) => n.int().nonnegative()),
    logRetentionDays: num((n) => n.int().positive()),
    dashboard: z.object({
      enabled: z.boolean(),
      refreshMs: num((n) => n.int().min(250)),
    }),
    logging: z.object({
      level: LogLevelSchema,
      file: str((s) => s.min(1)).optional(),
    }),
    providers: z.object({
      openai: provider,
      anthropic: provider,
    }),
  });
}

export const ConfigObjectSchema = configObject(true);

export const ProviderConfigSchema = ConfigObjectSchema.shape.providers.shape.openai;

export const ConfigSchema = ConfigObjectSchema.superRefine((config, ctx) => {
  if (config.storage === "postgres" && !config.databaseUrl) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["databaseUrl"],
      message: "databaseUrl is required when storage is postgres",
    });
  }
});

/** What a config file, the environment or CLI flags may set: types and keys only. */
export const ConfigPatchSchema = configObject(false).deepPartial().strict();

export type DevpulseConfig = z.infer<typeof ConfigSchema>;
export type ConfigPatch = z.infer<typeof ConfigPatchSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
