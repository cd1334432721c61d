import type { DevpulseConfig } from "./schema.js";

export const CONFIG_FILE = "devpulse.config.json";

export const DEFAULT_CONFIG: DevpulseConfig = {
  host: "0.0.0.0",
  otlpPort: 4318,
  apiPort: 8000,
  wsPort: 8001,
  storage: "memory",
  maxEventHistory: 1000,
  logRetentionDays: 7,
  dashboard: {
    enabled: true,
    refreshMs: 2000,
  },
  logging: {
    level: "info",
  },
  providers: {
    openai: {
      enabled: false,
      baseUrl: "https://api.openai.com/v1",
      schedule: "0 */6 * * *",
      timeoutMs: 30_000,
      maxRetries: 3,
    },
    anthropic: {
      enabled: false,
      baseUrl: "https://api.anthropic.com",
      schedule: "0 */6 * * *",
      timeoutMs: 30_000,
      maxRetries: 3,
    },
  },
};
