import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { answersToConfig } from "./init.js";
import { optionsToPatch } from "./start.js";

describe("optionsToPatch", () => {
  it("maps flags onto config keys", () => {
    expect(
      optionsToPatch({ host: "127.0.0.1", port: "4317", apiPort: "9000", wsPort: "9000", logLevel: "debug", dashboard: false }),
    ).toEqual({
      host: "127.0.0.1",
      otlpPort: 4317,
      apiPort: 9000,
      wsPort: 9000,
      logging: { level: "debug" },
      dashboard: { enabled: false },
    });
  });

  it("leaves unset flags to lower layers", () => {
    expect(optionsToPatch({ dashboard: true })).toEqual({});
  });

  it("rejects bad ports and log levels", () => {
    expect(() => optionsToPatch({ port: "70000", dashboard: true })).toThrow(ConfigError);
    expect(() => optionsToPatch({ logLevel: "loud", dashboard: true })).toThrow("Invalid --log-level: --log-level: loud");
  });
});

describe("answersToConfig", () => {
  const base = { storage: "memory" as const, otlpPort: 4318, apiPort: 8000, wsPort: 8000, dashboard: true };

  it("writes only what the wizard asked for", () => {
    expect(answersToConfig({ ...base, openaiKey: "", anthropicKey: "  " })).toEqual({
      otlpPort: 4318,
      apiPort: 8000,
      wsPort: 8000,
      storage: "memory",
      dashboard: { enabled: true },
    });
  });

  it("enables providers whose key was entered", () => {
    expect(
      answersToConfig({
        ...base,
        storage: "postgres",
        databaseUrl: "postgresql://localhost/devpulse",
        anthropicKey: "test-secret",
      }),
    ).toMatchObject({
      storage: "postgres",
      databaseUrl: "postgresql://localhost/devpulse",
      providers: { anthropic: { enabled: true, apiKey: "test-secret" } },
    });
  });
});
