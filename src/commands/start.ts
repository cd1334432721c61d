import chalk from "chalk";
import { Collector } from "../collector.js";
import { loadConfig } from "../config/loader.js";
import type { ConfigPatch } from "../config/schema.js";
import { ConfigError, errorMessage } from "../errors.js";
import { isLogLevel, setLogFile, setLogLevel } from "../logging/logger.js";

export interface StartOptions {
  config?: string;
  host?: string;
  port?: string;
  apiPort?: string;
  wsPort?: string;
  logLevel?: string;
  dashboard: boolean;
  demo?: boolean;
}

function port(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new ConfigError(`Invalid ${flag}`, [`${flag}: ${value}`]);
  return n;
}

/** CLI flags as the highest-precedence config layer. */
export function optionsToPatch(options: StartOptions): ConfigPatch {
  const patch: ConfigPatch = {};
  if (options.host) patch.host = options.host;
  const otlpPort = port(options.port, "--port");
  if (otlpPort !== undefined) patch.otlpPort = otlpPort;
  const apiPort = port(options.apiPort, "--api-port");
  if (apiPort !== undefined) patch.apiPort = apiPort;
  const wsPort = port(options.wsPort, "--ws-port");
  if (wsPort !== undefined) patch.wsPort = wsPort;
  if (options.logLevel) {
    if (!isLogLevel(options.logLevel)) throw new ConfigError("Invalid --log-level", [`--log-level: ${options.logLevel}`]);
    patch.logging = { level: options.logLevel };
  }
  if (!options.dashboard) patch.dashboard = { enabled: false };
  return patch;
}

export async function startCommand(options: StartOptions): Promise<void> {
  const config = loadConfig({ path: options.config, overrides: optionsToPatch(options) });
  setLogLevel(config.logging.level);
  setLogFile(config.logging.file);

  const collector = new Collector(config, { demo: options.demo });
  const ports = await collector.start();

  const local = config.host === "0.0.0.0" ? "localhost" : config.host;
  console.log();
  console.log(chalk.bold("  devpulse collector running"));
  console.log(chalk.gray("  ─────────────────────────────────────"));
  console.log(`  OTLP receiver:  ${chalk.cyan(`http://${local}:${ports.otlp}`)}`);
  console.log(`  REST API:       ${chalk.cyan(`http://${local}:${ports.api}`)}`);
  console.log(`  WebSocket:      ${chalk.cyan(`ws://${local}:${ports.ws}`)}`);
  console.log(`  Storage:        ${config.storage}`);
  if (options.demo) console.log(`  Demo feed:      ${chalk.yellow("on")}`);
  console.log(chalk.gray("  ─────────────────────────────────────"));
  console.log();
  console.log("  Point your assistant at this collector:");
  console.log(chalk.gray("    export CLAUDE_CODE_ENABLE_TELEMETRY=1"));
  console.log(chalk.gray("    export OTEL_METRICS_EXPORTER=otlp OTEL_LOGS_EXPORTER=otlp"));
  console.log(chalk.gray("    export OTEL_EXPORTER_OTLP_PROTOCOL=http/json"));
  console.log(chalk.gray(`    export OTEL_EXPORTER_OTLP_ENDPOINT=http://${local}:${ports.otlp}`));
  console.log();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(chalk.gray(`\n  Received ${signal}, shutting down...`));
    collector
      .stop()
      .then(() => {
        collector.dashboard?.printSummary();
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error(chalk.red(`  Shutdown failed: ${errorMessage(err)}`));
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
