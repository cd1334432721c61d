#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { sessionCommand, sessionsCommand } from "./commands/sessions.js";
import { startCommand } from "./commands/start.js";
import { statusCommand } from "./commands/status.js";
import { usageCommand } from "./commands/usage.js";
import { CONFIG_FILE } from "./config/defaults.js";
import { ConfigError, errorMessage } from "./errors.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("devpulse")
  .description("OpenTelemetry collector that rebuilds AI coding sessions, with usage and cost tracking")
  .version(VERSION);

program
  .command("start")
  .description("Start the OTLP receiver, REST API and WebSocket feed")
  .option("--host <host>", "Interface to bind")
  .option("-p, --port <port>", "OTLP receiver port")
  .option("--api-port <port>", "REST API port")
  .option("-w, --ws-port <port>", "WebSocket port")
  .option("--log-level <level>", "silly, trace, debug, info, warn, error or fatal")
  .option("--no-dashboard", "Disable the live console dashboard")
  .option("--demo", "Feed generated sessions into the collector")
  .option("--config <path>", "Config file path", CONFIG_FILE)
  .action(startCommand);

program
  .command("init")
  .description("Create a devpulse configuration")
  .option("-d, --dir <dir>", "Directory for config file", ".")
  .action(initCommand);

program
  .command("status")
  .description("Show status of running devpulse services")
  .option("--host <host>", "Host the collector runs on", "localhost")
  .option("--config <path>", "Config file path", CONFIG_FILE)
  .action(statusCommand);

program
  .command("sessions")
  .description("List sessions known to a running collector")
  .option("--api <url>", "REST API base URL")
  .option("-n, --limit <n>", "Sessions to show", "20")
  .action(sessionsCommand);

program
  .command("session <id>")
  .description("Show one session and its interactions")
  .option("--api <url>", "REST API base URL")
  .action(sessionCommand);

program
  .command("usage [provider]")
  .description("Show provider usage and cost")
  .option("--api <url>", "REST API base URL")
  .option("--days <days>", "Days to cover", "7")
  .action(usageCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`  ${errorMessage(err)}`));
  process.exitCode = err instanceof ConfigError ? 2 : 1;
});
