import chalk from "chalk";
import WebSocket from "ws";
import { loadConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import { getJson, HealthSchema } from "./client.js";
import { z } from "zod";

export interface StatusOptions {
  config?: string;
  host?: string;
}

function probeWebSocket(url: string, timeoutMs = 3000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new WebSocket(url);
    const timeout = setTimeout(() => {
      socket.terminate();
      resolve(false);
    }, timeoutMs);
    socket.on("open", () => {
      clearTimeout(timeout);
      socket.close();
      resolve(true);
    });
    socket.on("error", () => {
      clearTimeout(timeout);
      resolve(false);
    });
  });
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const config = loadConfig({ path: options.config });
  const host = options.host ?? "localhost";
  const apiUrl = `http://${host}:${config.apiPort}`;
  const otlpUrl = `http://${host}:${config.otlpPort}`;
  const wsUrl = `ws://${host}:${config.wsPort}`;

  console.log();
  console.log(chalk.bold("  devpulse status"));
  console.log(chalk.gray("  ─────────────────────────────────────"));

  try {
    const health = await getJson(apiUrl, "/health", HealthSchema, 3000);
    console.log(`  ${chalk.green("●")} REST API       ${apiUrl}`);
    console.log(`    Sessions:      ${health.sessions}`);
    console.log(`    Active:        ${health.activeSessions}`);
    console.log(`    WS Clients:    ${health.wsClients}`);
  } catch (err) {
    console.log(`  ${chalk.red("●")} REST API       not running ${chalk.gray(`(${errorMessage(err)})`)}`);
  }

  try {
    await getJson(otlpUrl, "/health", z.object({ status: z.literal("ok") }), 3000);
    console.log(`  ${chalk.green("●")} OTLP receiver  ${otlpUrl}`);
  } catch (err) {
    console.log(`  ${chalk.red("●")} OTLP receiver  not running ${chalk.gray(`(${errorMessage(err)})`)}`);
  }

  const ws = await probeWebSocket(wsUrl);
  console.log(`  ${ws ? chalk.green("●") : chalk.red("●")} WebSocket      ${ws ? wsUrl : "not reachable"}`);

  console.log(chalk.gray("  ─────────────────────────────────────"));
  console.log();
}
