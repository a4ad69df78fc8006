import chalk from "chalk";
import type { HarnessClient, TimeStatus } from "./harness-client.js";
import { minuteBasedHealthy, secondBasedHealthy } from "../harness/state.js";

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function requireEndpoint(endpoint: string | undefined): string {
  const name = endpoint?.trim();
  if (!name) throw new Error("Endpoint name required");
  return name;
}

export async function listCommand(client: HarnessClient, out: Output): Promise<void> {
  const states = await client.list();
  out.log("📋 Current endpoint status:");
  for (const [name, state] of Object.entries(states)) {
    const dot = state.healthy ? chalk.green("●") : chalk.red("●");
    out.log(`${dot} ${name} - ${state.message}`);
  }
}

export async function statusCommand(client: HarnessClient, out: Output, endpoint?: string): Promise<void> {
  const name = requireEndpoint(endpoint);
  const status = await client.status(name);
  out.log(`📊 Status for endpoint '${name}':`);
  out.log(JSON.stringify(status, null, 2));
}

export async function failCommand(client: HarnessClient, out: Output, endpoint?: string): Promise<void> {
  const name = requireEndpoint(endpoint);
  out.log(chalk.red(`Making endpoint '${name}' fail...`));
  const state = await client.setState(name, { healthy: false, status: 503, message: "Manually set to fail" });
  out.log(JSON.stringify(state, null, 2));
  out.log(`✅ Endpoint '${name}' is now failing`);
}

export async function passCommand(client: HarnessClient, out: Output, endpoint?: string): Promise<void> {
  const name = requireEndpoint(endpoint);
  out.log(chalk.green(`Making endpoint '${name}' pass...`));
  const state = await client.setState(name, { healthy: true, status: 200, message: "Manually set to pass" });
  out.log(JSON.stringify(state, null, 2));
  out.log(`✅ Endpoint '${name}' is now passing`);
}

export async function toggleCommand(client: HarnessClient, out: Output, endpoint?: string): Promise<void> {
  const name = requireEndpoint(endpoint);
  const current = await client.status(name);
  if (current.healthy) {
    await failCommand(client, out, name);
  } else {
    await passCommand(client, out, name);
  }
}

function describeTimeStatus(label: string, status: TimeStatus): string {
  const verdict = status.healthy ? chalk.green("passing") : chalk.red("failing");
  return `${label}: ${verdict} (${status.message})`;
}

export async function timeCommand(client: HarnessClient, out: Output, now: Date = new Date()): Promise<void> {
  const minute = now.getMinutes();
  const second = now.getSeconds();
  out.log("🕐 Current time and time-based endpoint status:");
  out.log(`Current time: ${now.toString()}`);
  out.log(`Minute: ${minute} (${minuteBasedHealthy(now) ? "odd - PASSING" : "even - FAILING"})`);
  out.log(`Second: ${second} (${secondBasedHealthy(now) ? ">=20 - PASSING" : "<20 - FAILING"})`);
  out.log(describeTimeStatus("Minute-based (/time-based)", await client.timeBased()));
  out.log(describeTimeStatus("Second-based (/second-based)", await client.secondBased()));
}
