#!/usr/bin/env node
import { Command } from "commander";
import { validateEnv } from "../env.js";
import { HarnessClient } from "./harness-client.js";
import {
  consoleOutput,
  failCommand,
  listCommand,
  passCommand,
  statusCommand,
  timeCommand,
  toggleCommand,
} from "./commands.js";

validateEnv();

const program = new Command();

program
  .name("harness-control")
  .description("Drive the test harness endpoints used to exercise Alertmanager notifications")
  .version("0.1.0")
  .option("-u, --base-url <url>", "Test harness base URL", process.env.HARNESS_URL ?? "http://localhost:8082");

function client(): HarnessClient {
  const { baseUrl } = program.opts<{ baseUrl: string }>();
  return new HarnessClient(baseUrl);
}

program.command("list").alias("ls").description("List all endpoints and their status")
  .action(() => listCommand(client(), consoleOutput));

program.command("status").argument("<endpoint>").description("Show the health status of one harness endpoint (not container status)")
  .action((endpoint: string) => statusCommand(client(), consoleOutput, endpoint));

program.command("fail").alias("down-endpoint").argument("<endpoint>").description("Make endpoint fail")
  .action((endpoint: string) => failCommand(client(), consoleOutput, endpoint));

program.command("pass").alias("up-endpoint").argument("<endpoint>").description("Make endpoint pass")
  .action((endpoint: string) => passCommand(client(), consoleOutput, endpoint));

program.command("toggle").argument("<endpoint>").description("Toggle endpoint status")
  .action((endpoint: string) => toggleCommand(client(), consoleOutput, endpoint));

program.command("time").description("Show current time and time-based endpoint status")
  .action(() => timeCommand(client(), consoleOutput));

try {
  await program.parseAsync(process.argv);
} catch (err) {
  consoleOutput.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
