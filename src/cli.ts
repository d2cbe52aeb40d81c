#!/usr/bin/env node
import { Command } from "commander";

import { runAssessCommand } from "./commands/assess.js";
import { runDashboardCommand } from "./commands/dashboard.js";
import { runWorkflowCommand } from "./commands/run.js";
import { runServeCommand } from "./commands/serve.js";
import { isShareGateError } from "./lib/errors.js";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("sharegate")
    .description("Classification-gated assessment sharing with an append-only audit trail")
    .version("0.1.0");

  program
    .command("run")
    .description("Assess, filter, encrypt, validate, transmit (simulated) and log")
    .option("--config <path>", "Path to sharegate.config.json")
    .option("--json", "Output machine-readable JSON")
    .option("--log-dir <dir>", "Directory for the transmission log and snapshots")
    .option("--classification <level>", "Record classification: PUBLIC, SENSITIVE, CONFIDENTIAL or TRIBAL_SOVEREIGN")
    .option("--destination <name>", "Destination partner recorded on each transmission")
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runWorkflowCommand(options);
    });

  program
    .command("assess")
    .description("Run the mock assessments and print their shareable results")
    .option("--config <path>", "Path to sharegate.config.json")
    .option("--json", "Output machine-readable JSON")
    .option("--internal", "Print the full internal results instead of the shareable view")
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runAssessCommand(options);
    });

  program
    .command("dashboard")
    .description("Summarize the transmission log as the receiving partner would see it")
    .option("--config <path>", "Path to sharegate.config.json")
    .option("--json", "Output machine-readable JSON")
    .option("--log-dir <dir>", "Directory holding the transmission log")
    .option("--detailed", "Also print every record's audit trail from the audit export")
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runDashboardCommand(options);
    });

  program
    .command("serve")
    .description("Start the HTTP status and rates stub")
    .option("--config <path>", "Path to sharegate.config.json")
    .option("--host <host>", "Interface to bind")
    .option("--port <port>", "Port to listen on")
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runServeCommand(options);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (isShareGateError(error)) {
    const statusText = error.status !== undefined ? ` (status ${error.status})` : "";
    console.error(`sharegate error [${error.code}]${statusText}: ${error.message}`);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`sharegate error: ${message}`);
  }
  process.exitCode = 30;
});
