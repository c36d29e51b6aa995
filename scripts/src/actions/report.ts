#!/usr/bin/env node
import { logger } from "../utils/logger.js";
import { runReportCli } from "./report_cli.js";

async function main(): Promise<void> {
  process.exitCode = await runReportCli(process.argv.slice(2));
}

void main().catch((error) => {
  logger.error("Specialization report failed", { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
