/**
 * `npm run report -- <command>`: generate, serve or open the Allure report,
 * or install the Allure command-line tool.
 *
 * Exit codes: 0 success (or usage), 1 failure, 2 unknown command.
 */

import { loadReportEnv } from "../config/env";
import {
  generateReport,
  installAllure,
  isAllureInstalled,
  openReport,
  serveReport,
} from "./allure-cli";

export const REPORT_COMMANDS = ["serve", "generate", "open", "install"] as const;
export type ReportCommand = (typeof REPORT_COMMANDS)[number];

export const USAGE = [
  "Allure Report Generator",
  "",
  "Usage:",
  "  npm run report -- serve     Serve report locally",
  "  npm run report -- generate  Generate static report",
  "  npm run report -- open      Open generated report",
  "  npm run report -- install   Install Allure CLI",
].join("\n");

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const stdio: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function isReportCommand(value: string): value is ReportCommand {
  return REPORT_COMMANDS.some((command) => command === value);
}

export function runReportCli(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
  io: CliIo = stdio,
): number {
  const [first] = argv;
  if (first === undefined) {
    io.out(USAGE);
    return 0;
  }

  const command = first.toLowerCase();
  if (!isReportCommand(command)) {
    io.err(`Unknown command: ${first}`);
    io.err(`Available commands: ${REPORT_COMMANDS.join(", ")}`);
    return 2;
  }

  if (command === "install") {
    if (isAllureInstalled()) {
      io.out("Allure is already installed");
      return 0;
    }
    return installAllure() ? 0 : 1;
  }

  if (!isAllureInstalled()) {
    io.err("Allure not installed. Run 'npm run report -- install' first");
    return 1;
  }

  const { ALLURE_RESULTS_DIR, ALLURE_REPORT_DIR } = loadReportEnv(env);
  switch (command) {
    case "serve":
      return serveReport(ALLURE_RESULTS_DIR) ? 0 : 1;
    case "generate":
      return generateReport(ALLURE_RESULTS_DIR, ALLURE_REPORT_DIR) ? 0 : 1;
    case "open":
      return openReport(ALLURE_REPORT_DIR) ? 0 : 1;
  }
}
