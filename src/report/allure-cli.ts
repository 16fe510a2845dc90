/**
 * Wrappers around the Allure command-line tool.
 *
 * The `allure` binary comes from the allure-commandline npm package (installed
 * globally by installAllure) and needs a Java runtime. Each wrapper returns
 * true on success and logs the reason when it returns false.
 */

import { spawnSync, type SpawnSyncOptions } from "node:child_process";
import fs from "node:fs";
import path from "node:path";

import { makeLogger } from "../logging/logger";

const log = makeLogger({ component: "allure-cli" });

export const ALLURE_BIN = "allure";
export const ALLURE_NPM_PACKAGE = "allure-commandline";

interface RunResult {
  ok: boolean;
  detail: string;
  signal: NodeJS.Signals | null;
}

function run(command: string, args: string[], options: SpawnSyncOptions = {}): RunResult {
  const result = spawnSync(command, args, options);
  if (result.error) {
    return { ok: false, detail: result.error.message, signal: null };
  }
  if (result.status !== 0) {
    const signal = result.signal ? ` (signal ${result.signal})` : "";
    return {
      ok: false,
      detail: `${command} ${args.join(" ")} exited with ${String(result.status)}${signal}`,
      signal: result.signal,
    };
  }
  return { ok: true, detail: "", signal: null };
}

export function isAllureInstalled(): boolean {
  return run(ALLURE_BIN, ["--version"], { stdio: "ignore" }).ok;
}

export function installAllure(): boolean {
  log.info({ pkg: ALLURE_NPM_PACKAGE }, "installing Allure command line tool");
  const result = run("npm", ["install", "-g", ALLURE_NPM_PACKAGE], { stdio: "inherit" });
  if (!result.ok) {
    log.error(
      { detail: result.detail },
      "failed to install Allure via npm; download it from https://github.com/allure-framework/allure2/releases or use a package manager",
    );
    return false;
  }
  log.info("Allure installed");
  return true;
}

/** True when `dir` exists and holds at least one .json result file. */
export function hasResults(dir: string): boolean {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return false;
  return fs.readdirSync(dir).some((entry) => path.extname(entry) === ".json");
}

export function generateReport(resultsDir: string, reportDir: string): boolean {
  if (!hasResults(resultsDir)) {
    log.error({ resultsDir }, "no Allure results found; run the e2e suites first (npm run test:e2e)");
    return false;
  }

  log.info({ resultsDir, reportDir }, "generating Allure report");
  const result = run(ALLURE_BIN, ["generate", resultsDir, "--clean", "-o", reportDir], {
    stdio: "inherit",
  });
  if (!result.ok) {
    log.error({ detail: result.detail }, "failed to generate Allure report");
    return false;
  }
  log.info({ reportDir }, "Allure report generated");
  return true;
}

function onServeInterrupt(): void {
  log.debug("interrupt received while serving");
}

/** Blocks until the server is stopped (Ctrl+C). */
export function serveReport(resultsDir: string): boolean {
  if (!hasResults(resultsDir)) {
    log.error({ resultsDir }, "no Allure results found; run the e2e suites first (npm run test:e2e)");
    return false;
  }

  log.info({ resultsDir }, "starting Allure report server; press Ctrl+C to stop");
  // Ctrl+C reaches this process as well as allure. A listener replaces
  // Node's default exit (130); it fires once spawnSync has returned.
  process.once("SIGINT", onServeInterrupt);
  const result = run(ALLURE_BIN, ["serve", resultsDir], { stdio: "inherit" });
  if (result.signal === "SIGINT") {
    log.info("Allure report server stopped");
    return true;
  }
  if (!result.ok) {
    log.error({ detail: result.detail }, "failed to serve Allure report");
    return false;
  }
  return true;
}

export function openReport(reportDir: string): boolean {
  if (!fs.existsSync(reportDir)) {
    log.error({ reportDir }, "no Allure report found; generate one first (npm run report -- generate)");
    return false;
  }

  log.info({ reportDir }, "opening Allure report");
  const result = run(ALLURE_BIN, ["open", reportDir], { stdio: "inherit" });
  if (!result.ok) {
    log.error({ detail: result.detail }, "failed to open Allure report");
    return false;
  }
  return true;
}
