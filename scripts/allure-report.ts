import "dotenv/config";

import { runReportCli } from "../src/report/cli";

process.exitCode = runReportCli(process.argv.slice(2));
