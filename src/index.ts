#!/usr/bin/env node
import { loadConfig, normalizeBaseUrl } from "./config/index.js";
import type { SuiteConfig } from "./config/index.js";
import { getHelpText, parseArgs, type CliOptions } from "./cli/parser.js";
import * as display from "./cli/display.js";
import { createCliSink } from "./cli-sink.js";
import { createJsonSink } from "./json-sink.js";
import { BookingClient } from "./http/booking-client.js";
import { exitCodeFor, runSuite } from "./suite/runner.js";
import { printReportSummary, saveReport } from "./suite/report.js";
import { describeError, isSuiteError } from "./suite/errors.js";

function resolveConfig(options: CliOptions): SuiteConfig {
  const config = loadConfig();
  return {
    ...config,
    baseUrl: options.baseUrl ? normalizeBaseUrl(options.baseUrl) : config.baseUrl,
    reportDir: options.reportDir ?? config.reportDir,
    saveReport: options.saveReport ?? config.saveReport,
  };
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    display.error(parsed.error);
    console.log(getHelpText());
    return 2;
  }
  if (parsed.options.help) {
    console.log(getHelpText());
    return 0;
  }

  let config: SuiteConfig;
  try {
    config = resolveConfig(parsed.options);
  } catch (err) {
    display.error(describeError(err));
    return 2;
  }

  const sink = parsed.options.json ? createJsonSink() : createCliSink();
  if (!parsed.options.json) display.banner();

  sink.info(`Target: ${config.baseUrl} | Timeout: ${config.timeoutMs}ms`);
  sink.separator();

  const client = new BookingClient({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });
  const report = await runSuite(client, { credentials: config.credentials, sink });

  sink.separator();
  printReportSummary(report, sink);

  if (config.saveReport) {
    try {
      const reportPath = await saveReport(report, config.reportDir);
      sink.info(`Report saved: ${reportPath}`);
    } catch (err) {
      sink.warn(`Could not save report: ${describeError(err)}`);
    }
  }

  return exitCodeFor(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    display.error(isSuiteError(err) ? err.message : `Fatal: ${describeError(err)}`);
    process.exitCode = 1;
  });
