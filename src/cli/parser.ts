export interface CliOptions {
  baseUrl?: string;
  reportDir?: string;
  saveReport?: boolean;
  json: boolean;
  help: boolean;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

const VALUE_FLAGS: Record<string, "baseUrl" | "reportDir"> = {
  "--base-url": "baseUrl",
  "--report-dir": "reportDir",
};

const BOOLEAN_FLAGS = new Set(["--no-report", "--json", "--help"]);

export function parseArgs(argv: string[]): ParseResult {
  const options: CliOptions = { json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);

    const key = VALUE_FLAGS[flag];
    if (key) {
      const value = inline ?? argv[++i];
      if (value === undefined || value === "") {
        return { ok: false, error: `${flag} requires a value` };
      }
      options[key] = value;
      continue;
    }

    if (inline !== undefined && BOOLEAN_FLAGS.has(flag)) {
      return { ok: false, error: `${flag} does not take a value` };
    }

    switch (flag) {
      case "--no-report":
        options.saveReport = false;
        break;
      case "--json":
        options.json = true;
        break;
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, options };
}

export function getHelpText(): string {
  return [
    "Usage: booking-flow-tester [options]",
    "",
    "Runs the booking API flow: availability, auth, create, get, update, delete.",
    "",
    "Options:",
    "  --base-url <url>    API base URL (env BOOKING_API_URL)",
    "  --report-dir <dir>  Where to write the JSON report (env REPORT_DIR)",
    "  --no-report         Do not write a JSON report",
    "  --json              Emit newline-delimited JSON instead of coloured text",
    "  -h, --help          Show this help text",
    "",
    "Credentials come from BOOKING_API_USERNAME and BOOKING_API_PASSWORD.",
  ].join("\n");
}
