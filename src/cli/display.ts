import chalk from "chalk";
import type { StepStatus } from "../output-sink.js";
import type { HttpExchange } from "../suite/types.js";

export function banner(): void {
  console.log(
    chalk.bold.cyan(`
 ╔╗ ╔═╗╔═╗╦╔═╦╔╗╔╔═╗  ╔═╗╦  ╔═╗╦ ╦
 ╠╩╗║ ║║ ║╠╩╗║║║║║ ╦  ╠╣ ║  ║ ║║║║
 ╚═╝╚═╝╚═╝╩ ╩╩╝╚╝╚═╝  ╚  ╩═╝╚═╝╚╩╝
`),
  );
  console.log(chalk.dim("  Booking API end-to-end checks | --help for options\n"));
}

export function info(msg: string): void {
  console.log(chalk.blue(`[info] ${msg}`));
}

export function success(msg: string): void {
  console.log(chalk.green(`[ok] ${msg}`));
}

export function warn(msg: string): void {
  console.log(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.log(chalk.red(`[error] ${msg}`));
}

export function testStep(
  index: number,
  total: number,
  title: string,
  status: StepStatus,
  reason?: string,
): void {
  const icons: Record<StepStatus, string> = {
    running: chalk.blue("..."),
    pass: chalk.green("PASS"),
    fail: chalk.red("FAIL"),
    skip: chalk.dim("SKIP"),
  };
  console.log(`  [${index + 1}/${total}] ${icons[status]} ${title}`);
  if (reason && status !== "running") {
    const color = status === "fail" ? chalk.red : chalk.dim;
    console.log(color(`         ${reason}`));
  }
}

export function exchange(ex: HttpExchange): void {
  console.log(chalk.dim(`         ${ex.method} ${ex.url}`));
  if (ex.headers) {
    for (const [name, value] of Object.entries(ex.headers)) {
      console.log(chalk.dim(`         ${name}: ${value}`));
    }
  }
  if (ex.requestBody !== undefined) {
    console.log(chalk.dim(indent(`Payload: ${JSON.stringify(ex.requestBody, null, 2)}`)));
  }
  const status = ex.status === undefined ? chalk.red("no response") : String(ex.status);
  console.log(chalk.dim(`         Response status: `) + status + chalk.dim(` (${ex.durationMs}ms)`));
  if (ex.responseBody !== undefined && ex.responseBody !== "") {
    const body =
      typeof ex.responseBody === "string" ? ex.responseBody : JSON.stringify(ex.responseBody);
    console.log(chalk.dim(`         Response body: ${body}`));
  }
}

export function testVerdict(
  passed: number,
  failed: number,
  skipped: number,
  verdict: string,
): void {
  const fn = failed > 0 ? chalk.red.bold : chalk.green.bold;
  console.log(fn(`\n  VERDICT: ${verdict.toUpperCase()}`));
  console.log(
    `  ${chalk.green(`${passed} passed`)}  ${chalk.red(`${failed} failed`)}  ${chalk.dim(`${skipped} skipped`)}`,
  );
}

export function separator(): void {
  console.log(chalk.dim("─".repeat(60)));
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `         ${line}`)
    .join("\n");
}
