import fs from "fs/promises";
import path from "path";
import type { OutputSink } from "../output-sink.js";
import type { StepResult, SuiteReport } from "./types.js";

interface Counts {
  passed: number;
  failed: number;
  skipped: number;
}

function countVerdicts(steps: StepResult[]): Counts {
  return {
    passed: steps.filter((s) => s.verdict === "pass").length,
    failed: steps.filter((s) => s.verdict === "fail").length,
    skipped: steps.filter((s) => s.verdict === "skip").length,
  };
}

/**
 * Writes the report as pretty-printed JSON under `dir`, creating the
 * directory if needed. Returns the path of the written file.
 */
export async function saveReport(report: SuiteReport, dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filename = `${report.timestamp.replace(/[:.]/g, "-")}-booking-flow.json`;
  const filePath = path.join(dir, filename);
  await fs.writeFile(filePath, JSON.stringify(report, null, 2));
  return filePath;
}

export function printReportSummary(report: SuiteReport, sink: OutputSink): void {
  const { passed, failed, skipped } = countVerdicts(report.steps);

  sink.log(`\n  Test: ${report.title}`);
  sink.log(`  Target: ${report.baseUrl}`);
  sink.log(`  Time: ${report.timestamp}\n`);

  for (let i = 0; i < report.steps.length; i++) {
    const s = report.steps[i];
    sink.stepStatus(i, report.steps.length, s.title, s.verdict, s.reason ?? s.detail);
  }

  sink.verdict(passed, failed, skipped, report.verdict);
  sink.log(`\n  Duration: ${(report.durationMs / 1000).toFixed(1)}s`);
}

export function buildSummaryMessage(report: SuiteReport): string {
  const { passed, failed, skipped } = countVerdicts(report.steps);

  const lines: string[] = [
    `Test: ${report.title}`,
    `Verdict: ${report.verdict.toUpperCase()}`,
    `Steps: ${passed} passed, ${failed} failed, ${skipped} skipped`,
    `Duration: ${(report.durationMs / 1000).toFixed(1)}s`,
    "",
  ];

  for (let i = 0; i < report.steps.length; i++) {
    const s = report.steps[i];
    const tag = s.verdict.toUpperCase();
    const detail = s.verdict === "pass" && s.detail ? ` (${s.detail})` : "";
    lines.push(`  ${i + 1}. [${tag}] ${s.title}${detail}`);
    if (s.reason) {
      lines.push(`     Reason: ${s.reason}`);
    }
  }

  return lines.join("\n");
}
