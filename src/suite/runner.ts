import type { BookingClient } from "../http/booking-client.js";
import type { Credentials } from "../config/types.js";
import type { OutputSink } from "../output-sink.js";
import { describeError, isSuiteError } from "./errors.js";
import { createFixture } from "./fixture.js";
import { buildSummaryMessage } from "./report.js";
import { BOOKING_FLOW_STEPS, type SuiteStep } from "./steps.js";
import type {
  BookingFixture,
  HttpExchange,
  RunState,
  StepResult,
  SuiteReport,
  SuiteVerdict,
} from "./types.js";

export interface RunSuiteOptions {
  credentials: Credentials;
  sink: OutputSink;
  fixture?: BookingFixture;
  steps?: readonly SuiteStep[];
  title?: string;
}

/**
 * Runs the booking flow end to end: every step in order, each inside its
 * own failure boundary so one failure never stops the sequence. Steps
 * whose required run state is missing are skipped without a request.
 */
export async function runSuite(
  client: BookingClient,
  options: RunSuiteOptions,
): Promise<SuiteReport> {
  const { sink, credentials } = options;
  const steps = options.steps ?? BOOKING_FLOW_STEPS;
  const title = options.title ?? "Booking flow";
  const startTime = Date.now();

  const state: RunState = { resourceFixture: options.fixture ?? createFixture() };

  sink.info(`Running ${title} against ${client.baseUrl} (${steps.length} steps)`);

  const results: StepResult[] = [];
  for (let i = 0; i < steps.length; i++) {
    const result = await runStep(steps[i], i, steps.length, client, state, credentials, sink);
    results.push(result);
  }

  const totalDuration = Date.now() - startTime;
  const report: SuiteReport = {
    title,
    timestamp: new Date().toISOString(),
    baseUrl: client.baseUrl,
    steps: results,
    verdict: suiteVerdict(results),
    summary: "",
    durationMs: totalDuration,
  };
  report.summary = buildSummaryMessage(report);
  return report;
}

async function runStep(
  step: SuiteStep,
  index: number,
  total: number,
  client: BookingClient,
  state: RunState,
  credentials: Credentials,
  sink: OutputSink,
): Promise<StepResult> {
  const base = { name: step.name, title: step.title };

  const skipReason = step.precondition?.(state);
  if (skipReason) {
    sink.stepStatus(index, total, step.title, "skip", skipReason);
    return {
      ...base,
      verdict: "skip",
      reason: skipReason,
      errorKind: "precondition_unmet",
      exchanges: [],
      durationMs: 0,
    };
  }

  sink.stepStatus(index, total, step.title, "running");
  const exchanges: HttpExchange[] = [];
  const scoped = client.scoped((exchange) => {
    exchanges.push(exchange);
    sink.exchange(exchange);
  });
  const stepStart = Date.now();

  let result: StepResult;
  try {
    const detail = await step.run({ client: scoped, state, credentials });
    result = {
      ...base,
      verdict: "pass",
      detail: typeof detail === "string" && detail.length > 0 ? detail : undefined,
      exchanges,
      durationMs: Date.now() - stepStart,
    };
  } catch (err) {
    const kind = isSuiteError(err) ? err.kind : undefined;
    result = {
      ...base,
      verdict: kind === "precondition_unmet" ? "skip" : "fail",
      reason: describeError(err),
      errorKind: kind,
      exchanges,
      durationMs: Date.now() - stepStart,
    };
  }

  sink.stepStatus(index, total, step.title, result.verdict, result.reason ?? result.detail);
  return result;
}

export function suiteVerdict(results: StepResult[]): SuiteVerdict {
  const passed = results.filter((r) => r.verdict === "pass").length;
  const failed = results.filter((r) => r.verdict === "fail").length;
  if (failed === 0) return "pass";
  if (passed === 0) return "fail";
  return "partial";
}

/** 0 when nothing failed; skipped steps do not fail the run. */
export function exitCodeFor(report: SuiteReport): number {
  return report.steps.some((s) => s.verdict === "fail") ? 1 : 0;
}
