import type { OutputSink, StepStatus } from "./output-sink.js";
import type { HttpExchange } from "./suite/types.js";

export interface RecordedStep {
  index: number;
  total: number;
  title: string;
  status: StepStatus;
  reason?: string;
}

export interface RecordingSink extends OutputSink {
  steps: RecordedStep[];
  exchanges: HttpExchange[];
  lines: string[];
}

/** In-memory sink for tests; keeps every event instead of printing it. */
export function createRecordingSink(): RecordingSink {
  const steps: RecordedStep[] = [];
  const exchanges: HttpExchange[] = [];
  const lines: string[] = [];

  return {
    steps,
    exchanges,
    lines,
    info: (msg) => lines.push(`[info] ${msg}`),
    success: (msg) => lines.push(`[ok] ${msg}`),
    warn: (msg) => lines.push(`[warn] ${msg}`),
    error: (msg) => lines.push(`[error] ${msg}`),
    stepStatus: (index, total, title, status, reason) => {
      steps.push({ index, total, title, status, reason });
    },
    exchange: (exchange) => {
      exchanges.push(exchange);
    },
    verdict: (passed, failed, skipped, verdict) => {
      lines.push(`VERDICT ${verdict} ${passed}/${failed}/${skipped}`);
    },
    separator: () => {},
    log: (msg) => lines.push(msg),
  };
}
