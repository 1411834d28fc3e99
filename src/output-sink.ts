import type { HttpExchange, StepVerdict } from "./suite/types.js";

export type StepStatus = "running" | StepVerdict;

/**
 * Abstraction over output delivery. The CLI sink writes coloured text to
 * stdout; the JSON sink emits one object per line for CI logs.
 */
export interface OutputSink {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  stepStatus(index: number, total: number, title: string, status: StepStatus, reason?: string): void;
  exchange(exchange: HttpExchange): void;
  verdict(passed: number, failed: number, skipped: number, verdict: string): void;
  separator(): void;
  log(msg: string): void;
}
