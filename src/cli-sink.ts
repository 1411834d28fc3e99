import type { OutputSink } from "./output-sink.js";
import * as display from "./cli/display.js";

export function createCliSink(): OutputSink {
  return {
    info(msg) {
      display.info(msg);
    },
    success(msg) {
      display.success(msg);
    },
    warn(msg) {
      display.warn(msg);
    },
    error(msg) {
      display.error(msg);
    },
    stepStatus(index, total, title, status, reason) {
      display.testStep(index, total, title, status, reason);
    },
    exchange(exchange) {
      display.exchange(exchange);
    },
    verdict(passed, failed, skipped, verdict) {
      display.testVerdict(passed, failed, skipped, verdict);
    },
    separator() {
      display.separator();
    },
    log(msg) {
      console.log(msg);
    },
  };
}
