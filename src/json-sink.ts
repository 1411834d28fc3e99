import type { OutputSink } from "./output-sink.js";

type Write = (line: string) => void;

/** Newline-delimited JSON events, one per sink call. */
export function createJsonSink(write: Write = (line) => process.stdout.write(line)): OutputSink {
  const emit = (event: string, payload: Record<string, unknown>) => {
    write(JSON.stringify({ event, time: new Date().toISOString(), ...payload }) + "\n");
  };

  return {
    info(msg) {
      emit("log", { level: "info", message: msg });
    },
    success(msg) {
      emit("log", { level: "success", message: msg });
    },
    warn(msg) {
      emit("log", { level: "warn", message: msg });
    },
    error(msg) {
      emit("log", { level: "error", message: msg });
    },
    stepStatus(index, total, title, status, reason) {
      emit("step", { index, total, title, status, reason });
    },
    exchange(exchange) {
      emit("exchange", { ...exchange });
    },
    verdict(passed, failed, skipped, verdict) {
      emit("verdict", { verdict, passed, failed, skipped });
    },
    separator() {
      // no-op: layout only
    },
    log(msg) {
      emit("log", { level: "plain", message: msg });
    },
  };
}
