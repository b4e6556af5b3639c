import type { OutputSink } from "./output-sink.js";
import * as display from "./cli/display.js";

export function createCliSink(options: { verbose?: boolean } = {}): OutputSink {
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
    testCase(index, total, title, status) {
      display.testCase(index, total, title, status);
    },
    verification(runId, entry) {
      if (options.verbose || entry.outcome !== "passed") {
        display.verification(runId, entry);
      }
    },
    separator() {
      display.separator();
    },
    log(msg) {
      console.log(msg);
    },
    debug(msg) {
      if (options.verbose) display.debug(msg);
    },
  };
}
