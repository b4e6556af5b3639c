#!/usr/bin/env node
import { CompositionError, ConfigError } from "./errors.js";
import { getHelpText, parseArgs, type RunOptions } from "./cli/parser.js";
import * as display from "./cli/display.js";
import { createCliSink } from "./cli-sink.js";
import { createRegistry, createRunnerCore } from "./core.js";
import { findSuite, suites } from "./suites/index.js";
import type { TestSuite } from "./suites/types.js";

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_USAGE = 2;

function listCommand(): number {
  const registry = createRegistry();

  console.log("Suites:");
  for (const suite of suites) {
    console.log(`  ${suite.id}  ${suite.title} [${suite.requires.join(", ")}]`);
    suite.cases.forEach((c, i) => console.log(`    ${i + 1}. ${c.title}`));
  }

  console.log("\nActions:");
  for (const action of registry.list()) {
    if (action.kind === "composite") display.actionTree(registry.tree(action.name));
  }
  for (const action of registry.list()) {
    if (action.kind === "atomic") display.actionTree(registry.tree(action.name));
  }
  return EXIT_OK;
}

async function runCommand(options: RunOptions): Promise<number> {
  const selected: TestSuite[] = [];
  for (const id of options.suites) {
    const suite = findSuite(id);
    if (!suite) {
      display.error(`Unknown suite "${id}". Known: ${suites.map((s) => s.id).join(", ")}`);
      return EXIT_USAGE;
    }
    selected.push(suite);
  }

  display.banner();
  const sink = createCliSink({ verbose: options.verbose });
  const core = createRunnerCore(sink);

  const onSignal = () => {
    display.warn("Interrupted, closing browsers...");
    core.shutdown().then(
      () => process.exit(130),
      (err: unknown) => {
        display.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(130);
      },
    );
  };
  process.once("SIGINT", onSignal);

  try {
    const reports = await core.runSuites(selected, {
      timeoutMs: options.timeoutMs,
      concurrency: options.concurrency,
      reportDir: options.reportDir,
    });
    for (const report of reports) {
      const { passed, failed, aborted } = report.counts;
      display.separator();
      display.info(report.title);
      display.testVerdict(passed, failed, aborted, report.verdict);
    }
    return reports.every((r) => r.verdict === "pass") ? EXIT_OK : EXIT_FAILED;
  } finally {
    process.removeListener("SIGINT", onSignal);
    await core.shutdown();
  }
}

async function main(argv: readonly string[]): Promise<number> {
  const command = parseArgs(argv);

  switch (command.type) {
    case "help":
      console.log(getHelpText());
      return EXIT_OK;
    case "usage_error":
      display.error(command.message);
      console.log(getHelpText());
      return EXIT_USAGE;
    case "list":
      return listCommand();
    case "run":
      return runCommand(command);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError || err instanceof CompositionError) {
      display.error(err.message);
      process.exitCode = EXIT_USAGE;
      return;
    }
    display.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
    process.exitCode = EXIT_FAILED;
  },
);
