export interface RunOptions {
  suites: string[];
  timeoutMs?: number;
  concurrency?: number;
  reportDir?: string;
  verbose: boolean;
}

export type CliCommand =
  | { type: "help" }
  | { type: "list" }
  | ({ type: "run" } & RunOptions)
  | { type: "usage_error"; message: string };

function positiveInt(flag: string, value: string | undefined): number | string {
  if (value === undefined || value.startsWith("--")) {
    return `${flag} needs a value`;
  }
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    return `${flag} expects a positive integer, got "${value}"`;
  }
  return parseInt(value, 10);
}

function parseRun(args: string[]): CliCommand {
  const options: RunOptions = { suites: [], verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--timeout":
      case "--concurrency": {
        const parsed = positiveInt(arg, args[i + 1]);
        if (typeof parsed === "string") return { type: "usage_error", message: parsed };
        if (arg === "--timeout") options.timeoutMs = parsed;
        else options.concurrency = parsed;
        i++;
        break;
      }
      case "--report-dir": {
        const value = args[i + 1];
        if (value === undefined || value.startsWith("--")) {
          return { type: "usage_error", message: "--report-dir needs a value" };
        }
        options.reportDir = value;
        i++;
        break;
      }
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      default:
        if (arg.startsWith("-")) {
          return { type: "usage_error", message: `Unknown option "${arg}"` };
        }
        options.suites.push(arg);
    }
  }

  if (options.suites.length === 0) {
    return { type: "usage_error", message: "run needs at least one suite id (see: daa list)" };
  }
  return { type: "run", ...options };
}

/**
 * Parses `process.argv.slice(2)`. Never throws; malformed input becomes a
 * `usage_error` command.
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { type: "help" };
    case "list":
      return rest.length === 0
        ? { type: "list" }
        : { type: "usage_error", message: "list takes no arguments" };
    case "run":
      return parseRun(rest);
    default:
      return { type: "usage_error", message: `Unknown command "${command}"` };
  }
}

export function getHelpText(): string {
  return [
    "Usage:",
    "  daa list                         List suites, their cases and the action tree",
    "  daa run <suite...> [options]     Run one or more suites",
    "  daa help                         Show this help text",
    "",
    "Run options:",
    "  --timeout <ms>       Per-case deadline (default DAA_RUN_TIMEOUT_MS)",
    "  --concurrency <n>    Cases run at once (default DAA_CONCURRENCY)",
    "  --report-dir <path>  Where JSON reports go (default DAA_REPORT_DIR)",
    "  --verbose, -v        Print every verification, not only failures",
    "",
    "Exit codes: 0 all suites passed, 1 a suite did not pass, 2 usage, config or composition error",
  ].join("\n");
}
