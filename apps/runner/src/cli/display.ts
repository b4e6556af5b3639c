import chalk from "chalk";
import type { LedgerEntry } from "../actions/ledger.js";
import type { ActionTreeNode } from "../actions/registry.js";
import type { CaseStatus } from "../output-sink.js";

export function banner(): void {
  console.log(chalk.bold.cyan("\n  daa: declarative action runner"));
  console.log(chalk.dim("  Test / Action / Physical | Run 'daa help' for commands\n"));
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

export function debug(msg: string): void {
  console.log(chalk.dim(msg));
}

export function testCase(
  index: number,
  total: number,
  title: string,
  status: CaseStatus,
): void {
  const icons: Record<CaseStatus, string> = {
    running: chalk.blue("..."),
    pass: chalk.green("PASS"),
    fail: chalk.red("FAIL"),
    aborted: chalk.magenta("ABORT"),
  };
  console.log(`  [${index + 1}/${total}] ${icons[status]} ${title}`);
}

export function verification(runId: string, entry: LedgerEntry): void {
  const mark =
    entry.outcome === "passed"
      ? chalk.green("✓")
      : entry.outcome === "aborted"
        ? chalk.magenta("⊘")
        : chalk.red("✗");
  const line = `      ${mark} #${entry.sequence} ${entry.action} ${chalk.dim(`[${entry.claim}]`)}`;
  console.log(entry.outcome === "passed" ? chalk.dim(line) : line);
  if (entry.failure) {
    console.log(chalk.red(`          ${entry.failure.message}`) + chalk.dim(` (${runId})`));
  }
}

export function testVerdict(
  passed: number,
  failed: number,
  aborted: number,
  verdict: string,
): void {
  const fn = failed + aborted > 0 ? chalk.red.bold : chalk.green.bold;
  console.log(fn(`\n  VERDICT: ${verdict.toUpperCase()}`));
  console.log(
    `  ${chalk.green(`${passed} passed`)}  ${chalk.red(`${failed} failed`)}  ${chalk.magenta(`${aborted} aborted`)}`,
  );
}

export function separator(): void {
  console.log(chalk.dim("─".repeat(60)));
}

export function actionTree(node: ActionTreeNode, depth = 0): void {
  const tag = node.kind === "atomic" ? chalk.green("atomic") : chalk.cyan("composite");
  console.log(`${"  ".repeat(depth + 2)}${node.name} ${chalk.dim(`(${tag})`)}`);
  for (const child of node.children) {
    actionTree(child, depth + 1);
  }
}
