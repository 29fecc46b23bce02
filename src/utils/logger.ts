import chalk from "chalk";

type Level = "info" | "success" | "warn" | "error";

const marks: Record<Level, string> = {
  info: chalk.blue("ℹ"),
  success: chalk.green("✔"),
  warn: chalk.yellow("⚠"),
  error: chalk.red("✖"),
};

let verbose = false;

export function setVerbose(value: boolean): void {
  verbose = value;
}

/** Errors go to stderr; everything else shares stdout with the report. */
function emit(level: Level, msg: string): void {
  const write = level === "error" ? console.error : console.log;
  write(marks[level], msg);
}

export const info = (msg: string): void => emit("info", msg);
export const success = (msg: string): void => emit("success", msg);
export const warn = (msg: string): void => emit("warn", msg);
export const error = (msg: string): void => emit("error", msg);

export function dim(msg: string): void {
  console.log(chalk.dim(msg));
}

/** Resolution trace for --verbose. On stderr so JSON output stays parseable. */
export function debug(msg: string): void {
  if (verbose) console.error(chalk.dim(`extreq: ${msg}`));
}

/** Section title with a rule sized to it, e.g. "Load order for Game". */
export function heading(title: string): void {
  const rule = "─".repeat(Math.min(title.length + 4, 60));
  console.log(`\n${chalk.bold.cyan(title)}\n${chalk.dim(rule)}`);
}
