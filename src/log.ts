const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";

type Level = "info" | "success" | "warn" | "error" | "dryRun";

const GLYPHS: Record<Level, string> = {
  info: "\x1b[36mℹ",
  success: "\x1b[32m✔",
  warn: "\x1b[33m⚠",
  error: "\x1b[31m✖",
  dryRun: "\x1b[35m◌",
};

let verboseEnabled = false;

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

/** HH:MM:SS in UTC, matching the timestamps written to the ledger. */
function timestamp(): string {
  return DIM + new Date().toISOString().slice(11, 19) + RESET;
}

function emit(level: Level, message: string): void {
  const line = `${timestamp()} ${GLYPHS[level]}${RESET}  ${message}`;
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function info(message: string): void {
  emit("info", message);
}

export function success(message: string): void {
  emit("success", message);
}

export function warn(message: string): void {
  emit("warn", message);
}

export function error(message: string): void {
  emit("error", message);
}

export function debug(message: string): void {
  if (verboseEnabled) {
    console.log(`${timestamp()} ${DIM}·  ${message}${RESET}`);
  }
}

/** An action skipped because of --dry-run. */
export function dryRun(message: string): void {
  emit("dryRun", `[DRY RUN] ${message}`);
}

export function heading(message: string): void {
  console.log(`\n${BOLD}${CYAN}▸ ${message}${RESET}`);
}

export function summary(label: string, value: string | number): void {
  console.log(`  ${DIM}${label}:${RESET} ${BOLD}${value}${RESET}`);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
