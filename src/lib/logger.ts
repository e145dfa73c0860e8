export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = process.env.TRACKSIFT_DEBUG ? "debug" : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: Exclude<LogLevel, "silent">, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  // stdout is reserved for command output (JSON, track lists)
  const prefix = level === "info" ? "" : `${level.toUpperCase()} `;
  process.stderr.write(`${prefix}${message}\n`);
}

export function log(message: string): void {
  write("info", message);
}

export function debug(message: string): void {
  write("debug", message);
}

export function warn(message: string): void {
  write("warn", message);
}

export function error(message: string): void {
  write("error", message);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
