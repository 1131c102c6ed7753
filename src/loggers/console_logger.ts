/**
 * Console logger. Everything goes to stderr: stdout carries MCP stdio
 * traffic for the server and the rendered path for the CLI.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export type Logger = Record<LogLevel, (message: string, ...data: unknown[]) => void>;

/** Fixed-width labels so messages line up in a terminal. */
const LEVEL_LABEL: Record<LogLevel, string> = {
  error: "ERROR ❌   ",
  warn: "WARNING ⚠️",
  info: "INFO      ",
  debug: "DEBUG     ",
};

export function timestamp(): string {
  return new Date().toISOString();
}

export function create_logger(): Logger {
  const write = (level: LogLevel) => (message: string, ...data: unknown[]): void => {
    const line = `${timestamp()}: ${LEVEL_LABEL[level]}: ${message}`;
    if (data.length > 0) {
      console.error(line, ...data);
    } else {
      console.error(line);
    }
  };

  return {
    error: write("error"),
    warn: write("warn"),
    info: write("info"),
    debug: write("debug"),
  };
}
