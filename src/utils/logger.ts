export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIXES: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "[DEBUG] ",
  info: "",
  warn: "[WARN] ",
  error: "[ERROR] ",
};

let currentLevel: LogLevel = "info";
let useStderr = false;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Route debug/info output to stderr. The JSON report modes turn this on
 * so stdout carries nothing but the report.
 */
export function setLoggerStderr(enabled: boolean): void {
  useStderr = enabled;
}

function emit(
  level: Exclude<LogLevel, "silent">,
  message: string,
  args: unknown[],
): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

  const line = `${PREFIXES[level]}${message}`;
  switch (level) {
    case "debug":
      if (useStderr) console.error(line, ...args);
      else console.debug(line, ...args);
      break;
    case "info":
      if (useStderr) console.error(line, ...args);
      else console.log(line, ...args);
      break;
    case "warn":
      console.warn(line, ...args);
      break;
    case "error":
      console.error(line, ...args);
      break;
  }
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    emit("debug", message, args);
  },

  info(message: string, ...args: unknown[]): void {
    emit("info", message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    emit("warn", message, args);
  },

  error(message: string, ...args: unknown[]): void {
    emit("error", message, args);
  },
};
