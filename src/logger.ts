export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Structured logger accepted by {@link ScheduleResource} and the deletion
 * coordinator.
 *
 * @category Logging
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Records below this level are dropped. Defaults to `"info"`. */
  level?: LogLevel;
  /** One JSON object per line instead of `[LEVEL] message key=value`. */
  json?: boolean;
  /** Where lines go. Defaults to stderr. */
  write?: (line: string) => void;
  now?: () => Date;
}

const formatValue = (value: unknown): string => {
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  return JSON.stringify(value) ?? String(value);
};

const formatText = (level: LogLevel, message: string, fields?: LogFields): string => {
  const suffix = Object.entries(fields ?? {})
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join("");
  return `[${level.toUpperCase()}] ${message}${suffix}`;
};

/**
 * Creates a logger that writes one line per record.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.info("Reading schedule", { scheduleId: "PABC123" });
 * // [INFO] Reading schedule scheduleId=PABC123
 * ```
 *
 * @category Logging
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    if (!options.json) {
      write(formatText(level, message, fields));
      return;
    }
    const record = { ts: now().toISOString(), level, message };
    write(JSON.stringify(fields ? { ...record, ...fields } : record));
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
