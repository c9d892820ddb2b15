export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Readonly<Record<string, unknown>>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const formatFields = (fields: LogFields | undefined): string => {
  if (fields === undefined) {
    return "";
  }
  const entries = Object.entries(fields);
  if (entries.length === 0) {
    return "";
  }
  return " " + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ");
};

// Writes to stderr so stdout stays reserved for command output.
export const createConsoleLogger = (level: LogLevel = "info"): Logger => {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    console.error(`[${at}] ${message}${formatFields(fields)}`);
  };
  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
