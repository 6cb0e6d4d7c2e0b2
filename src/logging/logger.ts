export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, string | number | boolean | undefined>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => {
      const text = String(v);
      return /\s|"/.test(text) ? `${k}=${JSON.stringify(text)}` : `${k}=${text}`;
    });
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function formatLogLine(params: {
  level: Exclude<LogLevel, "silent">;
  message: string;
  fields?: LogFields;
  at: Date;
}): string {
  return `${params.at.toISOString()} ${params.level.toUpperCase()} ${params.message}${formatFields(params.fields)}`;
}

export function createLogger(params: {
  level: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}): Logger {
  const write = params.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = params.now ?? (() => new Date());
  const threshold = SEVERITY[params.level];

  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, fields?: LogFields): void => {
      if (SEVERITY[level] < threshold) return;
      write(formatLogLine({ level, message, fields, at: now() }));
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error")
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", write: () => {} });
