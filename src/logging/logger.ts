import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

// Every entry written through the returned logger carries `base` under its own meta.
export function withMeta(logger: Logger, base: LogMeta): Logger {
  const merge = (meta?: LogMeta) => ({ ...base, ...meta });
  return {
    debug: (message, meta) => logger.debug(message, merge(meta)),
    info: (message, meta) => logger.info(message, merge(meta)),
    warn: (message, meta) => logger.warn(message, merge(meta)),
    error: (message, meta) => logger.error(message, merge(meta))
  };
}

export function teeLogger(...loggers: Logger[]): Logger {
  return {
    debug: (message, meta) => loggers.forEach((logger) => logger.debug(message, meta)),
    info: (message, meta) => loggers.forEach((logger) => logger.info(message, meta)),
    warn: (message, meta) => loggers.forEach((logger) => logger.warn(message, meta)),
    error: (message, meta) => loggers.forEach((logger) => logger.error(message, meta))
  };
}

export type ConsoleLoggerOptions = {
  write: (line: string) => void;
  // Errors are still printed.
  quiet?: boolean;
  style?: Partial<Record<LogLevel, (text: string) => string>>;
};

// Terminal echo: messages only, info and above.
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const echo = (level: LogLevel) => (message: string) => {
    if (options.quiet && level !== "error") return;
    const style = options.style?.[level];
    options.write(style ? style(message) : message);
  };
  return { debug: () => {}, info: echo("info"), warn: echo("warn"), error: echo("error") };
}

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  minLevel?: LogLevel;
};

export function formatLogLine(level: LogLevel, message: string, meta?: LogMeta, now = new Date()): string {
  const normalizedLevel = level === "warn" ? "warning" : level;
  const payload = {
    timestamp: now.toISOString(),
    level: normalizedLevel,
    message,
    meta: meta ?? undefined
  };
  return `${JSON.stringify(payload)}\n`;
}

export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "triage";
  const filePath = path.join(dir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  const minRank = LEVEL_RANK[params.minLevel ?? "debug"];
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (closed || LEVEL_RANK[level] < minRank) return;
    try {
      stream.write(formatLogLine(level, message, meta));
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
