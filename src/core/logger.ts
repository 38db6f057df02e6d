// Levelled logger shared by the compiler, the dialogue runtime and the player.
//
// Levels: silent < error < warn < info < debug
//
//   const log = createLogger({ name: "spindle", level: "debug" });
//   log.debug("pass finished", { pass: "checkTypes" });

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LogSink {
  error: (line: string) => void;
  warn: (line: string) => void;
  info: (line: string) => void;
  debug: (line: string) => void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export const LOG_LEVEL_ENV = "SPINDLE_LOG_LEVEL";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

export const resolveLogLevel = (raw: string | undefined, fallback: LogLevel = "warn"): LogLevel => {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
};

const consoleSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.info(line),
  debug: (line) => console.debug(line),
};

const stringifyPayload = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return String(payload);
  }
};

export class Logger {
  readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "spindle";
    this.level = options.level ?? resolveLogLevel(process.env[LOG_LEVEL_ENV]);
    this.sink = options.sink ?? consoleSink;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(name: string): Logger {
    return new Logger({ name: `${this.name}:${name}`, level: this.level, sink: this.sink });
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  private emit(level: Exclude<LogLevel, "silent">, message: string, payload: unknown): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) {
      return;
    }
    const head = `[${this.name}] ${level.toUpperCase()}: ${message}`;
    const line = payload === undefined ? head : `${head} ${stringifyPayload(payload)}`;
    this.sink[level](line);
  }
}

export const createLogger = (options: LoggerOptions = {}): Logger => new Logger(options);

export const silentLogger = (): Logger => new Logger({ level: "silent" });
