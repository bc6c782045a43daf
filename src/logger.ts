import { stdout } from "node:process";

export type Level = "info" | "warn" | "error" | "debug";

export const LEVELS: readonly Level[] = ["error", "warn", "info", "debug"];

const LEVEL_ORDER: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

type Meta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  debug(message: string, meta?: Meta): void;
  child(meta: Meta): Logger;
  setLevel(level: Level): void;
}

export interface LoggerOptions {
  level?: Level;
  sink?: (line: string) => void;
}

export function isLevel(value: string | undefined): value is Level {
  return LEVELS.some((level) => level === value);
}

function levelFromEnv(): Level {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLevel(raw) ? raw : "info";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const state = {
    min: LEVEL_ORDER[options.level ?? levelFromEnv()],
    sink: options.sink ?? ((line: string) => void stdout.write(line)),
  };
  return bind(state, {});
}

function bind(state: { min: number; sink: (line: string) => void }, bound: Meta): Logger {
  const log = (level: Level, message: string, meta?: Meta) => {
    if (LEVEL_ORDER[level] > state.min) {
      return;
    }
    const payload = {
      level,
      message,
      time: new Date().toISOString(),
      ...bound,
      ...meta,
    };
    state.sink(`${JSON.stringify(payload)}\n`);
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    debug: (message, meta) => log("debug", message, meta),
    // children share the parent's level and sink
    child: (meta) => bind(state, { ...bound, ...meta }),
    setLevel: (level) => {
      state.min = LEVEL_ORDER[level];
    },
  };
}

export const logger = createLogger();

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
