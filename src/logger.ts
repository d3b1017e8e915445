export type LogLevel = "debug" | "info" | "warn" | "error";

type LogFn = (message: string, meta?: Record<string, unknown>) => void;

export type Logger = Record<LogLevel, LogFn> & {
  child(bindings: Record<string, unknown>): Logger;
};

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function createLogger(
  level: LogLevel,
  bindings: Record<string, unknown> = {}
): Logger {
  const threshold = levelOrder[level] ?? levelOrder.info;

  function write(lvl: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (levelOrder[lvl] < threshold) return;
    const payload = {
      ts: new Date().toISOString(),
      level: lvl,
      ...bindings,
      message,
      ...(meta ? { meta } : {})
    };
    const line = JSON.stringify(payload);
    if (lvl === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (extra) => createLogger(level, { ...bindings, ...extra })
  };
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.name, message: err.message };
  }
  return { error: String(err) };
}
