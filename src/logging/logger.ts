export type LogLevel = "debug" | "info" | "warn" | "error";

export type SubsystemLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return "info";
}

export function formatLogLine(params: {
  level: LogLevel;
  subsystem: string;
  message: string;
  meta?: Record<string, unknown>;
  now?: Date;
}): string {
  const ts = (params.now ?? new Date()).toISOString();
  const tag = params.level.toUpperCase().padEnd(5);
  const metaStr = params.meta ? ` ${JSON.stringify(params.meta)}` : "";
  return `[${ts}] ${tag} [${params.subsystem}] ${params.message}${metaStr}`;
}

export function createSubsystemLogger(
  subsystem: string,
  env: NodeJS.ProcessEnv = process.env,
): SubsystemLogger {
  const shouldLog = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogLevel(env)];
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (!shouldLog(level)) {
      return;
    }
    const line = formatLogLine({ level, subsystem, message, meta });
    // stdout is reserved for reports and --json output
    if (level === "debug" || level === "info") {
      console.error(line);
    } else {
      console.warn(line);
    }
  };
  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
