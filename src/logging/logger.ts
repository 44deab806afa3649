export type LogLevel = "debug" | "info" | "warn" | "error";

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
}

export function formatLogLine(params: {
  level: LogLevel;
  subsystem: string;
  message: string;
  now?: Date;
}): string {
  const ts = (params.now ?? new Date()).toISOString();
  return `${ts} ${params.level.toUpperCase()} [${params.subsystem}] ${params.message}`;
}

export function createSubsystemLogger(
  subsystem: string,
  env: NodeJS.ProcessEnv = process.env,
): SubsystemLogger {
  const threshold = LEVEL_ORDER[resolveLogLevel(env.NEWSDESK_LOG_LEVEL)];
  const emit = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = formatLogLine({ level, subsystem, message });
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
  return {
    subsystem,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function headlinePrefix(headline: string, max = 50): string {
  const trimmed = headline.replace(/\s+/g, " ").trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}
