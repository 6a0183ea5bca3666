export type OpsLogLevel = "info" | "warn" | "error";

export type OpsLogEntry = {
  at: string;
  level: OpsLogLevel;
  message: string;
};

export type OpsLogger = {
  entries: OpsLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function createOpsLogger(scope = "pipeline", options: { silent?: boolean } = {}): OpsLogger {
  const entries: OpsLogEntry[] = [];

  const push = (level: OpsLogLevel, message: string) => {
    entries.push({
      at: new Date().toISOString(),
      level,
      message,
    });

    if (options.silent) return;
    if (level === "error") {
      console.error(`[${scope}:${level}] ${message}`);
      return;
    }
    if (level === "warn") {
      console.warn(`[${scope}:${level}] ${message}`);
      return;
    }
    console.log(`[${scope}:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
  };
}
