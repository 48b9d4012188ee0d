export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

const severity: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

export const createLogger = (level: LogLevel, sink: LogSink): Logger => {
  const emitter =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (level !== "silent" && severity[messageLevel] <= severity[level]) {
        sink(`[authorscope] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

export const createSilentLogger = (): Logger => createLogger("silent", () => {});

// Logs share stderr with commander's own errors; stdout carries only the report.
export const createStderrLogger = (level: LogLevel): Logger =>
  createLogger(level, (line) => {
    process.stderr.write(line);
  });

export const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value) ?? "info";
