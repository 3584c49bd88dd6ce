import pino from "pino";

type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

export interface ILogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export type LogLevel = pino.LevelWithSilent;

export const makeLogger = (
  level: LogLevel = "info",
  pretty = true,
): ILogger =>
  pretty && level !== "silent"
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });
