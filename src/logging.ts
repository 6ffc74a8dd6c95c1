import pino from "pino";

export interface ILogger {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

const LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export const resolveLevel = (raw: string | undefined): pino.Level =>
  LEVELS.find((l) => l === raw?.toLowerCase()) ?? "info";

export const makeLogger = (
  level: pino.Level = resolveLevel(process.env.LOG_LEVEL),
): ILogger =>
  pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss.l", destination: 2 },
    },
  });

export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
