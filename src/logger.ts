import winston from "winston";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type TrialLogger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function createTrialLogger(params: {
  level?: LogLevel;
  stream?: NodeJS.WritableStream;
} = {}): TrialLogger {
  const logger = winston.createLogger({
    level: params.level ?? "info",
    format: winston.format.printf((info) => String(info.message)),
    transports: [new winston.transports.Stream({ stream: params.stream ?? process.stderr })],
  });

  return {
    debug: (message) => {
      logger.debug(message);
    },
    info: (message) => {
      logger.info(message);
    },
    warn: (message) => {
      logger.warn(message);
    },
    error: (message) => {
      logger.error(message);
    },
  };
}
