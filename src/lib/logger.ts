import pino from "pino";

// Read from the environment directly: config parsing logs through this module
const level = process.env.LOG_LEVEL ?? "info";
const pretty = process.env.NODE_ENV === "development";

export const loggerOptions: pino.LoggerOptions = {
  level,
  base: { service: "festpass-api" },
  // Errors are logged under `err`
  serializers: { err: pino.stdSerializers.err },
  // Admin secrets never reach the log
  redact: {
    paths: ["password", "accessToken", "headers.authorization", "*.password", "*.accessToken"],
    censor: "[REDACTED]",
  },
  transport: pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname,service",
        },
      }
    : undefined,
};

export const logger = pino(loggerOptions);

// Child loggers for modules
export const createLogger = (module: string) => logger.child({ module });

export const httpLogger = createLogger("http");
export const dbLogger = createLogger("db");
export const authLogger = createLogger("auth");
export const jobLogger = createLogger("jobs");
