import pino, { type LoggerOptions } from "pino";
import { config } from "./config";

/**
 * Shared pino options. The Fastify server is built from the same options so
 * request logs and service logs look alike.
 */
export const loggerOptions: LoggerOptions = {
  level: config.log.level,
  transport: config.log.pretty
    ? {
        target: "pino-pretty",
        options: {
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      }
    : undefined,
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
