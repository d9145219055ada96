import pino from "pino";

const env = process.env.NODE_ENV;
const prettyOutput = env !== "production" && env !== "test";

export const logger = pino({
  name: "geomark-ledger",
  level: process.env.LOG_LEVEL || "info",
  ...(prettyOutput
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,name",
          },
        },
      }
    : {}),
});

/**
 * Create a child logger tagged with a component name.
 */
export function createLogger(component: string) {
  return logger.child({ component });
}
