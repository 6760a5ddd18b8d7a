import * as winston from "winston";

const isTest = process.env.NODE_ENV === "test";
const logLevel = process.env.LOG_LEVEL || (isTest ? "warn" : "info");

const rootLogger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: "sightline" },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const { timestamp, level, message, scope, ...meta } = info;
          const scopeTag = scope ? ` [${scope}]` : "";
          const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
          return `${timestamp} [${level}]${scopeTag} ${message}${extra}`;
        }),
      ),
    }),
  ],
});

export type Logger = winston.Logger;

export function createLogger(scope: string): Logger {
  return rootLogger.child({ scope });
}
