import winston from "winston";

const env = process.env.NODE_ENV ?? "development";
const isDevelopment = env === "development";

const developmentFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} ${level}: ${stack ?? message}${extra}`;
  }),
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? (isDevelopment ? "debug" : "info"),
  silent: env === "test",
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    isDevelopment ? developmentFormat : winston.format.json(),
  ),
  defaultMeta: { service: "mail-delivery-api" },
  transports: [new winston.transports.Console()],
});
