import winston from "winston";
import { config } from "./index.js";

const consoleFormat =
  config.nodeEnv === "production"
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} ${level} ${String(message)}${rest}`;
        }),
      );

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: consoleFormat,
  // Progress goes to stderr so stdout stays clean for JSON output.
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
});
