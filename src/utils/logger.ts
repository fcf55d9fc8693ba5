import winston from "winston";

/**
 * Process-wide logger. Structured JSON with timestamps; console output is
 * colorized. Silent while Jest runs the suite.
 */
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

export default logger;
