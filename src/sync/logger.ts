import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  format: isProduction
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, ...rest }) => {
          const ctx = context ? `[${String(context)}]` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${String(timestamp)} ${level} ${ctx} ${String(message)}${extra}`;
        })
      ),
  transports: [new winston.transports.Console()],
});

// Optional JSON copy of the log, e.g. SYNC_LOG_FILE=sync.log
if (process.env.SYNC_LOG_FILE) {
  logger.add(
    new winston.transports.File({
      filename: process.env.SYNC_LOG_FILE,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    })
  );
}

export function createChildLogger(context: string) {
  return logger.child({ context });
}
