import winston from "winston"

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

// stdio 模式下 stdout 是 MCP 通道，日志全部写到 stderr
const logger = winston.createLogger({
  level: "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message}`
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
})

export function setLogLevel(level: LogLevel): void {
  logger.level = level
}

export default logger
