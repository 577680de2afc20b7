import { pino, type Logger } from "pino";

const logLevel = process.env.STAYHERE_LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info";

export const rootLogger: Logger = pino({
  name: "stayhooks",
  level: logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };

export interface LogContext {
  component?: string;
  roomId?: string;
  webhookId?: string;
}

export function createLogger(context: LogContext, parent: Logger = rootLogger): Logger {
  return parent.child(context);
}

export default rootLogger;
