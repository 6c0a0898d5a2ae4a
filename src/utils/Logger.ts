import pino from 'pino';
import type { Logger } from 'pino';

//log lines are stamped in the market's own time zone
const LOG_TIME_ZONE = process.env.LOG_TIME_ZONE || 'Europe/Madrid';

const timestamp = () => {
  const now = new Date();
  const marketTime = now.toLocaleString('sv-SE', {
    timeZone: LOG_TIME_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false
  });

  return `,"time":"${marketTime}"`;
};

//central logger to be used in all components
const centralLogger = pino({
  timestamp,
  level: process.env.LOG_LEVEL || 'info',
  //level as a name, not a number
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
  },
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
      colorize: true,
    }
  } : undefined,
});

export function createLogger(context?: string): Logger {
  return context ? centralLogger.child({ context }) : centralLogger;
}
