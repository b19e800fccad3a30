// utils/logger.ts
import pino from 'pino';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
const customLevels = {
  http: 25, // Positioned between debug and info
};

const env = process.env.NODE_ENV;

// Development: Pretty printing (Colors, readable timestamp)
// Production: JSON
const transport = env === 'development'
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard', // YYYY-mm-dd HH:MM:ss
        ignore: 'pid,hostname',
      },
    }
  : undefined;

const defaultLevel = env === 'development' ? 'debug' : env === 'test' ? 'silent' : 'info';

const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel,
  customLevels,
  // Emit the level label string (e.g., "level": "info") instead of just the number
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

export default logger;
