import winston from 'winston';
import LokiTransport from 'winston-loki';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'threadsage';
const lokiUrl = process.env.LOKI_URL || 'http://localhost:3100';

// Console transport with high-density format
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf((info) => {
        const { timestamp, level: _level, service, message, pid: _pid, nodeVersion: _node, ...meta } = info;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        // Only show meta if it has meaningful content
        const hasUsefulMeta =
          Object.keys(meta).length > 0 &&
          !Object.values(meta).every((v) => v === undefined || v === null);
        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(meta)}` : '';

        // Short service names
        const shortService = String(service || 'unknown').replace('@threadsage/', '').substring(0, 8);

        return `${String(timestamp)} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

// Add Loki transport if URL is configured
if (process.env.LOKI_URL && process.env.LOKI_URL !== 'disabled') {
  transports.push(
    new LokiTransport({
      host: lokiUrl,
      labels: {
        service: serviceName,
        environment: process.env.NODE_ENV || 'development',
        host: process.env.HOSTNAME || 'localhost',
      },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) => {
        console.error('Loki connection error:', err);
      },
    })
  );
}

// Add file transports in production
if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

/**
 * Timers that log `<label> completed` with the elapsed milliseconds
 */
export const performanceLogger = {
  startTimer: (label: string) => {
    const start = process.hrtime.bigint();
    return {
      end: (meta: Record<string, unknown> = {}) => {
        const duration = Number(process.hrtime.bigint() - start) / 1000000;
        logger.info(`${label} completed`, {
          ...meta,
          duration: Math.round(duration),
        });
        return duration;
      },
    };
  },
};

/**
 * Render an unknown thrown value for log metadata
 */
export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

