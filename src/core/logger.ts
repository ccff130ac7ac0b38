import winston from 'winston';
import { config } from './config';

const isProduction = config.server.env === 'production';

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.server.env === 'test',
  defaultMeta: { service: 'claims-desk' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction
      ? winston.format.json()
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${service}] ${level}: ${message}${extra}`;
          })
        )
  ),
  transports: [new winston.transports.Console()],
});
