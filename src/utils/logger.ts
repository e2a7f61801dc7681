import winston from 'winston';
import { config } from '../config';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const RESERVED_KEYS = ['timestamp', 'level', 'message', 'stack'];

// Appends whatever metadata the call site passed as indented JSON
const line = winston.format.printf((info) => {
  const meta = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.includes(key))
  );
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  const extra = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
  return `${info.timestamp} ${info.level}: ${info.message}${stack}${extra}`;
});

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' });

const transports: winston.transport[] = [
  new winston.transports.Console({
    level: config.log.level,
    silent: config.nodeEnv === 'test',
    format: winston.format.combine(timestamp, winston.format.colorize({ all: true }), line),
  }),
];

if (config.log.file) {
  transports.push(
    new winston.transports.File({
      filename: config.log.file,
      level: config.log.level,
      format: winston.format.combine(timestamp, line),
    })
  );
}

export const logger = winston.createLogger({
  level: config.log.level,
  levels,
  transports,
});
