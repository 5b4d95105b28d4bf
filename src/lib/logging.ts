import winston, { Logger } from 'winston';

const logger = winston.createLogger({
  level: 'info',
  format: winston.format.json(),
  defaultMeta: { label: 'root' },
  transports: [
  ]
});
if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.splat(),
      winston.format.colorize(),
      winston.format.printf(({ level, message, label }) => `${level}: [${label}] ${message}`)
    )
  }));
} else {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.splat(),
      winston.format.json()
    )
  }));
}

export type LogFactory = (name: string) => Logger;

export function setLogLevel(level: string) {
  logger.level = level;
}

export default function getLogger(name: string) {
  return logger.child({ label: name });
}
