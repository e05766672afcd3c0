import winston from 'winston';

export interface LoggerOptions {
  level: string;
  file?: string;
  console?: boolean;
  silent?: boolean;
}

// Every npm level, so the Console transport never writes to stdout
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function createLogger(options: LoggerOptions): winston.Logger {
  const transports = [
    ...(options.file ? [new winston.transports.File({ filename: options.file })] : []),
    ...(options.console ? [new winston.transports.Console({ stderrLevels: ALL_LEVELS })] : []),
  ];

  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
  });
}
