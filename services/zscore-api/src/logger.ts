import pino, { type DestinationStream, type Logger } from 'pino';

export function createLogger(level: string = process.env.LOG_LEVEL || 'info', destination?: DestinationStream): Logger {
  const options = { name: '@zscore/api', level };
  return destination ? pino(options, destination) : pino(options);
}
