import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options = {
    level,
    base: { service: 'score-sheets' },
  };

  return destination ? pino(options, destination) : pino(options);
}

export const logger: Logger = createLogger(process.env.SCORE_SHEETS_LOG_LEVEL ?? 'info');
