import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string, pretty = process.env.MCP_LOG_PRETTY === 'true'): Logger {
  const options: LoggerOptions = {
    level,
    base: undefined,
    redact: {
      paths: ['token', 'haToken', 'access_token', 'headers.Authorization', 'headers.authorization'],
      censor: '[REDACTED]'
    }
  };

  // stdout carries the stdio JSON-RPC frames; logs must go to stderr.
  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(options, pino.destination({ fd: 2, sync: false }));
}
