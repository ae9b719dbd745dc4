import { Params } from 'nestjs-pino';

export function buildLoggerConfig(level: string): Params {
  return {
    pinoHttp: {
      level,
      // Removes pid, hostname
      base: null,
      // Dashboard polling would flood the log with request lines
      autoLogging: false,
      serializers: {
        req: () => undefined,
        res: () => undefined,
      },
    },
  };
}
