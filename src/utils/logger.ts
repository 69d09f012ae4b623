import pino from 'pino';
import path from 'path';
import { fileURLToPath } from 'url';

let logger: pino.Logger | null = null;

function createRootLogger(): pino.Logger {
  const logLevel = process.env.LOG_LEVEL || 'info';

  // pino-pretty runs in a worker thread; keep it out of test runs
  if (process.env.NODE_ENV === 'test' || process.env.LOG_PRETTY === 'false') {
    return pino({ level: logLevel });
  }

  return pino({
    level: logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });
}

function moduleName(name: string): string {
  if (!name.startsWith('file:')) {
    return name;
  }
  return path.basename(fileURLToPath(name)).replace(/\.[cm]?[jt]s$/, '');
}

export function getLogger(name: string): pino.Logger {
  if (!logger) {
    logger = createRootLogger();
  }

  return logger.child({ module: moduleName(name) });
}
