import pino from 'pino';
import type { Logger } from 'pino';

import { loadConfig } from '@/engine/Config';

const config = loadConfig();

// Pretty print only for local development; everything else gets JSON lines.
const transport =
  config.nodeEnv !== 'development'
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:standard',
        },
      };

/**
 * Application logger.
 */
export const logger: Logger = pino({
  level: config.logLevel,
  transport,
});

for (const warning of config.warnings) {
  logger.warn({ module: 'Config', issue: warning }, 'environment value ignored, using default');
}

/** Child logger tagged with the owning module, e.g. `createLogger('CombatManager')`. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
