export * from './errors';
export * from './Random';
export {
  loadConfig,
  createRandomFromConfig,
  type AppConfig,
  type LoadConfigOptions,
  type LogLevel,
} from './Config';
export { logger, createLogger, type Logger } from './Logger';
