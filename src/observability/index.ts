export {
  createLogger,
  getLogger,
  initLogger,
  type LoggerConfig,
} from './logger.js';
