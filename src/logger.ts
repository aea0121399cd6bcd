import path from 'node:path';
import log from 'electron-log/node';
import type { LogLevel } from './config/match-config.js';

log.transports.file.level = false;

export interface LoggerOptions {
  level: LogLevel;
  logDir?: string;
}

export const configureLogger = ({ level, logDir }: LoggerOptions): void => {
  log.transports.console.level = level;
  if (!logDir) {
    log.transports.file.level = false;
    return;
  }
  log.transports.file.level = level;
  log.transports.file.resolvePathFn = () => path.join(logDir, 'reconcile.log');
};

export default log;
