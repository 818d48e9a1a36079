export { LoggerModule } from './logger.module';
export { LoggerService, LogLevel } from './logger.service';
export type { LogContext, LogEntry } from './logger.service';
