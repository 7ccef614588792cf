/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, createLogger, type Logger, type LogLevel } from './Logger.js';
export { EventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export { AppError, ConfigError, StoreError, ProxmoxApiError, TimeoutError } from './errors.js';
export { getVersion, getVersionInfo, logBanner, type VersionInfo } from './version.js';
export { Application, createApplication, type ApplicationOptions, type ApplicationDependencies } from './Application.js';
