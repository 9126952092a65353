/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, createLogger, type LogLevel, type Logger } from './Logger.js';
export { EventBus, eventBus, EventTypes, type EventType, type EventPayloadMap } from './EventBus.js';
export { ConfigError } from './errors.js';
export { Application, createApplication, seedStaticRecords, type ApplicationOptions } from './Application.js';
