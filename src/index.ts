import 'reflect-metadata';

// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration & errors
export { loadConfig, createValidatedConfig, DEFAULT_DB_EXTENSION } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, LoadConfigOptions } from './config/app-config.js';
export type { AppError, ConfigIssue, ConfigInvalidError, StartupFailedError, UnexpectedError } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';

// Logging
export type { Logger, ILoggerFactory } from './core/logging/index.js';

// File store
export * from './files/index.js';
