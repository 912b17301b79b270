/**
 * Ticket Pipeline — orchestration engine for multi-stage ticket export,
 * summarization, deduplication and document pipelines.
 *
 * The command line (`ticket-pipeline serve`, `run-jitbit`, `run-jira`, ...)
 * lives in ./cli; this module is the programmatic entry point.
 */

export { createApp, createAppContext, startServer } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { PipelineConfig } from './config';
export * from './domain/errors';
export * from './domain/flow';
export * from './domain/run';
export * from './engine/artifact-validator';
export * from './engine/artifacts';
export * from './engine/command';
export * from './engine/run-controller';
export * from './engine/scheduler';
export * from './engine/skip-policy';
export * from './engine/state-machine';
export * from './engine/step-executor';
export * from './storage/run-store';
export * from './storage/file-run-store';
export * from './flows/catalog';
export * from './flows/parameters';
export * from './environment';
export { createLogger, logger, setLogHandler, resetLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
