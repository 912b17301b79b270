/**
 * Express server configuration.
 *
 * Assembles the run store, executor and scheduler into an application
 * context and mounts the API on it.
 */

import express from 'express';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { PipelineConfig } from './config';
import { FileRunStore } from './storage/file-run-store';
import { ProcessStepExecutor, StepExecutor } from './engine/step-executor';
import { Scheduler } from './engine/scheduler';
import { createErrorHandler, notFoundHandler, requestLogger } from './api/middleware';
import { createRunRoutes } from './api/runs';
import { SERVICE_ENVIRONMENT, collectSecrets } from './environment';
import { logger } from './logger';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: PipelineConfig;
  store: FileRunStore;
  executor: StepExecutor;
  scheduler: Scheduler;
  /** Environment the step programs inherit and the env checks read. */
  environment: NodeJS.ProcessEnv;
}

export interface AppContextOverrides {
  executor?: StepExecutor;
  environment?: NodeJS.ProcessEnv;
}

/** Create the application context with all services. */
export function createAppContext(config: PipelineConfig, overrides: AppContextOverrides = {}): AppContext {
  const environment = overrides.environment ?? process.env;
  const store = new FileRunStore(config.runsDir);
  const executor =
    overrides.executor ?? new ProcessStepExecutor({ killGraceMs: config.killGraceMs, baseEnv: environment });
  const scheduler = new Scheduler(store, executor, {
    maxConcurrentRuns: config.maxConcurrentRuns,
    stepTimeoutMs: config.stepTimeoutMs,
    interpreter: config.interpreter,
    scriptsDir: config.scriptsDir,
    checkEnvironment: config.checkEnvironment,
    environment,
  });
  return { config, store, executor, scheduler, environment };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      activeRuns: ctx.scheduler.activeRunIds().length,
      maxConcurrentRuns: ctx.scheduler.maxConcurrentRuns,
    });
  });

  app.use(
    '/api',
    createRunRoutes({
      store: ctx.store,
      scheduler: ctx.scheduler,
      jiraProjects: ctx.config.jiraProjects,
      environment: ctx.environment,
    }),
  );
  app.use('/api', notFoundHandler);

  const secrets = Object.values(SERVICE_ENVIRONMENT).flatMap((requirements) =>
    collectSecrets(requirements, ctx.environment),
  );
  app.use(createErrorHandler(secrets));

  return app;
}

/** Rehydrate persisted runs, then listen. Resolves once the port is bound. */
export async function startServer(ctx: AppContext): Promise<Server> {
  const loaded = await ctx.store.load();
  logger.info('Run history loaded', { runs: loaded, runsDir: ctx.config.runsDir });

  const app = createApp(ctx);
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(ctx.config.port, ctx.config.host);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      const port = isAddressInfo(address) ? address.port : ctx.config.port;
      logger.info('Server listening', { host: ctx.config.host, port });
      resolve(server);
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
