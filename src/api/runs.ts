/**
 * Run API routes.
 *
 * POST /runs — Submit a run
 * GET /runs — Run history, newest first
 * GET /runs/:runId — Run status
 * GET /runs/:runId/log — Incremental log content from a byte offset
 * GET /runs/:runId/artifacts — Artifacts saved by the run
 * GET /flows — Flow kinds with their steps and parameters
 * GET /env-status — Environment check per service
 */

import { Router } from 'express';
import { EngineError, isRecord, parameterValidationError, runNotFoundError } from '../domain/errors';
import { FLOW_KINDS, isFlowKind } from '../domain/flow';
import { Scheduler, SubmitOptions } from '../engine/scheduler';
import { RunStore } from '../storage/run-store';
import { buildFlowDefinition, listFlows } from '../flows/catalog';
import { environmentSummary } from '../environment';

export interface RunRoutesContext {
  store: RunStore;
  scheduler: Scheduler;
  jiraProjects: readonly string[];
  environment: NodeJS.ProcessEnv;
}

const OPTION_FLAGS = ['skipExisting', 'overwrite', 'append'] as const;

/** Validate the `options` object of a submit request. */
export function parseSubmitOptions(raw: unknown): SubmitOptions {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new EngineError(
      parameterValidationError('options must be an object', [{ field: 'options', message: 'must be an object' }]),
    );
  }
  const issues: Array<{ field: string; message: string }> = [];
  const options: SubmitOptions = {};
  for (const flag of OPTION_FLAGS) {
    const value = raw[flag];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      issues.push({ field: `options.${flag}`, message: `options.${flag} must be a boolean` });
      continue;
    }
    options[flag] = value;
  }
  const seed = raw.seedFromRunId;
  if (seed !== undefined) {
    if (typeof seed === 'string' && seed.length > 0) {
      options.seedFromRunId = seed;
    } else {
      issues.push({ field: 'options.seedFromRunId', message: 'options.seedFromRunId must be a run id' });
    }
  }
  if (issues.length > 0) {
    throw new EngineError(parameterValidationError(`Invalid options: ${issues.map((i) => i.message).join('; ')}`, issues));
  }
  return options;
}

/** Numeric query parameter; malformed values come back as NaN for the caller to reject. */
function queryNumber(value: unknown, fallback: number): number {
  if (typeof value !== 'string' || value === '') return fallback;
  return Number(value);
}

export function createRunRoutes(ctx: RunRoutesContext): Router {
  const router = Router();

  router.post('/runs', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const fields: Record<string, unknown> = isRecord(body) ? body : {};
      const { flow, parameters, options } = fields;
      if (!isFlowKind(flow)) {
        throw new EngineError(
          parameterValidationError(`flow must be one of ${FLOW_KINDS.join(', ')}`, [
            { field: 'flow', message: `Unknown flow: ${String(flow)}` },
          ]),
        );
      }
      const definition = buildFlowDefinition(flow, parameters, { jiraProjects: ctx.jiraProjects });
      const run = await ctx.scheduler.submit({ flow: definition, options: parseSubmitOptions(options) });
      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs', async (req, res, next) => {
    try {
      const limit = queryNumber(req.query.limit, 100);
      const offset = queryNumber(req.query.offset, 0);
      const runs = await ctx.scheduler.listRuns({
        limit: Number.isInteger(limit) && limit >= 0 ? limit : 100,
        offset: Number.isInteger(offset) && offset >= 0 ? offset : 0,
      });
      res.json({ runs, active: ctx.scheduler.activeRunIds() });
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId', async (req, res, next) => {
    try {
      res.json(await ctx.scheduler.status(req.params.runId));
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId/log', async (req, res, next) => {
    try {
      const offset = queryNumber(req.query.offset, 0);
      const chunk = await ctx.store.readLog(req.params.runId, offset);
      if (!chunk) throw new EngineError(runNotFoundError(req.params.runId));
      res.json(chunk);
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId/artifacts', async (req, res, next) => {
    try {
      const artifacts = await ctx.store.listArtifacts(req.params.runId);
      if (!artifacts) throw new EngineError(runNotFoundError(req.params.runId));
      res.json({ artifacts });
    } catch (err) {
      next(err);
    }
  });

  router.get('/flows', (_req, res) => {
    res.json({ flows: listFlows({ jiraProjects: ctx.jiraProjects }) });
  });

  router.get('/env-status', (_req, res) => {
    res.json(environmentSummary(ctx.environment));
  });

  return router;
}
