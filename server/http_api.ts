import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { SetupError, ValidationError, errorMessage } from './errors.js';
import type { ProbeRuntime } from './runtime.js';
import { parseTarget, type RunRequest } from './target.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

/** Accepts `{ target: "host:port" }` or `{ host, port }` plus optional run parameters. */
export function parseRunBody(body: unknown): RunRequest {
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');

  let host: string;
  let port: number;
  if (typeof body.target === 'string') {
    const target = parseTarget(body.target);
    if (!target) throw new ValidationError(`Target must look like host:port, got "${body.target}"`);
    ({ host, port } = target);
  } else if (typeof body.host === 'string' && typeof body.port === 'number') {
    host = body.host;
    port = body.port;
  } else {
    throw new ValidationError('target (host:port) or host and port are required');
  }

  return {
    host,
    port,
    durationSeconds: optionalNumber(body, 'durationSeconds'),
    width: optionalNumber(body, 'width'),
    attemptTimeoutMs: optionalNumber(body, 'attemptTimeoutMs'),
    reportIntervalMs: optionalNumber(body, 'reportIntervalMs'),
  };
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }
  res.status(500).json({ error: errorMessage(error) });
}

export function createControlApp(runtime: ProbeRuntime): Express {
  const app = express();
  // reserved before start() suspends, so concurrent requests cannot both pass the check
  let starting = false;

  app.use(cors());
  app.use(express.json({ limit: '16kb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', activeRuns: runtime.activeRunCount() });
  });

  app.get('/api/settings', (_req, res) => {
    res.json(runtime.limits);
  });

  app.get('/api/runs', (_req, res) => {
    res.json({ runs: runtime.listRuns() });
  });

  app.post('/api/runs', async (req, res) => {
    try {
      const request = parseRunBody(req.body);
      if (starting || runtime.activeRunCount() > 0) {
        res.status(409).json({ error: 'A probe run is already active' });
        return;
      }

      starting = true;
      try {
        const handle = await runtime.start(request);
        res.status(202).json({ run: runtime.getRun(handle) });
      } finally {
        starting = false;
      }
    } catch (error) {
      if (error instanceof SetupError) {
        const failed = error.runId ? runtime.getRun(error.runId) : null;
        res.status(500).json({ error: error.message, code: error.code, report: failed?.report ?? null });
        return;
      }
      sendError(res, error);
    }
  });

  app.get('/api/runs/:id', (req, res) => {
    const run = runtime.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json({ run });
  });

  app.post('/api/runs/:id/stop', (req, res) => {
    const run = runtime.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    runtime.stop(run.id);
    res.status(202).json({ status: 'stopping', id: run.id });
  });

  // body-parser failures (malformed JSON, oversized body) arrive here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    sendError(res, error);
  });

  return app;
}
