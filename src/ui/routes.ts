import express, { NextFunction, Request, Response } from 'express';
import { ApiResult, DeskApi } from './api';

const send = (res: Response, result: ApiResult) => {
  res.status(result.status).json(result.body);
};

const queryString = (value: unknown): string | undefined => (typeof value === 'string' && value.length ? value : undefined);

/** Mutating requests must echo the token handed out by GET /api/csrf. */
export const requireCsrf =
  (csrfToken: string) =>
  (req: Request, res: Response, next: NextFunction) => {
    if (req.method === 'GET' || req.get('x-csrf-token') === csrfToken) {
      next();
      return;
    }
    res.status(403).json({ error: 'Invalid CSRF token' });
  };

export const registerRoutes = (app: express.Express, api: DeskApi, csrfToken: string) => {
  app.use('/api', express.json(), requireCsrf(csrfToken));

  app.get('/api/csrf', (_req, res) => {
    res.json({ csrfToken });
  });

  app.get('/api/session', async (_req, res) => send(res, await api.session()));

  app.get('/api/positions', async (_req, res) => send(res, await api.positions()));

  app.get('/api/positions/:symbol', async (req, res) => send(res, await api.position(req.params.symbol)));

  app.post('/api/trades', async (req, res) => send(res, await api.recordTrade(req.body)));

  app.put('/api/positions/:symbol/base', async (req, res) => send(res, await api.setBaseShares(req.params.symbol, req.body)));

  app.put('/api/positions/:symbol/allocation', async (req, res) =>
    send(res, await api.setAllocation(req.params.symbol, req.body))
  );

  app.get('/api/band/:symbol', async (req, res) => send(res, await api.band(req.params.symbol, queryString(req.query.name))));

  app.post('/api/runs', async (req, res) => send(res, await api.startRun(req.body)));

  app.post('/api/runs/:id/advance', async (req, res) => send(res, await api.advanceRun(req.params.id)));

  app.post('/api/runs/:id/auto', async (req, res) => send(res, await api.autoRun(req.params.id)));

  app.post('/api/runs/:id/abandon', async (req, res) => send(res, await api.abandonRun(req.params.id)));

  app.get('/api/runs/:id', async (req, res) => send(res, await api.getRun(req.params.id)));

  app.get('/api/decisions', async (req, res) => send(res, await api.decisions(queryString(req.query.symbol))));
};
