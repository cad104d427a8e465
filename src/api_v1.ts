// src/api_v1.ts
import express from 'express';
import { z } from 'zod';

import { sendError } from './errors.js';
import type { SimulationService } from './simulation.js';

/** --- simple auth (Bearer); пустой список ключей = открытый API --- */
export function requireAuth(apiKeys: string[]): express.RequestHandler {
  return (req, res, next) => {
    if (!apiKeys.length) return next();
    const hdr = req.header('authorization') || '';
    const token = hdr.startsWith('Bearer ') ? hdr.slice(7) : '';
    if (!token || !apiKeys.includes(token)) {
      res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
      return;
    }
    next();
  };
}

/** --- validators --- */
export const RunSchema = z.object({
  // колонка server_capacity в базе — integer
  server_capacity: z.number().int().positive().max(2_147_483_647),
  model_name: z.string().trim().min(1).optional(),
  experiment_name: z.string().trim().min(1).optional(),
});

const ListRunsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional().default(20),
  offset: z.coerce.number().int().min(0).max(10_000).optional().default(0),
});

export function createApiRouter(service: SimulationService, apiKeys: string[]) {
  const router = express.Router();
  const auth = requireAuth(apiKeys);

  /** health */
  router.get('/healthz', (_req, res) => {
    res.type('application/json').send({ ok: true, ts: new Date().toISOString() });
  });

  /** модели, доступные по ключу */
  router.get('/models', auth, async (_req, res) => {
    try {
      const items = await service.listModels();
      return res.json({ items, total: items.length });
    } catch (e) {
      return sendError(res, e);
    }
  });

  /** последняя версия модели: эксперименты и их входы */
  router.get('/models/:name/latest', auth, async (req, res) => {
    try {
      const name = z.string().min(1).parse(req.params.name);
      return res.json(await service.describeModel(name));
    } catch (e) {
      return sendError(res, e);
    }
  });

  router.post('/simulations/run', auth, async (req, res) => {
    try {
      const p = RunSchema.parse(req.body ?? {});
      const result = await service.run(p);
      return res.json(result);
    } catch (e) {
      return sendError(res, e);
    }
  });

  router.get('/simulations', auth, async (req, res) => {
    try {
      const p = ListRunsSchema.parse(req.query);
      const items = await service.listRuns(p);
      return res.json({ items, limit: p.limit, offset: p.offset });
    } catch (e) {
      return sendError(res, e);
    }
  });

  router.get('/simulations/:id', auth, async (req, res) => {
    try {
      const id = z.string().uuid().parse(req.params.id);
      return res.json(await service.getRun(id));
    } catch (e) {
      return sendError(res, e);
    }
  });

  return router;
}
