// src/app.ts
import express from 'express';
import swaggerUi from 'swagger-ui-express';

import { createApiRouter } from './api_v1.js';
import { openapi } from './openapi.js';
import type { SimulationService } from './simulation.js';

export type AppDeps = {
  service: SimulationService;
  apiKeys: string[];
};

export function createApp({ service, apiKeys }: AppDeps) {
  const app = express();
  app.set('etag', false);
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createApiRouter(service, apiKeys));

  // OpenAPI JSON (no-store + deep clone во избежание мутаций)
  app.get('/openapi.json', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(JSON.parse(JSON.stringify(openapi)));
  });

  // чтобы Swagger HTML тоже не кешировался
  const noStore = (_req: express.Request, res: express.Response, next: express.NextFunction) => {
    res.set('Cache-Control', 'no-store');
    next();
  };

  app.use(
    '/docs',
    noStore,
    swaggerUi.serve,
    swaggerUi.setup(undefined, {
      explorer: true,
      customSiteTitle: 'Cloud Simulation Gateway',
      swaggerUrl: '/openapi.json',
    })
  );

  return app;
}
