// src/app.ts
import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { createApiV1 } from './api_v1.js';
import type { Controller } from './loop.js';
import { openapi } from './openapi.js';

export function createApp(controller: Controller, apiKeys: string[]): express.Express {
  const app = express();
  app.set('etag', false);
  app.use(express.json({ limit: '100kb' }));

  // ===== v1 REST =====
  app.use('/v1', createApiV1(controller, apiKeys));

  // ===== OpenAPI JSON (no-store + deep clone so the served copy is never mutated) =====
  app.get('/openapi.json', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(JSON.parse(JSON.stringify(openapi)));
  });

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
      customSiteTitle: 'HEMS Controller — status API',
      swaggerUrl: '/openapi.json',
    })
  );

  return app;
}
