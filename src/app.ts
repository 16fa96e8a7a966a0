import express from 'express';
import cors from 'cors';
import type { DBManager } from './db/manager';
import { createVacancyRouter } from './routes/vacancies';

export function createApp(manager: DBManager): express.Express {
  const app = express();

  // Middleware
  app.use(cors());

  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createVacancyRouter(manager));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'vacancies' });
  });

  // Error handler
  app.use(
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error('[Error]', err);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  );

  return app;
}
