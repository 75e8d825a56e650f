import express, { Request, Response, NextFunction } from 'express';
import logger from './config/logger';
import { createAdminRouter } from './routes/admin/index';
import type { AdminAuth } from './routes/admin/index';
import type { AdminContext } from './routes/admin/controller';

export const createApp = (ctx: AdminContext, auth: AdminAuth) => {
  const app = express();

  // Middleware
  app.use(express.json());

  // log all requests
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info(`${req.method} ${req.url}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.send('OK');
  });

  app.use('/admin', createAdminRouter(ctx, auth));

  return app;
};
