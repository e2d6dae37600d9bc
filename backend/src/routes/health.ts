import { Router, Request, Response } from 'express';
import { testConnection } from '../config/database.js';
import { getServiceStatus } from '../services/index.js';

const router = Router();

router.get('/', async (req: Request, res: Response) => {
  const dbHealthy = await testConnection();
  const { initialized, cachedChunks } = getServiceStatus();

  const status = dbHealthy ? 'healthy' : 'degraded';
  const statusCode = dbHealthy ? 200 : 503;

  res.status(statusCode).json({
    status,
    timestamp: new Date().toISOString(),
    rootPath: req.rootPath ?? '',
    services: {
      database: dbHealthy ? 'connected' : 'disconnected',
      initialized,
      cachedChunks,
    },
  });
});

export default router;
