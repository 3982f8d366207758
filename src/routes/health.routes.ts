import { Request, Response, Router } from 'express';
import { env } from '../config/env';
import { checkDatabaseHealth } from '../config/database';
import { checkRedisHealth } from '../config/redis';

const router = Router();

router.get('/health', async (_req: Request, res: Response) => {
  const [database, redis] = await Promise.all([
    env.STORAGE_DRIVER === 'postgres' ? checkDatabaseHealth() : Promise.resolve({ status: 'disabled' }),
    checkRedisHealth(),
  ]);

  const healthy = database.status !== 'unhealthy' && redis.status !== 'unhealthy';

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'ok' : 'degraded',
    database,
    redis,
    timestamp: new Date().toISOString(),
  });
});

export default router;
