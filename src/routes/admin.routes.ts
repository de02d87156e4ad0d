import { Router, Request, Response } from 'express';
import { HoneypotLedger } from '../services/ledger';

export function createAdminRouter(ledger: HoneypotLedger): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const health = await ledger.checkHealth();

    res.status(health.status === 'healthy' ? 200 : 503).json({
      ...health,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
