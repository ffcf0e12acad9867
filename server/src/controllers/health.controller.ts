/**
 * Health & Readiness Endpoints
 *
 * - /health: Liveness check (is process alive?)
 * - /ready:  Readiness check (does the order store answer?)
 */

import { Router, type Request, type Response } from 'express';
import type { OrderLedger } from '../services/orders/order-ledger.interface.js';

export function createHealthRouter(ledger: OrderLedger): Router {
  const router = Router();

  /**
   * Liveness: 200 while the process runs, no dependency checks
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'UP',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Readiness: 503 when the order store does not answer a ping
   */
  router.get('/ready', async (req: Request, res: Response) => {
    const storeUp = await ledger.ping();

    const body = {
      status: storeUp ? 'UP' : 'NOT_READY',
      ready: storeUp,
      timestamp: new Date().toISOString(),
      checks: {
        process: 'UP',
        store: storeUp ? 'UP' : 'DOWN',
        backend: ledger.backend
      }
    };

    if (!storeUp) {
      req.log.warn({ event: 'readiness_store_down', backend: ledger.backend }, '[Health] Readiness check failed');
      res.status(503).json(body);
      return;
    }

    res.status(200).json(body);
  });

  return router;
}
