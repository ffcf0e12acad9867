/**
 * Customer Order Controller
 *
 * GET  /menu               available menu items
 * GET  /currently-serving  lowest queue number being prepared or ready
 * POST /order              place today's order (or get the existing one)
 * GET  /order/status       this device's order for today
 * POST /order/clear        drop today's order so a new one can be placed
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { OrderService } from '../../services/orders/order.service.js';
import { orderSubmissionSchema } from '../../services/orders/order.types.js';
import { formatItemSummary } from '../../services/orders/item-summary.js';
import { getClientAddress } from './client-address.js';
import { toValidationError } from './order.views.js';

export interface CustomerRouterOptions {
  trustRealIpHeader: boolean;
}

export function createCustomerRouter(orderService: OrderService, options: CustomerRouterOptions): Router {
  const router = Router();

  router.get('/menu', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await orderService.listMenu());
    } catch (error) {
      next(error);
    }
  });

  router.get('/currently-serving', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ currentlyServing: await orderService.currentlyServing() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/order', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = orderSubmissionSchema.safeParse(req.body);
      if (!validation.success) {
        next(toValidationError(validation.error));
        return;
      }

      const address = getClientAddress(req, options.trustRealIpHeader);
      const { order, alreadyOrdered } = await orderService.submit(address, validation.data);

      if (alreadyOrdered) {
        res.status(200).json({
          queueNumber: order.queueNumber,
          status: order.status,
          alreadyOrdered: true,
          message: 'You already have an order today'
        });
        return;
      }

      res.status(201).json({
        queueNumber: order.queueNumber,
        status: order.status,
        alreadyOrdered: false
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/order/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const order = await orderService.status(getClientAddress(req, options.trustRealIpHeader));
      res.json({
        queueNumber: order.queueNumber,
        status: order.status,
        items: order.items,
        itemSummary: formatItemSummary(order.items),
        notes: order.notes
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/order/clear', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cleared = await orderService.clear(getClientAddress(req, options.trustRealIpHeader));
      res.json({ success: true, cleared });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
