/**
 * Staff Dashboard Controller
 *
 * GET /admin/orders                   today's orders by queue number
 * GET /admin/orders/summary           status counters + currently serving
 * PUT /admin/order/:orderId/status    set an order's status
 *
 * Access control is network segmentation (admin LAN), not this router.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { OrderService } from '../../services/orders/order.service.js';
import { orderIdParamSchema, statusUpdateSchema } from '../../services/orders/order.types.js';
import { toOrderView, toValidationError } from '../orders/order.views.js';

export function createAdminRouter(orderService: OrderService): Router {
  const router = Router();

  router.get('/admin/orders', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const orders = await orderService.listToday();
      res.json(orders.map(toOrderView));
    } catch (error) {
      next(error);
    }
  });

  router.get('/admin/orders/summary', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await orderService.summary());
    } catch (error) {
      next(error);
    }
  });

  router.put('/admin/order/:orderId/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const orderId = orderIdParamSchema.safeParse(req.params.orderId);
      if (!orderId.success) {
        next(toValidationError(orderId.error));
        return;
      }

      const body = statusUpdateSchema.safeParse(req.body);
      if (!body.success) {
        next(toValidationError(body.error));
        return;
      }

      const order = await orderService.updateStatus(orderId.data, body.data.status);
      res.json({ success: true, order: toOrderView(order) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
