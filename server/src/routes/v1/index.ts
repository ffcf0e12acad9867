/**
 * API v1 Router Aggregator
 *
 * Route Structure:
 * - GET  /menu                          customer
 * - GET  /currently-serving             customer
 * - POST /order                         customer
 * - GET  /order/status                  customer
 * - POST /order/clear                   customer
 * - GET  /admin/orders                  staff
 * - GET  /admin/orders/summary          staff
 * - PUT  /admin/order/:orderId/status   staff
 *
 * Mounted at /api/v1 and, as an unversioned alias, at /api. Both mounts return
 * the same camelCase payloads.
 */

import { Router } from 'express';
import type { OrderService } from '../../services/orders/order.service.js';
import { createCustomerRouter } from '../../controllers/orders/orders.controller.js';
import { createAdminRouter } from '../../controllers/admin/admin-orders.controller.js';

export interface V1RouterDeps {
  orderService: OrderService;
  trustRealIpHeader: boolean;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();

  router.use(createCustomerRouter(deps.orderService, { trustRealIpHeader: deps.trustRealIpHeader }));
  router.use(createAdminRouter(deps.orderService));

  return router;
}
