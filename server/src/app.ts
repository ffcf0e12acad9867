import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { OrderService } from './services/orders/order.service.js';
import type { OrderLedger } from './services/orders/order-ledger.interface.js';
import { createV1Router } from './routes/v1/index.js';
import { createHealthRouter } from './controllers/health.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware.js';

export interface AppDeps {
  orderService: OrderService;
  ledger: OrderLedger;
  trustRealIpHeader?: boolean;
  corsOrigin?: string;
}

export function createApp(deps: AppDeps) {
    const app = express();
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '64kb' }));
    app.use(cors({ origin: deps.corsOrigin ?? '*' }));

    // Request context & logging (BEFORE routes)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(createHealthRouter(deps.ledger));

    const v1Router = createV1Router({
        orderService: deps.orderService,
        trustRealIpHeader: deps.trustRealIpHeader ?? true
    });
    app.use('/api/v1', v1Router);
    // Unversioned alias, same camelCase payloads
    app.use('/api', v1Router);

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
