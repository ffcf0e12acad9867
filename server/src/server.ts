import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { RedisService } from './infra/redis/redis.service.js';
import { createOrderPortal } from './services/orders/index.js';

async function main(): Promise<void> {
    const config = getConfig();

    const redis = config.orderStore === 'redis' && config.redisUrl
        ? await RedisService.start({ url: config.redisUrl })
        : null;

    const { orderService, ledger } = await createOrderPortal({ config, redis });

    const app = createApp({
        orderService,
        ledger,
        trustRealIpHeader: config.trustRealIpHeader,
        corsOrigin: config.corsOrigin
    });

    const server = app.listen(config.port, config.host, () => {
        logger.info(`Server listening on http://${config.host}:${config.port}`);
    });

    function shutdown(signal: NodeJS.Signals) {
        logger.info(`Received ${signal}. Shutting down gracefully...`);
        server.close(() => {
            RedisService.close()
                .catch((err: unknown) => {
                    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Redis close failed');
                })
                .finally(() => {
                    logger.info('Server closed');
                    process.exit(0);
                });
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Startup failed');
    process.exit(1);
});
