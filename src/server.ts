import './preload';
import { createApp } from './app';
import { appConfig } from './config/app.config';
import { validateConfig } from './config/config.validation';
import { database } from './config/database.init';
import { ControllerFactory } from './factories/controller.factory';
import { logger } from '@/utils';

const start = async (): Promise<void> => {
    validateConfig();
    await database.initialize();
    logger.info('Database initialized successfully');

    const app = createApp({ routers: ControllerFactory.createServiceRouters(appConfig.serviceName) });

    const server = app.listen(appConfig.port, () => {
        logger.info(`${appConfig.serviceName} service running on port ${appConfig.port}`);
        logger.info(`Environment: ${appConfig.env}`);
        logger.info(`Health check: http://localhost:${appConfig.port}/health`);
    });

    process.on('SIGTERM', () => {
        logger.info('SIGTERM received, shutting down');
        server.close(() => {
            database.close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Failed to close database connection', error);
                    process.exit(1);
                });
        });
    });
};

start().catch((error: unknown) => {
    logger.error('Server failed to start', error);
    process.exit(1);
});
