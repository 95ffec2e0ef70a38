import 'dotenv/config';
import 'reflect-metadata';
import {serve} from '@hono/node-server';
import {container} from 'tsyringe';
import type {Logger} from './common/logging/Logger';
import {LoggerToken} from './common/logging/Logger';
import {closeContainer} from './config/container';
import {loadAppConfig} from './config/env';
import {createApp} from './index';

const config = loadAppConfig();
const app = createApp(config);
const logger = container.resolve<Logger>(LoggerToken);

const server = serve({fetch: app.fetch, port: config.PORT}, (info) => {
    logger.info({port: info.port}, `🌐 Listening on http://localhost:${String(info.port)}`);
});

const shutdown = (signal: string): void => {
    logger.info({signal}, 'Shutting down');
    server.close(() => {
        closeContainer()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({err: error}, 'Failed to close connections');
                process.exit(1);
            });
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
