import express, { Express } from 'express';
import cors from 'cors';
import type { Server } from 'http';

import type { FarmController } from '../../farm/farm-controller.js';
import logger from '../../logger.js';
import { type ChangeListener, createFarmRouter, type DepositIntake } from './farms.js';

export function createApp(controller: FarmController, onChange?: ChangeListener, intake?: DepositIntake): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());
    app.use('/farm', createFarmRouter(controller, onChange, intake));
    logger.trace(`Initialized API endpoint /farm for ${controller.farmId}`);
    return app;
}

/**
 * HTTP server module
 */
export function init(app: Express, port: number): Server {
    logger.debug(`Starting HTTP server on port ${port}`);
    const server = app.listen(port, () => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`HTTP server listening on port ${port}`);
        }
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
        } else if (error.code === 'EACCES') {
            logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
        } else {
            logger.error(`HTTP server error: ${error.message}`);
        }
    });
    return server;
}

export default {
    createApp,
    init,
};
