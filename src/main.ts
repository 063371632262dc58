import 'dotenv/config';
import fs from 'fs';

import { localIntake, seedLocalRegistry } from './dev-registry.js';
import { FarmController } from './farm/farm-controller.js';
import { createFarmState, parseFarmConfig } from './farm/farm-config.js';
import type { FarmState } from './farm/farm-interfaces.js';
import { MongoFarmStore } from './farm/farm-store.js';
import { LocalTokenRegistry } from './farm/registry.js';
import logger from './logger.js';
import { disconnectKafkaProducer } from './modules/kafka.js';
import http from './modules/http/index.js';
import { mongo } from './mongo.js';
import settings from './settings.js';
import { flushFarmEvents } from './utils/event-logger.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal(`CRITICAL: Unhandled Rejection: ${reason instanceof Error ? reason.stack : String(reason)}`);
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let closing = false;

export async function main(): Promise<void> {
    logger.info(`Starting farm node with ${settings.farmConfigPath}...`);

    const raw: unknown = JSON.parse(fs.readFileSync(settings.farmConfigPath, 'utf8'));
    const definition = parseFarmConfig(raw);
    const farmId = definition.config.farmId;

    const db = await mongo.init();
    const store = new MongoFarmStore(db);
    let farm: FarmState | null = await store.load(farmId);
    if (!farm) {
        logger.info(`[main] No stored state for ${farmId}, starting a new farm`);
        farm = createFarmState(definition);
        await store.save(farm);
    }
    const state = farm;

    const registry = new LocalTokenRegistry(farmId, { autoRegister: true });
    if (typeof raw === 'object' && raw !== null && 'registry' in raw) {
        seedLocalRegistry(registry, raw.registry);
    }

    const controller = new FarmController(state, registry, {
        timeoutMs: settings.remoteCallTimeoutMs,
        onSettled: () => store.scheduleSave(state),
    });
    const app = http.createApp(controller, () => store.scheduleSave(state), localIntake(controller, registry));
    const server = http.init(app, settings.apiPort);

    const shutdown = async (signal: string): Promise<void> => {
        if (closing) return;
        closing = true;
        logger.info(`Received ${signal}, completing writer queue...`);
        server.close();
        await store.flush();
        await flushFarmEvents();
        await disconnectKafkaProducer();
        await mongo.close();
        logger.info('Farm node stopped');
        process.exit(0);
    };
    process.on('SIGINT', () => {
        shutdown('SIGINT').catch((error: unknown) => {
            logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        });
    });
}

main().catch((error: unknown) => {
    logger.fatal(`Failed to start farm node: ${error instanceof Error ? error.stack : String(error)}`);
    process.exit(1);
});
