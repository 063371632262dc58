import crypto from 'crypto';

import config from '../config.js';
import logger from '../logger.js';
import { initializeKafkaProducer, sendKafkaEvent } from '../modules/kafka.js';
import { ProcessingQueue } from '../processingQueue.js';
import settings from '../settings.js';

export type EventValue = string | number | boolean;

/**
 * Represents the structure of a farm event as published.
 */
export interface FarmEventDocument {
    _id: string;
    farmId: string;
    action: string; // 'stake', 'unstake', 'harvest', 'close', 'settlement_failed', ...
    actor: string;
    timestamp: string;
    data: Record<string, EventValue>;
}

const publishQueue = new ProcessingQueue();
let sequence = 0;

export function buildFarmEvent(
    farmId: string,
    action: string,
    actor: string,
    data: Record<string, EventValue>,
    timestamp: Date = new Date()
): FarmEventDocument {
    sequence++;
    const iso = timestamp.toISOString();
    return {
        _id: crypto.createHash('sha256').update([farmId, action, actor, iso, sequence].join('|')).digest('hex').substring(0, 16),
        farmId,
        action,
        actor,
        timestamp: iso,
        data,
    };
}

/**
 * Records a farm event and, with notifications enabled, queues it for Kafka.
 * Never throws and never waits on the broker.
 */
export function publishFarmEvent(farmId: string, action: string, actor: string, data: Record<string, EventValue> = {}): void {
    const event = buildFarmEvent(farmId, action, actor, data);
    logger.debug(`[event-logger] ${farmId} ${action} by ${actor}: ${JSON.stringify(data)}`);
    if (!settings.useNotification) return;

    publishQueue.push((callback) => {
        initializeKafkaProducer()
            .then(() => sendKafkaEvent(config.eventsTopic, event, farmId))
            .then(
                () => callback(null),
                (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
            );
    });
}

/** Waits for queued events to be handed to Kafka. */
export function flushFarmEvents(): Promise<void> {
    return publishQueue.drain();
}
