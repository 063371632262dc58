import { Kafka, Producer, logLevel } from 'kafkajs';

import logger from '../logger.js';

// KAFKA_BROKERS (comma-separated) or the single KAFKA_BROKER env var
const rawBrokers = process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092';
const KAFKA_BROKERS = rawBrokers
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
const KAFKA_CLIENT_ID = process.env.KAFKA_CLIENT_ID || 'farm-event-producer';

let producer: Producer | null = null;
let isConnected = false;
let initializing: Promise<void> | null = null;

async function connect(): Promise<void> {
    try {
        const kafka = new Kafka({
            clientId: KAFKA_CLIENT_ID,
            brokers: KAFKA_BROKERS,
            logLevel: logLevel.WARN,
            retry: {
                initialRetryTime: 300,
                retries: 5,
            },
        });

        const newProducer = kafka.producer({ allowAutoTopicCreation: true });
        await newProducer.connect();
        producer = newProducer;
        isConnected = true;

        producer.on('producer.disconnect', () => {
            logger.warn('[kafka-producer] Kafka producer disconnected.');
            isConnected = false;
        });
        logger.info(`[kafka-producer] Connected to ${KAFKA_BROKERS.join(',')}`);
    } catch (error) {
        isConnected = false;
        producer = null;
        const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
        logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
    }
}

/**
 * Initializes the Kafka producer once; concurrent callers share the same attempt.
 * A failed connection is logged, and the next call tries again.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    if (!initializing) {
        initializing = connect().finally(() => {
            initializing = null;
        });
    }
    await initializing;
}

/**
 * Sends a JSON message to a Kafka topic. Failures are logged, not thrown.
 * @param key - Optional key for the Kafka message, for partitioning.
 */
export async function sendKafkaEvent(topic: string, message: { _id: string }, key?: string): Promise<void> {
    if (!producer || !isConnected) {
        logger.error(`[kafka-producer] Producer unavailable, dropping event ${message._id} for topic ${topic}`);
        return;
    }

    const stringMessage = JSON.stringify(message);
    try {
        logger.debug(`[kafka-producer] Sending event to Kafka topic '${topic}'. Key: '${key || 'none'}', Message: ${stringMessage}`);
        await producer.send({
            topic,
            messages: [{ key, value: stringMessage }],
        });
    } catch (error) {
        logger.error(
            `[kafka-producer] Failed to send event to Kafka topic '${topic}': ${error instanceof Error ? error.message : String(error)}. Message: ${stringMessage}`
        );
    }
}

/**
 * Disconnects the Kafka producer.
 * Call this on application shutdown to ensure graceful disconnection.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (!producer || !isConnected) return;
    try {
        await producer.disconnect();
        logger.info('[kafka-producer] Kafka producer disconnected successfully.');
    } catch (error) {
        logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
        producer = null;
        isConnected = false;
    }
}
