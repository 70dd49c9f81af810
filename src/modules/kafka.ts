import { Kafka, Producer, logLevel } from 'kafkajs';

import logger from '../logger.js';
import settings from '../settings.js';
import { EventDocument, EventPublisher } from '../utils/event-logger.js';

let kafka: Kafka | null = null;
let producer: Producer | null = null;
let isConnected = false;

/**
 * Initializes the Kafka client and producer.
 * Only one producer is kept per process.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    try {
        kafka = new Kafka({
            clientId: settings.kafkaClientId,
            brokers: settings.kafkaBrokers,
            logLevel: logLevel.WARN,
            retry: {
                initialRetryTime: 300,
                retries: 5,
            },
        });

        const newProducer = kafka.producer({
            allowAutoTopicCreation: true,
        });

        await newProducer.connect();
        producer = newProducer;
        isConnected = true;
        logger.info(`[kafka-producer] Connected to ${settings.kafkaBrokers.join(',')} as ${settings.kafkaClientId}.`);

        producer.on('producer.disconnect', () => {
            logger.warn('[kafka-producer] Kafka producer disconnected.');
            isConnected = false;
        });
    } catch (error) {
        isConnected = false;
        const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
        logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
        producer = null;
    }
}

/**
 * Sends committed events to a Kafka topic, keyed by actor so one account's
 * events stay ordered within a partition.
 */
export async function sendKafkaEvents(topic: string, events: EventDocument[]): Promise<void> {
    if (!producer || !isConnected) {
        logger.warn('[kafka-producer] Kafka producer not initialized or not connected. Attempting to initialize...');
        await initializeKafkaProducer();
    }
    if (!producer || !isConnected) {
        throw new Error(`Kafka producer unavailable, ${events.length} event(s) for topic '${topic}' not sent`);
    }
    await producer.send({
        topic,
        messages: events.map(event => ({ key: event.actor, value: JSON.stringify(event) })),
    });
    logger.debug(`[kafka-producer] Sent ${events.length} event(s) to topic '${topic}'. First EventID: ${events[0]?._id ?? 'N/A'}`);
}

/**
 * Disconnects the Kafka producer.
 * Call this on application shutdown to ensure graceful disconnection.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (producer && isConnected) {
        try {
            await producer.disconnect();
            logger.info('[kafka-producer] Kafka producer disconnected successfully.');
        } catch (error) {
            logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
        } finally {
            producer = null;
            isConnected = false;
        }
    } else {
        logger.info('[kafka-producer] Kafka producer was not connected or already disconnected.');
    }
}

export class KafkaEventPublisher implements EventPublisher {
    readonly name = 'kafka';

    constructor(private readonly topic: string = settings.kafkaTopic) {}

    publish(events: EventDocument[]): Promise<void> {
        return sendKafkaEvents(this.topic, events);
    }
}
