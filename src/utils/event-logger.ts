import config from '../config.js';
import logger from '../logger.js';
import { bigintReplacer } from './bigint.js';
import { deterministicIdFrom } from './deterministic-id.js';

export type EventValue = string | number | boolean | null | string[] | number[];
export type EventInput = EventValue | bigint;

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDocument {
    _id: string;
    category: string; // 'staking' for user actions, 'admin' for owner actions
    action: string; // 'stake', 'unstake', 'apr_factor_changed', ...
    type: string; // category_action
    timestamp: string;
    actor: string;
    data: Record<string, EventValue>;
    transactionId?: string;
}

export interface EventPublisher {
    readonly name: string;
    publish(events: EventDocument[]): Promise<void>;
}

function normalizeEventData(data: Record<string, EventInput>): Record<string, EventValue> {
    const normalized: Record<string, EventValue> = {};
    for (const [key, value] of Object.entries(data)) {
        normalized[key] = typeof value === 'bigint' ? value.toString() : value;
    }
    return normalized;
}

/**
 * Collects the events of one transaction. Nothing leaves the buffer until the
 * transaction commits.
 */
export class EventBuffer {
    readonly events: EventDocument[] = [];

    constructor(
        private readonly transactionId: string,
        private readonly now: number
    ) {}

    emit(category: string, action: string, actor: string, data: Record<string, EventInput>): EventDocument {
        const eventId = deterministicIdFrom([category, action, actor || 'anon', this.transactionId, this.events.length], 24);
        const event: EventDocument = {
            _id: eventId,
            category,
            action,
            type: `${category}_${action}`,
            timestamp: new Date(this.now * 1000).toISOString(),
            actor,
            data: normalizeEventData(data),
            transactionId: this.transactionId,
        };
        this.events.push(event);
        return event;
    }
}

/**
 * Committed events: a bounded in-memory history plus the registered publishers
 * (persistent store, Kafka).
 */
export class EventLog {
    private readonly recent: EventDocument[] = [];
    private readonly publishers: EventPublisher[] = [];

    constructor(private readonly bufferSize: number = config.recentEventsBuffer) {}

    addPublisher(publisher: EventPublisher): void {
        this.publishers.push(publisher);
        logger.debug(`[event-logger] Registered event publisher '${publisher.name}'.`);
    }

    async commit(events: EventDocument[]): Promise<void> {
        if (events.length === 0) return;
        for (const event of events) {
            logger.info(`${event.category}:${event.action} by ${event.actor}: ${JSON.stringify(event.data, bigintReplacer)}`);
            this.recent.push(event);
        }
        if (this.recent.length > this.bufferSize) {
            this.recent.splice(0, this.recent.length - this.bufferSize);
        }
        for (const publisher of this.publishers) {
            try {
                await publisher.publish(events);
            } catch (error) {
                // Transaction is already committed at this point
                logger.error(`[event-logger] Publisher '${publisher.name}' failed for ${events.length} event(s): ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }

    /** Newest first. */
    list(limit = 10, offset = 0): EventDocument[] {
        return [...this.recent].reverse().slice(offset, offset + limit);
    }

    get size(): number {
        return this.recent.length;
    }
}
