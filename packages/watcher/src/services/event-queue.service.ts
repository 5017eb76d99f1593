import {
    type ApiError,
    type ApiResult,
    type AppError,
    type ChatEvent,
    type EventQueue,
    type Site,
    apiError,
    decodeApiResult,
    isBadEventQueue,
    pollResponseSchema,
    registerResponseSchema,
} from '@mention-watch/shared';
import { type Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { Transport } from '../transport/transport.interface.js';

export interface PollBatch {
    events: ChatEvent[];
    /** Same object as the polled queue unless the cursor moved or the queue was re-registered. */
    queue: EventQueue;
    reregistered: boolean;
}

function unwrap<T>(result: ApiResult<T>, operation: string): Result<T, ApiError> {
    return result.result === 'success' ? ok(result.value) : err(apiError(operation, result.payload));
}

/** Moves the cursor to the highest event id seen; never backwards. */
export function advanceCursor(queue: EventQueue, events: readonly ChatEvent[]): EventQueue {
    const highest = events.reduce((max, event) => Math.max(max, event.id), queue.last_event_id);
    return highest === queue.last_event_id ? queue : { ...queue, last_event_id: highest };
}

/**
 * Registration and long-polling of one site's event queue.
 *
 * A queue the server reports as BAD_EVENT_QUEUE_ID is replaced inline by a fresh registration;
 * that poll yields an empty batch and the caller simply polls again.
 */
export class EventQueueClient {
    constructor(
        private transport: Transport,
        readonly site: Site,
    ) {}

    register(signal?: AbortSignal): ResultAsync<EventQueue, AppError> {
        return this.transport
            .post('register', {
                query: { event_types: ['message'], all_public_streams: false },
                signal,
            })
            .andThen((body) => decodeApiResult(registerResponseSchema, body, 'register'))
            .andThen((result) => unwrap(result, 'register'))
            .map(
                (registered): EventQueue => ({
                    site: this.site,
                    queue_id: registered.queue_id,
                    last_event_id: registered.last_event_id,
                }),
            );
    }

    longPoll(queue: EventQueue, signal?: AbortSignal): ResultAsync<PollBatch, AppError> {
        return this.transport
            .get('events', {
                query: { queue_id: queue.queue_id, last_event_id: queue.last_event_id, dont_block: false },
                signal,
            })
            .andThen((body) => decodeApiResult(pollResponseSchema, body, 'events'))
            .andThen((result): ResultAsync<PollBatch, AppError> => {
                const polled = unwrap(result, 'events');
                if (polled.isOk()) {
                    const { events } = polled.value;
                    return okAsync({ events, queue: advanceCursor(queue, events), reregistered: false });
                }

                if (!isBadEventQueue(polled.error)) {
                    return errAsync(polled.error);
                }

                console.info(`[event-queue:${this.site.name}] Queue ${queue.queue_id} expired, re-registering`);
                return this.register(signal).map((fresh): PollBatch => ({ events: [], queue: fresh, reregistered: true }));
            });
    }
}
