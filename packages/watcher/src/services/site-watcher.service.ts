import {
    type AppError,
    type ChatEvent,
    type EventQueue,
    type Site,
    formatConsoleLine,
    formatNotification,
    isImportant,
    watcherError,
} from '@mention-watch/shared';
import { type Result, ResultAsync, err, ok } from 'neverthrow';
import type { Notifier } from '../notifier/notifier.interface.js';
import type { EventQueueClient } from './event-queue.service.js';

export type OutputSink = (line: string) => void;

export interface WatcherOutcome {
    site: string;
    status: 'stopped';
}

export interface WatcherStats {
    polls: number;
    heartbeats: number;
    messages: number;
    important: number;
    unknown: number;
    reregistrations: number;
}

const consoleSink: OutputSink = (line) => console.log(line);

/**
 * Drives one site's event queue until it fails or `signal` aborts.
 * Batches are dispatched in server order and the next poll waits for the whole batch.
 */
export class SiteWatcher {
    #queue: EventQueue | null = null;
    #stats: WatcherStats = { polls: 0, heartbeats: 0, messages: 0, important: 0, unknown: 0, reregistrations: 0 };

    constructor(
        readonly site: Site,
        private client: EventQueueClient,
        private notifier: Notifier,
        private output: OutputSink = consoleSink,
    ) {}

    get queue(): EventQueue | null {
        return this.#queue;
    }

    stats(): WatcherStats {
        return { ...this.#stats };
    }

    run(signal?: AbortSignal): ResultAsync<WatcherOutcome, AppError> {
        return ResultAsync.fromPromise(this.#loop(signal), (e) =>
            watcherError(`Watcher for ${this.site.name} crashed: ${e instanceof Error ? e.message : String(e)}`, e),
        ).andThen((result) => result);
    }

    async #loop(signal?: AbortSignal): Promise<Result<WatcherOutcome, AppError>> {
        const tag = `[watcher:${this.site.name}]`;
        console.log(`${tag} Watching`);

        const registered = await this.client.register(signal);
        if (registered.isErr()) return this.#finish(registered.error, signal);
        let queue = registered.value;
        this.#queue = queue;
        console.log(`${tag} Queue ${queue.queue_id}`);

        while (!signal?.aborted) {
            const batch = await this.client.longPoll(queue, signal);
            if (batch.isErr()) return this.#finish(batch.error, signal);

            this.#stats.polls++;
            if (batch.value.reregistered) {
                this.#stats.reregistrations++;
                console.log(`${tag} Queue ${batch.value.queue.queue_id}`);
            }
            queue = batch.value.queue;
            this.#queue = queue;

            for (const event of batch.value.events) {
                await this.dispatch(event);
            }
        }

        return ok(this.#stopped());
    }

    async dispatch(event: ChatEvent): Promise<void> {
        const { payload } = event;
        switch (payload.type) {
            case 'heartbeat':
                this.#stats.heartbeats++;
                return;
            case 'message': {
                this.#stats.messages++;
                const important = isImportant(payload.flags);
                this.output(formatConsoleLine(this.site.name, payload.message, important));
                if (!important) return;

                this.#stats.important++;
                const notified = await this.notifier.notify(formatNotification(this.site.name, payload.message));
                if (notified.isErr()) {
                    console.warn(`[watcher:${this.site.name}] Notification failed: ${notified.error.message}`);
                }
                return;
            }
            case 'other':
                this.#stats.unknown++;
                console.warn(`[watcher:${this.site.name}] Unknown event type "${payload.event_type}" (id ${event.id})`);
                return;
            default: {
                const unhandled: never = payload;
                throw new Error(`Unhandled event payload: ${JSON.stringify(unhandled)}`);
            }
        }
    }

    #finish(error: AppError, signal?: AbortSignal): Result<WatcherOutcome, AppError> {
        // an aborted request surfaces as a transport error; that is a requested stop
        if (signal?.aborted) return ok(this.#stopped());
        return err(error);
    }

    #stopped(): WatcherOutcome {
        console.log(`[watcher:${this.site.name}] Stopped`);
        return { site: this.site.name, status: 'stopped' };
    }
}
