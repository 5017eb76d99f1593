import { type Site, type TransportError, transportError } from '@mention-watch/shared';
import { type Result, ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { RequestOptions, Transport } from '../transport/transport.interface.js';

export function expectOk<T, E>(result: Result<T, E>): T {
    if (result.isErr()) {
        throw new Error(`Expected Ok but got Err: ${JSON.stringify(result.error)}`);
    }
    return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
    if (result.isOk()) {
        throw new Error(`Expected Err but got Ok: ${JSON.stringify(result.value)}`);
    }
    return result.error;
}

export const testSite: Site = Object.freeze({ name: 'acme', user: 'bot@acme.test', token: 'test-secret' });

type Method = 'GET' | 'POST';

type Reply = { body: unknown } | { error: TransportError };

export interface RecordedCall {
    method: Method;
    path: string;
    query: RequestOptions['query'];
}

/**
 * In-process transport answering from per-method reply queues.
 * Once a queue is empty it either fails (default) or holds the request open until its signal aborts.
 */
export class FakeTransport implements Transport {
    readonly calls: RecordedCall[] = [];
    #replies: Record<Method, Reply[]> = { GET: [], POST: [] };

    constructor(private whenEmpty: 'fail' | 'hang' = 'fail') {}

    replyPost(...bodies: unknown[]): this {
        this.#replies.POST.push(...bodies.map((body) => ({ body })));
        return this;
    }

    replyGet(...bodies: unknown[]): this {
        this.#replies.GET.push(...bodies.map((body) => ({ body })));
        return this;
    }

    failGet(error: TransportError): this {
        this.#replies.GET.push({ error });
        return this;
    }

    callsTo(method: Method): RecordedCall[] {
        return this.calls.filter((c) => c.method === method);
    }

    get(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError> {
        return this.#next('GET', path, options);
    }

    post(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError> {
        return this.#next('POST', path, options);
    }

    #next(method: Method, path: string, options?: RequestOptions): ResultAsync<unknown, TransportError> {
        this.calls.push({ method, path, query: options?.query });
        const reply = this.#replies[method].shift();
        if (reply) {
            return 'error' in reply ? errAsync(reply.error) : okAsync(reply.body);
        }
        if (this.whenEmpty === 'fail') {
            return errAsync(transportError(`no reply queued for ${method} ${path}`));
        }

        const signal = options?.signal;
        const aborted = new Promise<void>((resolve) => {
            if (signal?.aborted) return resolve();
            signal?.addEventListener('abort', () => resolve(), { once: true });
        });
        return ResultAsync.fromSafePromise(aborted).andThen(() =>
            errAsync(transportError(`${method} ${path} aborted`)),
        );
    }
}

// --- Wire fixtures ---

export const registered = (queueId: string, lastEventId: number) => ({
    result: 'success',
    msg: '',
    queue_id: queueId,
    last_event_id: lastEventId,
});

export const polled = (...events: unknown[]) => ({ result: 'success', msg: '', events });

export const badQueue = (queueId: string) => ({
    result: 'error',
    msg: `Bad event queue ID: ${queueId}`,
    code: 'BAD_EVENT_QUEUE_ID',
    queue_id: queueId,
});

export const heartbeat = (id: number) => ({ id, type: 'heartbeat' });

export const messageEvent = (
    id: number,
    flags: string[],
    message: { content?: string; sender?: string; recipient?: string | Array<{ full_name: string }>; timestamp?: number } = {},
) => ({
    id,
    type: 'message',
    flags,
    message: {
        id: 1000 + id,
        content: message.content ?? `message ${id}`,
        display_recipient: message.recipient ?? 'general',
        sender_full_name: message.sender ?? 'Ada',
        timestamp: message.timestamp ?? 1_700_000_000,
        type: typeof message.recipient === 'object' ? 'private' : 'stream',
    },
});
