import type { TransportError } from '@mention-watch/shared';
import type { ResultAsync } from 'neverthrow';

/** Arrays are sent JSON-encoded, e.g. `event_types=["message"]`. */
export type QueryValue = string | number | boolean | readonly string[];

export interface RequestOptions {
    query?: Record<string, QueryValue>;
    signal?: AbortSignal;
}

/**
 * Authenticated request sender bound to one site's API root.
 * Resolves with the parsed JSON body whatever the HTTP status, since API errors arrive as JSON bodies.
 */
export interface Transport {
    get(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError>;
    post(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError>;
}
