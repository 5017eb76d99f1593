import type { ApiErrorPayload } from './types/api.js';

export type AppErrorType =
    | 'TRANSPORT_ERROR'
    | 'DECODE_ERROR'
    | 'API_ERROR'
    | 'CONFIG_ERROR'
    | 'NOTIFIER_ERROR'
    | 'WATCHER_ERROR';

export interface TransportError {
    type: 'TRANSPORT_ERROR';
    message: string;
    cause?: unknown;
}

export interface DecodeError {
    type: 'DECODE_ERROR';
    message: string;
    cause?: unknown;
}

export interface ApiError {
    type: 'API_ERROR';
    message: string;
    /** Machine-readable error code from the server, when it sent one. */
    code: string | null;
    payload: ApiErrorPayload;
}

export interface ConfigError {
    type: 'CONFIG_ERROR';
    message: string;
    cause?: unknown;
}

export interface NotifierError {
    type: 'NOTIFIER_ERROR';
    message: string;
    cause?: unknown;
}

export interface WatcherError {
    type: 'WATCHER_ERROR';
    message: string;
    cause?: unknown;
}

export type AppError = TransportError | DecodeError | ApiError | ConfigError | NotifierError | WatcherError;

export const BAD_EVENT_QUEUE_ID = 'BAD_EVENT_QUEUE_ID';

export const transportError = (message: string, cause?: unknown): TransportError => ({
    type: 'TRANSPORT_ERROR',
    message,
    cause,
});

export const decodeError = (message: string, cause?: unknown): DecodeError => ({ type: 'DECODE_ERROR', message, cause });

export function apiError(operation: string, payload: ApiErrorPayload): ApiError {
    const code = payload['code'];
    const msg = payload['msg'];
    return {
        type: 'API_ERROR',
        message: `${operation} call failed: ${typeof msg === 'string' ? msg : JSON.stringify(payload)}`,
        code: typeof code === 'string' ? code : null,
        payload,
    };
}

export const configError = (message: string, cause?: unknown): ConfigError => ({ type: 'CONFIG_ERROR', message, cause });

export const notifierError = (message: string, cause?: unknown): NotifierError => ({
    type: 'NOTIFIER_ERROR',
    message,
    cause,
});

export const watcherError = (message: string, cause?: unknown): WatcherError => ({ type: 'WATCHER_ERROR', message, cause });

/** The server dropped the event queue; the only error a watcher recovers from. */
export function isBadEventQueue(error: AppError): error is ApiError {
    return error.type === 'API_ERROR' && error.code === BAD_EVENT_QUEUE_ID;
}

export function describeError(error: AppError): string {
    if (error.type === 'API_ERROR' && error.code !== null) {
        return `${error.type} (${error.code}): ${error.message}`;
    }
    return `${error.type}: ${error.message}`;
}
