import {
    BAD_EVENT_QUEUE_ID,
    apiError,
    configError,
    decodeError,
    describeError,
    isBadEventQueue,
    notifierError,
    transportError,
    watcherError,
} from '../errors.js';

describe('error constructors', () => {
    it('transportError produces correct type, message, and cause', () => {
        const cause = new Error('ECONNRESET');
        const err = transportError('GET events failed', cause);
        expect(err).toEqual({ type: 'TRANSPORT_ERROR', message: 'GET events failed', cause });
    });

    it('decodeError without cause omits it', () => {
        const err = decodeError('bad body');
        expect(err).toEqual({ type: 'DECODE_ERROR', message: 'bad body', cause: undefined });
    });

    it('configError with cause', () => {
        const cause = new Error('ENOENT');
        expect(configError('cannot read config.json', cause)).toEqual({
            type: 'CONFIG_ERROR',
            message: 'cannot read config.json',
            cause,
        });
    });

    it('notifierError and watcherError carry their type', () => {
        expect(notifierError('notify-send missing').type).toBe('NOTIFIER_ERROR');
        expect(watcherError('loop crashed').type).toBe('WATCHER_ERROR');
    });
});

describe('apiError', () => {
    it('extracts code and msg from the payload', () => {
        const payload = { result: 'error', msg: 'Bad event queue id: q1', code: BAD_EVENT_QUEUE_ID, queue_id: 'q1' };
        const err = apiError('events', payload);
        expect(err).toEqual({
            type: 'API_ERROR',
            message: 'events call failed: Bad event queue id: q1',
            code: 'BAD_EVENT_QUEUE_ID',
            payload,
        });
    });

    it('falls back to the serialized payload when msg is missing', () => {
        const err = apiError('register', { result: 'error' });
        expect(err.message).toBe('register call failed: {"result":"error"}');
        expect(err.code).toBeNull();
    });

    it('ignores a non-string code', () => {
        expect(apiError('events', { result: 'error', code: 42 }).code).toBeNull();
    });
});

describe('isBadEventQueue', () => {
    it('matches only API errors with the BAD_EVENT_QUEUE_ID code', () => {
        expect(isBadEventQueue(apiError('events', { code: BAD_EVENT_QUEUE_ID }))).toBe(true);
        expect(isBadEventQueue(apiError('events', { code: 'UNAUTHORIZED' }))).toBe(false);
        expect(isBadEventQueue(apiError('events', {}))).toBe(false);
        expect(isBadEventQueue(transportError(BAD_EVENT_QUEUE_ID))).toBe(false);
    });
});

describe('describeError', () => {
    it('includes the API code when present', () => {
        expect(describeError(apiError('events', { code: 'UNAUTHORIZED', msg: 'nope' }))).toBe(
            'API_ERROR (UNAUTHORIZED): events call failed: nope',
        );
    });

    it('uses type and message otherwise', () => {
        expect(describeError(transportError('socket hang up'))).toBe('TRANSPORT_ERROR: socket hang up');
    });
});
