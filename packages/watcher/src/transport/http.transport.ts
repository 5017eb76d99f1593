import { type Site, type TransportError, transportError } from '@mention-watch/shared';
import { ResultAsync } from 'neverthrow';
import type { QueryValue, RequestOptions, Transport } from './transport.interface.js';

export interface HttpTransportOptions {
    host: string;
    userAgent: string;
}

type Method = 'GET' | 'POST';

function encodeQueryValue(value: QueryValue): string {
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function errorText(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export class HttpTransport implements Transport {
    readonly baseUrl: string;
    readonly #authorization: string;

    constructor(
        site: Site,
        private options: HttpTransportOptions,
    ) {
        this.baseUrl = `https://${site.name}.${options.host}/api/v1/`;
        this.#authorization = `Basic ${Buffer.from(`${site.user}:${site.token}`).toString('base64')}`;
    }

    get(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError> {
        return this.#request('GET', path, options);
    }

    post(path: string, options?: RequestOptions): ResultAsync<unknown, TransportError> {
        return this.#request('POST', path, options);
    }

    buildUrl(path: string, query: Record<string, QueryValue> = {}): URL {
        const url = new URL(path, this.baseUrl);
        for (const [key, value] of Object.entries(query)) {
            url.searchParams.set(key, encodeQueryValue(value));
        }
        return url;
    }

    #request(method: Method, path: string, options: RequestOptions = {}): ResultAsync<unknown, TransportError> {
        const url = this.buildUrl(path, options.query);
        return ResultAsync.fromPromise(
            fetch(url, {
                method,
                headers: {
                    Authorization: this.#authorization,
                    'User-Agent': this.options.userAgent,
                    Accept: 'application/json',
                },
                signal: options.signal,
            }),
            (e) => transportError(`${method} ${path} failed: ${errorText(e)}`, e),
        ).andThen((res) =>
            ResultAsync.fromPromise(
                res.json().then((body: unknown) => body),
                (e) => transportError(`${method} ${path} returned a non-JSON body (HTTP ${res.status})`, e),
            ),
        );
    }
}
