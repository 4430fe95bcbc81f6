import type { HttpMethod } from './flowData.js';

/**
 * Body of an outgoing request. `empty_object` and `none` are distinct on the
 * wire: the first sends `{}`, the second sends nothing.
 */
export type RequestBody =
    | { readonly kind: 'json'; readonly value: Readonly<Record<string, unknown>> }
    | { readonly kind: 'form'; readonly value: Readonly<Record<string, string>> }
    | { readonly kind: 'xml'; readonly value: string }
    | { readonly kind: 'empty_object' }
    | { readonly kind: 'none' };

export const Body = {
    json: (value: Readonly<Record<string, unknown>>): RequestBody => ({ kind: 'json', value }),
    form: (value: Readonly<Record<string, string>>): RequestBody => ({ kind: 'form', value }),
    xml: (value: string): RequestBody => ({ kind: 'xml', value }),
    emptyObject: (): RequestBody => ({ kind: 'empty_object' }),
    none: (): RequestBody => ({ kind: 'none' })
};

/** Fully assembled request, ready for any HTTP client. */
export interface ConnectorRequest {
    readonly method: HttpMethod;
    readonly url: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly body?: string;
}

/** What the transport hands back. */
export interface RawResponse {
    readonly statusCode: number;
    readonly body: string;
    readonly headers?: Readonly<Record<string, string>>;
}

export function contentTypeFor(body: RequestBody): string | undefined {
    switch (body.kind) {
        case 'json':
        case 'empty_object':
            return 'application/json';
        case 'form':
            return 'application/x-www-form-urlencoded';
        case 'xml':
            return 'application/xml';
        case 'none':
            return undefined;
    }
}

export function serializeBody(body: RequestBody): string | undefined {
    switch (body.kind) {
        case 'json':
            return JSON.stringify(body.value);
        case 'empty_object':
            return '{}';
        case 'form':
            return new URLSearchParams(Object.entries(body.value)).toString();
        case 'xml':
            return body.value;
        case 'none':
            return undefined;
    }
}

/**
 * Joins a base URL and a path without doubling or dropping the slash.
 * Absolute paths are returned unchanged.
 */
export function joinUrl(baseUrl: string, path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function isSuccessStatus(statusCode: number): boolean {
    return statusCode >= 200 && statusCode < 300;
}
