/**
 * JSON over HTTP with a bounded timeout and schema validation
 */

import type { z } from 'zod';
import { Logger } from './logger';
import { FetchError, FetchErrorKind } from '@api/errors';

export interface FetchJsonOptions {
    headers?: Record<string, string>;
    timeoutMs: number;
}

function isAbortTimeout(error: unknown): boolean {
    return (
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
    );
}

/**
 * GET a URL and validate the JSON body.
 * Every failure (transport, status, body) becomes a FetchError.
 */
export async function fetchJson<T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    options: FetchJsonOptions
): Promise<z.output<T>> {
    let response: Response;
    try {
        response = await fetch(url, {
            headers: { Accept: 'application/json', ...options.headers },
            signal: AbortSignal.timeout(options.timeoutMs),
        });
    } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        if (isAbortTimeout(error)) {
            throw new FetchError(
                `Request timed out after ${options.timeoutMs}ms`,
                FetchErrorKind.TIMEOUT,
                url,
                undefined,
                cause
            );
        }
        throw new FetchError(
            `Request failed: ${String(error)}`,
            FetchErrorKind.NETWORK,
            url,
            undefined,
            cause
        );
    }

    if (!response.ok) {
        throw new FetchError(
            `API error: ${response.status}`,
            FetchErrorKind.HTTP_STATUS,
            url,
            response.status
        );
    }

    let body: unknown;
    try {
        body = await response.json();
    } catch (error) {
        if (isAbortTimeout(error)) {
            throw new FetchError(
                `Response body not received within ${options.timeoutMs}ms`,
                FetchErrorKind.TIMEOUT,
                url,
                response.status,
                error instanceof Error ? error : undefined
            );
        }
        throw new FetchError(
            'Response body is not valid JSON',
            FetchErrorKind.PARSE,
            url,
            response.status,
            error instanceof Error ? error : undefined
        );
    }

    const validated = schema.safeParse(body);
    if (!validated.success) {
        Logger.debug('Response failed validation', { url, issues: validated.error.issues });
        throw new FetchError(
            'Response did not match the expected format',
            FetchErrorKind.PARSE,
            url,
            response.status,
            validated.error
        );
    }

    return validated.data;
}
