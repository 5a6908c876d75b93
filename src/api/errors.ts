/**
 * Remote API Error Types
 */

export const FetchErrorKind = {
    NETWORK: 'NETWORK',
    TIMEOUT: 'TIMEOUT',
    HTTP_STATUS: 'HTTP_STATUS',
    PARSE: 'PARSE',
    TOO_MANY_PAGES: 'TOO_MANY_PAGES',
} as const;
export type FetchErrorKindType = (typeof FetchErrorKind)[keyof typeof FetchErrorKind];

/**
 * Network, HTTP or response-format failure while talking to a remote API.
 * Never retried automatically and never accompanied by partial data.
 */
export class FetchError extends Error {
    constructor(
        message: string,
        public readonly kind: FetchErrorKindType,
        public readonly url: string,
        public readonly status?: number,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'FetchError';
    }

    isTimeout(): boolean {
        return this.kind === FetchErrorKind.TIMEOUT;
    }

    isUnauthorized(): boolean {
        return this.status === 401 || this.status === 403;
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.kind) {
            case FetchErrorKind.TIMEOUT:
                return 'The LTA DataMall API did not respond in time. Please try again.';
            case FetchErrorKind.NETWORK:
                return 'Could not reach the LTA DataMall API. Please check your connection.';
            case FetchErrorKind.HTTP_STATUS:
                return this.isUnauthorized()
                    ? 'The LTA DataMall API rejected the account key. Please check LTA_API_KEY.'
                    : `The LTA DataMall API returned HTTP ${this.status ?? 'error'}.`;
            case FetchErrorKind.PARSE:
                return 'The LTA DataMall API returned an unexpected response.';
            case FetchErrorKind.TOO_MANY_PAGES:
                return 'The bus stop list did not end where expected; the download was abandoned.';
            default:
                return this.message;
        }
    }
}
