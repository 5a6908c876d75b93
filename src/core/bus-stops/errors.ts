/**
 * Bus Stop Cache Error Types
 */

export const CacheReadErrorReason = {
    MISSING: 'MISSING',
    UNREADABLE: 'UNREADABLE',
    CORRUPT: 'CORRUPT',
    INVALID: 'INVALID',
} as const;
export type CacheReadErrorReasonType =
    (typeof CacheReadErrorReason)[keyof typeof CacheReadErrorReason];

/**
 * The cache file is absent or cannot be used.
 * Treated as a cache miss; callers outside the cache never see it.
 */
export class CacheReadError extends Error {
    constructor(
        message: string,
        public readonly reason: CacheReadErrorReasonType,
        public readonly path: string,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'CacheReadError';
    }
}
