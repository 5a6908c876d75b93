/**
 * Configuration Error Types
 */

import type { z } from 'zod';

export const ConfigErrorCode = {
    INVALID_CONFIG: 1,
    MISSING_API_KEY: 2,
} as const;
export type ConfigErrorCodeType = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

/**
 * Raised when configuration cannot be loaded or a required setting is absent.
 * Always fatal for the command that needs it.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly code: ConfigErrorCodeType,
        public readonly issues?: z.ZodIssue[],
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'ConfigError';
    }

    isMissingApiKey(): boolean {
        return this.code === ConfigErrorCode.MISSING_API_KEY;
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case ConfigErrorCode.MISSING_API_KEY:
                return 'LTA_API_KEY not found in environment variables. Please set it before querying the LTA DataMall API.';
            case ConfigErrorCode.INVALID_CONFIG: {
                const details = (this.issues ?? [])
                    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                    .join('; ');
                return details ? `${this.message}: ${details}` : this.message;
            }
            default:
                return this.message;
        }
    }
}
