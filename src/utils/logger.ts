/**
 * Centralized Logging Utility
 * Timestamped, levelled diagnostics on stderr so that stdout only carries results
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

const levels: Record<LogLevel, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
    SILENT: 4,
};

let debugMode = false;

export const Logger = {
    levels,
    currentLevel: 1 as number,

    _timestamp(): string {
        return new Date().toISOString().replace('T', ' ').substring(0, 23);
    },

    _format(level: string, message: string, ...args: unknown[]): unknown[] {
        return [`${this._timestamp()} - ${level} -`, message, ...args];
    },

    debug(message: string, ...args: unknown[]): void {
        if (this.currentLevel <= this.levels.DEBUG && debugMode) {
            console.error(...this._format('DEBUG', message, ...args));
        }
    },

    info(message: string, ...args: unknown[]): void {
        if (this.currentLevel <= this.levels.INFO) {
            console.error(...this._format('INFO', message, ...args));
        }
    },

    warn(message: string, ...args: unknown[]): void {
        if (this.currentLevel <= this.levels.WARN) {
            console.error(...this._format('WARNING', message, ...args));
        }
    },

    error(message: string, ...args: unknown[]): void {
        if (this.currentLevel <= this.levels.ERROR) {
            console.error(...this._format('ERROR', message, ...args));
        }
    },

    success(message: string, ...args: unknown[]): void {
        if (this.currentLevel <= this.levels.INFO) {
            console.error(...this._format('SUCCESS', message, ...args));
        }
    },

    setLevel(level: LogLevel): void {
        this.currentLevel = this.levels[level];
    },

    setDebugMode(enabled: boolean): void {
        debugMode = enabled;
        if (enabled) {
            this.setLevel('DEBUG');
        }
    },
};
