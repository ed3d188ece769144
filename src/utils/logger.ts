// Centralized logging
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR
};

export function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVELS_BY_NAME[name];
}

// Errors lose their message and stack under JSON-ish console output
export function describeError(error: unknown): Record<string, unknown> | string {
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return String(error);
}

export class Logger {
    private static instance: Logger;
    private currentLevel: LogLevel = LogLevel.INFO;
    
    private constructor() {}
    
    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }
    
    setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }
    
    debug(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.log(`[DEBUG] ${message}`, context ?? '');
        }
    }
    
    info(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.log(`[INFO] ${message}`, context ?? '');
        }
    }
    
    warn(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.warn(`[WARN] ${message}`, context ?? '');
        }
    }
    
    error(message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            console.error(`[ERROR] ${message}`, error === undefined ? '' : describeError(error));
        }
    }
}

export const logger = Logger.getInstance();
