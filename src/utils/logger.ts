import { readEnv, type LogLevelName } from '../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

function parseLevel(lvl: LogLevelName): LogLevel {
    switch (lvl) {
        case 'TRACE': // trace maps onto debug
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        case 'OFF': return LogLevel.NONE;
    }
}

export class Logger {
    private readonly level: LogLevel;
    private readonly prefix: string;

    constructor(prefix = '[stream-ops]', level?: LogLevel) {
        this.prefix = prefix;
        this.level = level ?? parseLevel(readEnv().logLevel);
    }

    /** Same level, narrower prefix: `[stream-ops:bulk]`. */
    child(scope: string): Logger {
        return new Logger(`${this.prefix.replace(/\]$/, '')}:${scope}]`, this.level);
    }

    debug(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.DEBUG) {
            // cyan
            console.debug(`\x1b[36m${this.prefix} [DEBUG]\x1b[0m ${msg}`, ...args);
        }
    }

    info(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.INFO) {
            // green
            console.log(`\x1b[32m${this.prefix} [INFO]\x1b[0m ${msg}`, ...args);
        }
    }

    warn(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.WARN) {
            // yellow
            console.warn(`\x1b[33m${this.prefix} [WARN]\x1b[0m ${msg}`, ...args);
        }
    }

    error(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.ERROR) {
            // red
            console.error(`\x1b[31m${this.prefix} [ERROR]\x1b[0m ${msg}`, ...args);
        }
    }
}

// Shared instance
export const logger = new Logger();
