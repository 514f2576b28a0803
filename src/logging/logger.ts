export type LogMeta = Record<string, unknown>;

/** Diagnostic sink handed to the client and service through their constructors. */
export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

export interface ConsoleLoggerOptions {
    prefix?: string;
    debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const tag = `[${options.prefix ?? 'fraktjakt'}]`;
    const write = (sink: (...args: unknown[]) => void) => (message: string, meta?: LogMeta) => {
        if (meta) {
            sink(`${tag} ${message}`, meta);
        } else {
            sink(`${tag} ${message}`);
        }
    };
    return {
        debug: options.debug ? write(console.debug) : () => { },
        info: write(console.info),
        warn: write(console.warn),
        error: write(console.error),
    };
}

export const silentLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

export function errorToLog(error: unknown): LogMeta {
    if (error instanceof Error) {
        return {
            type: error.name,
            message: error.message,
        };
    }
    return { type: typeof error, message: String(error) };
}

export function truncate(text: string, maxLength: number = 500): string {
    return text.length <= maxLength ? text : `${text.substring(0, maxLength)}...`;
}
