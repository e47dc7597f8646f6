import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
    name: string;
    level?: string;
    /** Defaults to stdout. */
    destination?: DestinationStream;
}

/**
 * Create a pino logger writing JSON lines to stdout, which the peer collects
 * from the chaincode container.
 */
export function createLogger(config: LoggerConfig): Logger {
    const { name, level = 'info', destination } = config;

    const options: LoggerOptions = {
        name,
        level,
        formatters: {
            level: (label) => ({ level: label }),
            bindings: () => ({}),
        },
        mixin: () => ({ service: name }),
        timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    };
    return destination ? pino(options, destination) : pino(options);
}
