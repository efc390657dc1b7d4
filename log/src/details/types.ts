export const enum LogLevel {
    verbose, // internal tracing, hidden by the default appender
    info, // shown to the user, not an error
    warn, // something is probably wrong, but the caller can continue
    error // the operation failed or the structure is broken
}

export const enum Action {
    start,
    update,
    success,
    fail
}

export interface LogMessage {
    inputId: number;
    loglevel: LogLevel;
    message: string;
    action: Action;
    tag?: string;
}

export type Appender = (message: LogMessage) => void;

export interface Log {
    start(message: string, loglevel?: LogLevel): void;
    update(message: string, loglevel?: LogLevel): void;
    success(message: string, loglevel?: LogLevel): void;
    fail(message: string, loglevel?: LogLevel): void;
}
