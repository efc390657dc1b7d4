import { consoleAppender, createConsoleAppender } from './details/consoleAppender.js';
import { Action, Appender, Log, LogLevel } from './details/types.js';

let globalInputId = 0;

let currentAppender: Appender = consoleAppender;

export function createLog(tag?: string): Log {
    let initialLogLevel: LogLevel = LogLevel.info;
    const inputId = globalInputId++;
    const emit = (action: Action, message: string, loglevel: LogLevel) => {
        currentAppender({
            action,
            inputId,
            message,
            loglevel,
            tag
        });
    };
    return {
        start(message, loglevel) {
            if (loglevel !== undefined) {
                initialLogLevel = loglevel;
            }
            emit(Action.start, message, initialLogLevel);
        },
        update(message, loglevel) {
            emit(Action.update, message, loglevel ?? initialLogLevel);
        },
        success(message, loglevel) {
            emit(Action.success, message, loglevel ?? initialLogLevel);
        },
        fail(message, loglevel) {
            emit(Action.fail, message, loglevel ?? LogLevel.error);
        }
    };
}

export function setAppender(appender: Appender) {
    currentAppender = appender;
}

export function getAppender(): Appender {
    return currentAppender;
}

export { consoleAppender, createConsoleAppender };
export { filterMessages, byLevel, byTag } from './details/filter.js';
export { Action, LogLevel } from './details/types.js';
export type { Appender, Log, LogMessage } from './details/types.js';
