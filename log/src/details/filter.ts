import { Appender, LogLevel, LogMessage } from './types.js';

export function filterMessages(predicate: (logMessage: LogMessage) => boolean, appender: Appender): Appender {
    return function(logMessage: LogMessage) {
        if (predicate(logMessage)) {
            appender(logMessage);
        }
    };
}

export const byLevel = (min: LogLevel) => (logMessage: LogMessage) => logMessage.loglevel >= min;

export const byTag = (tag: string) => (logMessage: LogMessage) => logMessage.tag === tag;
