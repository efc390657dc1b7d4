import { green, red } from 'kleur/colors';
import { Action, Appender, LogLevel, LogMessage } from './types.js';

export function createConsoleAppender(threshold: LogLevel = LogLevel.info): Appender {
    return (logMessage: LogMessage) => {
        if (logMessage.loglevel < threshold) {
            return;
        }
        let prefix = '';
        switch (logMessage.action) {
        case Action.success:
            prefix = green('✓');
            break;
        case Action.fail:
            prefix = red('✕');
            break;
        }
        const tag = logMessage.tag !== undefined ? `[${logMessage.tag}] ` : '';
        console.log(`${prefix} ${tag}${logMessage.message}`);
    };
}

export const consoleAppender = createConsoleAppender();
