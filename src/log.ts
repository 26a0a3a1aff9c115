import pino, { type Logger } from 'pino';
import { isTestEnv } from './util/env.js';

export function createLogger(level = process.env.LOG_LEVEL || 'info'): Logger {
    if (isTestEnv()) return pino({ level: 'silent' });
    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
            colorize: false,
            ignore: 'pid,hostname',
            destination: 2,
        },
    });
    return pino({
        base: undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    }, transport);
}
