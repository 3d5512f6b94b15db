import pino, { type Logger } from 'pino';

/**
 * Create the process logger
 *
 * Pretty-prints through pino-pretty; `silent` skips the transport so no
 * worker thread is started (tests).
 *
 * @param level - pino level, defaults to LOG_LEVEL or "info"
 */
export const createLogger = (level: string = process.env.LOG_LEVEL ?? 'info'): Logger => {
    if (level === 'silent') {
        return pino({ level });
    }

    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                ignore: 'pid,hostname',
                translateTime: 'SYS:dd-mm-yyyy HH:MM:ss'
            }
        }
    });
};

const logger = createLogger();

export type { Logger };
export default logger;
