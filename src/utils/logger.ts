/**
 * Process logger
 *
 * A winston logger that writes only to stderr so stdout stays free for the
 * CLI's JSON output, wrapped in a small `(context, message)` facade. The level
 * comes from LOG_LEVEL (default `info`); `silent` turns output off entirely.
 *
 * Presentation layers that own the terminal can attach a LogBuffer sink and
 * detach the console transport, see attachLogSink().
 */

import winston from 'winston';
import _ from 'lodash';
import { LogBufferTransport, type LogBuffer } from './log-buffer.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
    debug(context: Record<string, unknown>, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(context: Record<string, unknown>, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(context: Record<string, unknown>, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(context: Record<string, unknown>, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(raw: string): raw is LogLevel {
    return _.some(LOG_LEVELS, level => level === raw);
}

function resolveLevel(raw: string | undefined): { level: LogLevel, silent: boolean } {
    if(raw === 'silent') {
        return { level: 'error', silent: true };
    }
    if(raw !== undefined && isLogLevel(raw)) {
        return { level: raw, silent: false };
    }
    return { level: 'info', silent: false };
}

const consoleTransport = new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'debug'],
});

const { level: initialLevel, silent: initialSilent } = resolveLevel(process.env.LOG_LEVEL);

const baseLogger = winston.createLogger({
    level:  initialLevel,
    silent: initialSilent,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    transports: [consoleTransport],
});

export function wrapWinston(target: winston.Logger): Logger {
    const forward = (level: LogLevel) => function(this: Logger, contextOrMessage: Record<string, unknown> | string, messageOrMeta?: unknown, ...meta: unknown[]): Logger {
        if(_.isString(contextOrMessage)) {
            target.log(level, contextOrMessage, messageOrMeta, ...meta);
        } else {
            target.log(level, _.isString(messageOrMeta) ? messageOrMeta : '', contextOrMessage);
        }
        return this;
    };

    return {
        debug: forward('debug'),
        info:  forward('info'),
        warn:  forward('warn'),
        error: forward('error'),
    };
}

export const logger: Logger = wrapWinston(baseLogger);

/**
 * Change the level at runtime (the CLI's --debug flag). `silent` mutes every transport.
 */
export function setLogLevel(raw: string): void {
    const { level, silent } = resolveLevel(raw);
    baseLogger.level = level;
    baseLogger.silent = silent;
}

export interface AttachLogSinkOptions {
    /** Stop writing to stderr while the sink is attached */
    detachConsole?: boolean
}

/**
 * Route process log entries into `buffer`. Returns a function that undoes the attachment.
 */
export function attachLogSink(buffer: LogBuffer, options: AttachLogSinkOptions = {}): () => void {
    const transport = new LogBufferTransport(buffer);
    baseLogger.add(transport);
    if(options.detachConsole) {
        baseLogger.remove(consoleTransport);
    }

    return () => {
        baseLogger.remove(transport);
        if(options.detachConsole) {
            baseLogger.add(consoleTransport);
        }
    };
}
