/**
 * In-memory log sink for presentation layers
 *
 * Holds timestamped, leveled entries for a debug view. This is the process's
 * own log; backend output collected by CapabilityClient.getLogs() is separate.
 */

import Transport from 'winston-transport';
import _ from 'lodash';

export interface LogEntry {
    timestamp: string
    level:     string
    message:   string
    context:   Record<string, unknown>
}

export const LOG_BUFFER_CAPACITY = 10000;
const LOG_BUFFER_TRIM = 1000;

export class LogBuffer {
    private entries: LogEntry[] = [];

    push(entry: LogEntry): void {
        this.entries.push(entry);
        if(this.entries.length > LOG_BUFFER_CAPACITY) {
            this.entries.splice(0, LOG_BUFFER_TRIM);
        }
    }

    getAll(): LogEntry[] {
        return [...this.entries];
    }

    clear(): void {
        this.entries = [];
    }

    get size(): number {
        return this.entries.length;
    }
}

const RESERVED_KEYS = ['level', 'message', 'timestamp'];

interface WinstonInfo {
    level:         string
    message:       unknown
    [key: string]: unknown
}

/**
 * winston transport feeding a LogBuffer
 */
export class LogBufferTransport extends Transport {
    constructor(private readonly buffer: LogBuffer, options?: Transport.TransportStreamOptions) {
        super(options);
    }

    override log(info: WinstonInfo, next: () => void): void {
        const context = _.fromPairs(_.reject(_.toPairs(info), ([key]) => _.includes(RESERVED_KEYS, key)));

        this.buffer.push({
            timestamp: _.isString(info.timestamp) ? info.timestamp : new Date().toISOString(),
            level:     info.level,
            message:   _.isString(info.message) ? info.message : JSON.stringify(info.message),
            context,
        });

        setImmediate(() => this.emit('logged', info));
        next();
    }
}
