/**
 * Line Transport
 *
 * Owns the three standard streams of a server process: writes go to stdin one
 * newline-terminated line at a time, and stdout and stderr are each read as
 * independent line sequences so two loops can consume them concurrently.
 * When the process dies both sequences end.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import _ from 'lodash';
import { TransportClosedError, TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface LineStreams {
    stdin:  Writable
    stdout: Readable
    stderr: Readable
}

export interface SpawnOptions {
    env?: Record<string, string>
    cwd?: string
}

async function* readLines(stream: Readable): AsyncGenerator<string> {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    try {
        for await (const line of lines) {
            yield line;
        }
    } finally {
        lines.close();
    }
}

/**
 * Line-oriented view of a writable input and two readable outputs.
 *
 * Writes are chained so each line reaches the stream whole and in call order,
 * and a failed write is reported to its own caller only.
 */
export class LineTransport {
    private writeChain: Promise<void> = Promise.resolve();
    private inputClosed = false;

    constructor(protected readonly streams: LineStreams) {
        streams.stdin.on('error', (error: Error) => {
            this.inputClosed = true;
            logger.debug({ error: error.message }, 'Server stdin error');
        });
        streams.stdin.on('close', () => {
            this.inputClosed = true;
        });
    }

    get isAlive(): boolean {
        return !this.inputClosed;
    }

    writeLine(line: string): Promise<void> {
        if(_.includes(line, '\n')) {
            return Promise.reject(new TransportError('Refusing to write a line containing a newline'));
        }

        const write = this.writeChain.then(() => new Promise<void>((resolve, reject) => {
            if(!this.isAlive || this.streams.stdin.writableEnded) {
                reject(new TransportClosedError('Cannot write: server input is closed'));
                return;
            }
            this.streams.stdin.write(`${line}\n`, (error) => {
                if(error) {
                    reject(new TransportClosedError(`Failed to write to server: ${error.message}`, { cause: error }));
                } else {
                    resolve();
                }
            });
        }));

        // Keep the chain alive past a failed write; the caller still sees the rejection
        this.writeChain = write.catch(_.noop);
        return write;
    }

    /** Lines from stdout, ending when the stream ends */
    outputLines(): AsyncGenerator<string> {
        return readLines(this.streams.stdout);
    }

    /** Lines from stderr, ending when the stream ends */
    errorLines(): AsyncGenerator<string> {
        return readLines(this.streams.stderr);
    }

    /** Close the input side. Subclasses owning a process also terminate it. */
    close(): void {
        this.inputClosed = true;
        this.streams.stdin.end();
    }
}

/**
 * LineTransport over a spawned child process
 */
export class ProcessLineTransport extends LineTransport {
    private constructor(private readonly child: ChildProcessWithoutNullStreams, readonly command: string) {
        super({ stdin: child.stdin, stdout: child.stdout, stderr: child.stderr });
    }

    /**
     * Spawn `command` with piped stdio. Resolves once the OS has started the
     * process; a missing executable or similar spawn failure rejects with TransportError.
     */
    static async spawn(command: string, args: string[] = [], options: SpawnOptions = {}): Promise<ProcessLineTransport> {
        logger.debug({ command, args }, 'Spawning server process');

        const env: NodeJS.ProcessEnv = { ...process.env, ...options.env };

        let child: ChildProcessWithoutNullStreams;
        try {
            child = spawn(command, args, { env, cwd: options.cwd });
        } catch (error) {
            throw new TransportError(`Failed to spawn server process: ${command}`, { cause: error });
        }

        await new Promise<void>((resolve, reject) => {
            const onSpawn = () => {
                child.off('error', onError);
                resolve();
            };
            const onError = (error: Error) => {
                child.off('spawn', onSpawn);
                reject(new TransportError(`Failed to spawn server process: ${command}: ${error.message}`, { cause: error }));
            };
            child.once('spawn', onSpawn);
            child.once('error', onError);
        });

        child.on('error', (error: Error) => {
            logger.error({ command, error: error.message }, 'Server process error');
        });
        child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
            logger.debug({ command, code, signal }, 'Server process exited');
        });

        logger.debug({ command, pid: child.pid }, 'Server process started');
        return new ProcessLineTransport(child, command);
    }

    get pid(): number | undefined {
        return this.child.pid;
    }

    override get isAlive(): boolean {
        return super.isAlive && this.child.exitCode === null && this.child.signalCode === null;
    }

    /**
     * Kill the process with SIGKILL, which a server cannot trap; both line
     * sequences then observe end-of-stream
     */
    override close(): void {
        super.close();
        if(this.child.exitCode === null && this.child.signalCode === null) {
            this.child.kill('SIGKILL');
        }
    }
}
