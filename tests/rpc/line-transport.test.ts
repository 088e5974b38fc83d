/**
 * Tests for LineTransport and ProcessLineTransport
 */

import { describe, test, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { TransportClosedError, TransportError } from '../../src/errors.js';
import { LineTransport, ProcessLineTransport } from '../../src/rpc/line-transport.js';

const IGNORES_SIGTERM = "process.on('SIGTERM', () => {}); console.log('ready'); setInterval(() => {}, 1000);";

function createStreams() {
    return { stdin: new PassThrough(), stdout: new PassThrough(), stderr: new PassThrough() };
}

async function collect(lines: AsyncGenerator<string>): Promise<string[]> {
    const result: string[] = [];
    for await (const line of lines) {
        result.push(line);
    }
    return result;
}

describe('LineTransport', () => {
    test('writes each line whole and in call order', async () => {
        const streams = createStreams();
        const transport = new LineTransport(streams);

        await Promise.all([
            transport.writeLine('first'),
            transport.writeLine('second'),
            transport.writeLine('third'),
        ]);
        streams.stdin.end();

        expect(streams.stdin.read()?.toString()).toBe('first\nsecond\nthird\n');
    });

    test('rejects a line containing a newline', async () => {
        const transport = new LineTransport(createStreams());

        await expect(transport.writeLine('a\nb')).rejects.toBeInstanceOf(TransportError);
    });

    test('rejects writes after close', async () => {
        const transport = new LineTransport(createStreams());
        transport.close();

        expect(transport.isAlive).toBe(false);
        await expect(transport.writeLine('late')).rejects.toBeInstanceOf(TransportClosedError);
    });

    test('a failed write does not block the writes behind it', async () => {
        const streams = createStreams();
        const transport = new LineTransport(streams);

        const bad = transport.writeLine('bad\nline');
        const good = transport.writeLine('good');

        await expect(bad).rejects.toBeInstanceOf(TransportError);
        await expect(good).resolves.toBeUndefined();
    });

    test('reads stdout and stderr as independent line sequences', async () => {
        const streams = createStreams();
        const transport = new LineTransport(streams);

        streams.stdout.end('one\ntwo\n');
        streams.stderr.end('warning: something\n');

        const [output, errors] = await Promise.all([
            collect(transport.outputLines()),
            collect(transport.errorLines()),
        ]);

        expect(output).toEqual(['one', 'two']);
        expect(errors).toEqual(['warning: something']);
    });
});

describe('ProcessLineTransport', () => {
    test('round-trips a line through a child process', async () => {
        const transport = await ProcessLineTransport.spawn('cat');
        const lines = transport.outputLines();

        expect(transport.pid).toBeGreaterThan(0);
        await transport.writeLine('hello');
        await expect(lines.next()).resolves.toEqual({ done: false, value: 'hello' });

        transport.close();
        await expect(lines.next()).resolves.toEqual({ done: true, value: undefined });
        expect(transport.isAlive).toBe(false);
    });

    test('close ends a process that ignores SIGTERM', async () => {
        const transport = await ProcessLineTransport.spawn(process.execPath, ['-e', IGNORES_SIGTERM]);
        const lines = transport.outputLines();
        await expect(lines.next()).resolves.toEqual({ done: false, value: 'ready' });

        transport.close();

        await expect(lines.next()).resolves.toEqual({ done: true, value: undefined });
    });

    test('rejects with TransportError when the executable does not exist', async () => {
        await expect(ProcessLineTransport.spawn('toolscope-no-such-binary')).rejects.toBeInstanceOf(TransportError);
    });
});
