/**
 * Tests for CLI output formatting and argument parsing
 */

import { describe, test, expect } from 'vitest';
import {
    formatContentItem,
    formatServerInfo,
    formatToolList,
    formatToolResult,
    parsePromptArguments,
    parseToolArguments,
    toJson
} from '../../src/utils/output-format.js';

describe('parseToolArguments', () => {
    test('parses a JSON object', () => {
        expect(parseToolArguments('{"city":"Oslo","days":3}')).toEqual({ city: 'Oslo', days: 3 });
    });

    test('no arguments is an empty object', () => {
        expect(parseToolArguments()).toEqual({});
        expect(parseToolArguments('  ')).toEqual({});
    });

    test('rejects JSON that is not an object', () => {
        expect(() => parseToolArguments('[1]')).toThrow('Invalid tool arguments: (root): Expected object, received array');
    });

    test('rejects text that is not JSON', () => {
        expect(() => parseToolArguments('city=Oslo')).toThrow(/^Invalid tool arguments JSON: /);
    });
});

describe('parsePromptArguments', () => {
    test('accepts string values only', () => {
        expect(parsePromptArguments('{"name":"Ada"}')).toEqual({ name: 'Ada' });
        expect(() => parsePromptArguments('{"count":1}')).toThrow('Invalid prompt arguments: count: Expected string, received number');
    });
});

describe('formatServerInfo', () => {
    test('MCP server with protocol version', () => {
        expect(formatServerInfo({
            name:            'files',
            version:         '1.0.0',
            protocolType:    'MCP',
            protocolVersion: '2024-11-05',
            capabilities:    ['tools', 'resources'],
        })).toBe('files 1.0.0 (MCP)\nProtocol version: 2024-11-05\nCapabilities: tools, resources');
    });

    test('no capabilities', () => {
        expect(formatServerInfo({ name: 'bare', version: '0.1.0', protocolType: 'MCP', capabilities: [] }))
            .toBe('bare 0.1.0 (MCP)\nCapabilities: none');
    });
});

describe('formatToolList', () => {
    test('one tool per line with its description', () => {
        expect(formatToolList([
            { name: 'echo', description: 'Echo input', inputSchema: {} },
            { name: 'bare', inputSchema: {} },
        ])).toBe('echo - Echo input\nbare');
    });

    test('empty list', () => {
        expect(formatToolList([])).toBe('No tools available.');
    });
});

describe('formatToolResult', () => {
    test('joins content items in order', () => {
        expect(formatToolResult({
            content: [
                { type: 'text', text: 'first' },
                { type: 'image', data: 'aGk=', mimeType: 'image/png' },
                { type: 'resource', resource: { type: 'text', uri: 'file:///a.txt', text: 'inline' } },
            ],
            isError: false,
        })).toBe('first\n[image image/png, 2 bytes]\ninline');
    });

    test('prefixes tool errors', () => {
        expect(formatToolResult({ content: [{ type: 'text', text: 'denied' }], isError: true })).toBe('Error: denied');
    });

    test('blob resources show their size', () => {
        expect(formatContentItem({
            type:     'resource',
            resource: { type: 'blob', uri: 'file:///a.bin', blob: 'AAEC' },
        })).toBe('[blob file:///a.bin application/octet-stream, 3 bytes]');
    });
});

describe('toJson', () => {
    test('pretty prints with two spaces', () => {
        expect(toJson({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
    });
});
