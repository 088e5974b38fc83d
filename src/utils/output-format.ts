/**
 * Text rendering and argument parsing for the command line
 */

import _ from 'lodash';
import { z } from 'zod';
import type { ContentItem, ResourceContent, ServerInfo, ToolCallResult, ToolDescriptor } from '../types/capability.js';
import { formatZodIssues } from './config-loader.js';

const ToolArgumentsSchema = z.record(z.string(), z.unknown());
const PromptArgumentsSchema = z.record(z.string(), z.string());

function parseJsonObject<T>(raw: string | undefined, schema: z.ZodType<T>, what: string): T {
    let parsed: unknown = {};
    if(raw !== undefined && _.trim(raw) !== '') {
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new Error(`Invalid ${what} JSON: ${_.isError(error) ? error.message : String(error)}`, { cause: error });
        }
    }

    const result = schema.safeParse(parsed);
    if(!result.success) {
        throw new Error(`Invalid ${what}: ${formatZodIssues(result.error)}`);
    }
    return result.data;
}

/** `--args` for a tool call: any JSON object */
export function parseToolArguments(raw?: string): Record<string, unknown> {
    return parseJsonObject(raw, ToolArgumentsSchema, 'tool arguments');
}

/** `--args` for a prompt: a JSON object of strings */
export function parsePromptArguments(raw?: string): Record<string, string> {
    return parseJsonObject(raw, PromptArgumentsSchema, 'prompt arguments');
}

export function formatServerInfo(info: ServerInfo): string {
    const lines = [
        `${info.name} ${info.version} (${info.protocolType})`,
    ];
    if(info.protocolVersion) {
        lines.push(`Protocol version: ${info.protocolVersion}`);
    }
    lines.push(`Capabilities: ${info.capabilities.length > 0 ? _.join(info.capabilities, ', ') : 'none'}`);
    return _.join(lines, '\n');
}

export function formatToolList(tools: ToolDescriptor[]): string {
    if(tools.length === 0) {
        return 'No tools available.';
    }
    return _.join(_.map(tools, tool => (tool.description ? `${tool.name} - ${tool.description}` : tool.name)), '\n');
}

function formatResourceContent(resource: ResourceContent): string {
    switch(resource.type) {
        case 'text':
            return resource.text;
        case 'blob':
            return `[blob ${resource.uri} ${resource.mimeType ?? 'application/octet-stream'}, ${Buffer.from(resource.blob, 'base64').length} bytes]`;
    }
}

export function formatContentItem(item: ContentItem): string {
    switch(item.type) {
        case 'text':
            return item.text;
        case 'image':
            return `[image ${item.mimeType}, ${Buffer.from(item.data, 'base64').length} bytes]`;
        case 'resource':
            return formatResourceContent(item.resource);
    }
}

/**
 * Content items in order, one per line; errors are prefixed so they stand out
 */
export function formatToolResult(result: ToolCallResult): string {
    const body = _.join(_.map(result.content, formatContentItem), '\n');
    return result.isError ? `Error: ${body}` : body;
}

export function toJson(value: unknown): string {
    return JSON.stringify(value, null, 2);
}
