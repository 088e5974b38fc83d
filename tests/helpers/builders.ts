/**
 * Test data builders for UTCP manuals
 */

import _ from 'lodash';
import { ManifestSchema, type Manifest } from '../../src/types/manifest.js';

export interface RawTool {
    name:               string
    description?:       string
    inputs?:            unknown
    outputs?:           unknown
    tags?:              string[]
    tool_call_template: Record<string, unknown>
}

export interface RawManifestOptions {
    title?:     string
    version?:   string
    variables?: Record<string, string>
}

/**
 * A manual as it would appear on disk, before defaults are applied
 */
export function rawManifest(tools: RawTool[], options: RawManifestOptions = {}): Record<string, unknown> {
    return {
        manual_version: '1.0.0',
        utcp_version:   '1.0.0',
        info:           {
            title:   options.title ?? 'Test Manual',
            version: options.version ?? '1.0.0',
        },
        variables: options.variables ?? {},
        tools:     _.map(tools, tool => ({
            inputs:  { type: 'object', properties: {} },
            outputs: { type: 'object' },
            ...tool,
        })),
    };
}

/**
 * A validated manual with defaults applied
 */
export function buildManifest(tools: RawTool[], options: RawManifestOptions = {}): Manifest {
    return ManifestSchema.parse(rawManifest(tools, options));
}

export const tools = {
    http(name: string, template: Record<string, unknown> = {}): RawTool {
        return {
            name,
            description:        `HTTP tool ${name}`,
            tool_call_template: {
                call_template_type: 'http',
                url:                'https://api.example.test/items',
                http_method:        'GET',
                ...template,
            },
        };
    },

    cli(name: string, commands: string[], appendToFinalOutput?: boolean): RawTool {
        return {
            name,
            description:        `CLI tool ${name}`,
            tool_call_template: {
                call_template_type: 'cli',
                commands,
                ...(appendToFinalOutput === undefined ? {} : { append_to_final_output: appendToFinalOutput }),
            },
        };
    },
};
