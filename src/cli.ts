#!/usr/bin/env node
/**
 * toolscope CLI Entry Point
 *
 * Every command talks to one backend: a UTCP manual given with --manifest, or
 * an MCP server whose command line follows `--`:
 *
 *   toolscope tools --manifest ./manual.json
 *   toolscope call echo --args '{"message":"hi"}' -- node ./server.js
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import { z } from 'zod';
import { withClient, type ClientTarget } from './client-factory.js';
import type { CapabilityClient, ServerInfo } from './types/capability.js';
import { setLogLevel } from './utils/logger.js';
import {
    formatServerInfo,
    formatToolList,
    formatToolResult,
    parsePromptArguments,
    parseToolArguments,
    toJson
} from './utils/output-format.js';

const PackageJsonSchema = z.object({
    version:     z.string(),
    description: z.string().default(''),
});

// A type alias so it satisfies commander's OptionValues index signature
type GlobalOptions = {
    manifest?: string
    timeout?:  string
    debug?:    boolean
};

const packageDir = join(dirname(fileURLToPath(import.meta.url)), '..');
const packageJson = PackageJsonSchema.parse(JSON.parse(await readFile(join(packageDir, 'package.json'), 'utf-8')));

function resolveTarget(options: GlobalOptions, server: string[]): ClientTarget {
    const [command, ...args] = server;

    if(options.manifest !== undefined && command !== undefined) {
        throw new Error('Pass either --manifest or a server command, not both');
    }
    if(options.manifest !== undefined) {
        return { kind: 'manifest', path: options.manifest };
    }
    if(command === undefined) {
        throw new Error('Missing backend: pass --manifest <path> or a server command after --');
    }

    let requestTimeoutMs: number | undefined;
    if(options.timeout !== undefined) {
        requestTimeoutMs = _.toNumber(options.timeout);
        if(!_.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
            throw new Error(`Invalid --timeout: ${options.timeout}`);
        }
    }

    return { kind: 'rpc', command, args, requestTimeoutMs };
}

/**
 * Run `fn` against the backend chosen by the global options, printing the
 * backend's collected log lines to stderr when --debug is set
 */
async function run(command: Command, server: string[], fn: (client: CapabilityClient, info: ServerInfo) => Promise<string>): Promise<void> {
    const options = command.optsWithGlobals<GlobalOptions>();
    if(options.debug) {
        setLogLevel('debug');
    }

    const output = await withClient(resolveTarget(options, server), async (client, info) => {
        try {
            return await fn(client, info);
        } finally {
            if(options.debug) {
                for(const line of client.getLogs()) {
                    // eslint-disable-next-line no-console -- backend logs go to stderr
                    console.error(line);
                }
            }
        }
    });

    // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
    console.log(output);
}

const program = new Command();

program
    .name('toolscope')
    .description(packageJson.description)
    .version(packageJson.version)
    .option('-m, --manifest <path>', 'UTCP manual to load instead of an MCP server')
    .option('-t, --timeout <ms>', 'per-request timeout for MCP servers in milliseconds')
    .option('-d, --debug', 'enable debug logging and print backend logs');

program
    .command('info')
    .description('Show server or manual information')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .action(async (server: string[], _options: unknown, command: Command) => {
        await run(command, server, async (_client, info) => formatServerInfo(info));
    });

program
    .command('tools')
    .description('List available tools')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .option('--json', 'print full descriptors including input schemas')
    .action(async (server: string[], options: { json?: boolean }, command: Command) => {
        await run(command, server, async (client) => {
            const tools = await client.listTools();
            return options.json ? toJson(tools) : formatToolList(tools);
        });
    });

program
    .command('prompts')
    .description('List available prompts')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .action(async (server: string[], _options: unknown, command: Command) => {
        await run(command, server, async client => toJson(await client.listPrompts()));
    });

program
    .command('resources')
    .description('List available resources')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .action(async (server: string[], _options: unknown, command: Command) => {
        await run(command, server, async client => toJson(await client.listResources()));
    });

program
    .command('call')
    .description('Call a tool')
    .argument('<tool>', 'Name of the tool to call')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .option('-a, --args <json>', 'tool arguments as a JSON object')
    .action(async (tool: string, server: string[], options: { args?: string }, command: Command) => {
        const args = parseToolArguments(options.args);
        await run(command, server, async (client) => {
            const result = await client.callTool(tool, args);
            if(result.isError) {
                process.exitCode = 1;
            }
            return formatToolResult(result);
        });
    });

program
    .command('prompt')
    .description('Get a prompt')
    .argument('<name>', 'Name of the prompt')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .option('-a, --args <json>', 'prompt arguments as a JSON object of strings')
    .action(async (name: string, server: string[], options: { args?: string }, command: Command) => {
        const args = parsePromptArguments(options.args);
        await run(command, server, async client => toJson(await client.getPrompt(name, args)));
    });

program
    .command('read')
    .description('Read a resource')
    .argument('<uri>', 'Resource URI')
    .argument('[server...]', 'MCP server command and arguments (after --)')
    .action(async (uri: string, server: string[], _options: unknown, command: Command) => {
        await run(command, server, async client => toJson(await client.readResource(uri)));
    });

try {
    await program.parseAsync();
} catch (error) {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(`Error: ${_.isError(error) ? error.message : String(error)}`);
    process.exitCode = 1;
}
