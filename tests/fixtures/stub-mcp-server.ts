/**
 * Stub MCP server for integration testing
 * Serves two tools, one prompt and one resource over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type {
    CallToolResult,
    GetPromptResult,
    ListPromptsResult,
    ListResourcesResult,
    ListToolsResult,
    ReadResourceResult
} from '@modelcontextprotocol/sdk/types.js';

const server = new Server(
    {
        name:    'stub-mcp-server',
        version: '1.0.0',
    },
    {
        capabilities: {
            tools:     {},
            prompts:   {},
            resources: {},
        },
    }
);

server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
    tools: [
        {
            name:        'test_echo',
            description: 'A simple test tool that echoes back input',
            inputSchema: {
                type:       'object',
                properties: {
                    message: {
                        type:        'string',
                        description: 'Message to echo back',
                    },
                },
                required: ['message'],
            },
        },
        {
            name:        'test_fail',
            description: 'Always reports a tool error',
            inputSchema: { type: 'object' },
        },
    ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name: toolName, arguments: args } = request.params;
    if(toolName === 'test_echo') {
        const message = args?.message;
        return {
            content: [{ type: 'text', text: `Echo: ${typeof message === 'string' ? message : ''}` }],
        };
    }
    if(toolName === 'test_fail') {
        return {
            content: [{ type: 'text', text: 'Something went wrong' }],
            isError: true,
        };
    }

    throw new Error(`Unknown tool: ${toolName}`);
});

server.setRequestHandler(ListPromptsRequestSchema, async (): Promise<ListPromptsResult> => ({
    prompts: [
        {
            name:        'greet',
            description: 'Greet someone by name',
            arguments:   [{ name: 'name', description: 'Who to greet', required: true }],
        },
    ],
}));

server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<GetPromptResult> => ({
    description: 'Greeting',
    messages:    [
        {
            role:    'user',
            content: { type: 'text', text: `Hello, ${request.params.arguments?.name ?? 'stranger'}!` },
        },
    ],
}));

server.setRequestHandler(ListResourcesRequestSchema, async (): Promise<ListResourcesResult> => ({
    resources: [
        { uri: 'stub://readme', name: 'readme', mimeType: 'text/plain' },
    ],
}));

server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => ({
    contents: [
        { uri: request.params.uri, mimeType: 'text/plain', text: 'stub readme' },
    ],
}));

const transport = new StdioServerTransport();
await server.connect(transport);

// stderr is collected by the client's log loop
console.error('stub server ready');
