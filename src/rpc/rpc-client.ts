/**
 * MCP client over a subprocess's stdio
 *
 * One process per client. Two loops run for the client's lifetime: one reads
 * stdout and delivers responses to the RequestCorrelator (or inbound messages
 * to `onmessage`), the other collects stderr lines for getLogs(). Both end
 * when the process's streams close; shutdown() kills the process and waits for
 * them briefly.
 */

import _ from 'lodash';
import {
    CallToolResultSchema,
    GetPromptResultSchema,
    InitializeResultSchema,
    ListPromptsResultSchema,
    ListResourcesResultSchema,
    ListToolsResultSchema,
    ReadResourceResultSchema,
    type CallToolResult,
    type PromptMessage as McpPromptMessage
} from '@modelcontextprotocol/sdk/types.js';
import { ProtocolError, RpcError, TransportClosedError } from '../errors.js';
import type {
    CapabilityClient,
    ContentItem,
    PromptDescriptor,
    PromptResult,
    ResourceContent,
    ResourceDescriptor,
    ResourceReadResult,
    ServerInfo,
    ToolArguments,
    ToolCallResult,
    ToolDescriptor
} from '../types/capability.js';
import { logger } from '../utils/logger.js';
import { cancellableDelay } from '../utils/timeout.js';
import { LineTransport, ProcessLineTransport, type SpawnOptions } from './line-transport.js';
import {
    CLIENT_INFO,
    PROTOCOL_VERSION,
    classifyLine,
    createNotification,
    createRequest,
    serializeMessage,
    type InboundMessage,
    type JsonRpcResponse
} from './protocol.js';
import { RequestCorrelator } from './request-correlator.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const SHUTDOWN_GRACE_MS = 2000;
const CAPABILITY_KEYS = ['tools', 'prompts', 'resources', 'logging'] as const;

export interface RpcClientOptions {
    /** Per-request deadline; defaults to 30 seconds */
    requestTimeoutMs?: number
}

export interface RpcSpawnOptions extends RpcClientOptions, SpawnOptions {}

interface ResultSchema<T> {
    parse(data: unknown): T
}

type McpContent = CallToolResult['content'][number] | McpPromptMessage['content'];

interface McpResourceContents {
    uri:       string
    mimeType?: string
    text?:     unknown
    blob?:     unknown
}

function toResourceContent(contents: McpResourceContents): ResourceContent {
    if(_.isString(contents.text)) {
        return { type: 'text', uri: contents.uri, mimeType: contents.mimeType, text: contents.text };
    }
    if(_.isString(contents.blob)) {
        return { type: 'blob', uri: contents.uri, mimeType: contents.mimeType, blob: contents.blob };
    }
    throw new ProtocolError(`Resource contents for ${contents.uri} carry neither text nor blob`);
}

function toContentItem(content: McpContent): ContentItem {
    switch(content.type) {
        case 'text':
            return { type: 'text', text: content.text };
        case 'image':
            return { type: 'image', data: content.data, mimeType: content.mimeType };
        case 'resource':
            return { type: 'resource', resource: toResourceContent(content.resource) };
        default:
            // Audio, resource links and future kinds are shown as their JSON
            return { type: 'text', text: JSON.stringify(content) };
    }
}

export class RpcClient implements CapabilityClient {
    readonly protocolType = 'MCP' as const;

    /** Receives notifications and server-initiated requests */
    onmessage?: (message: InboundMessage) => void;

    private readonly correlator: RequestCorrelator<JsonRpcResponse>;
    private readonly readLoops: Promise<void>;
    private serverInfo?: ServerInfo;
    private logs: string[] = [];
    private closed = false;

    constructor(private readonly transport: LineTransport, options: RpcClientOptions = {}) {
        this.correlator = new RequestCorrelator(options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
        this.readLoops = Promise.all([this.readOutput(), this.readErrors()]).then(_.noop);
    }

    /**
     * Spawn `command` and wrap it. Spawn failures reject with TransportError.
     */
    static async spawn(command: string, args: string[] = [], options: RpcSpawnOptions = {}): Promise<RpcClient> {
        const transport = await ProcessLineTransport.spawn(command, args, { env: options.env, cwd: options.cwd });
        return new RpcClient(transport, { requestTimeoutMs: options.requestTimeoutMs });
    }

    private async readOutput(): Promise<void> {
        try {
            for await (const line of this.transport.outputLines()) {
                this.handleLine(line);
            }
            logger.debug('Server stdout closed');
        } catch (error) {
            logger.error({ error: _.isError(error) ? error.message : String(error) }, 'Error reading from server');
        } finally {
            this.closed = true;
            const failed = this.correlator.rejectAll(new TransportClosedError('Transport closed: server output ended'));
            if(failed > 0) {
                logger.warn({ failed }, 'Server output ended with requests pending');
            }
        }
    }

    private async readErrors(): Promise<void> {
        try {
            for await (const line of this.transport.errorLines()) {
                if(_.trim(line) !== '') {
                    this.logs.push(line);
                }
            }
            logger.debug('Server stderr closed');
        } catch (error) {
            logger.error({ error: _.isError(error) ? error.message : String(error) }, 'Error reading stderr from server');
        }
    }

    private handleLine(rawLine: string): void {
        const line = _.trim(rawLine);
        if(line === '') {
            return;
        }

        logger.debug({ line }, 'Received');
        const classified = classifyLine(line);

        switch(classified.kind) {
            case 'response': {
                const { id } = classified.message;
                if(!_.isNumber(id) || !this.correlator.resolve(id, classified.message)) {
                    logger.debug({ id }, 'Discarding response with no pending request');
                }
                return;
            }
            case 'inbound':
                this.deliverInbound(classified.message);
                return;
            case 'invalid':
                logger.warn({ line, reason: classified.reason }, 'Failed to parse message');
                return;
        }
    }

    private deliverInbound(message: InboundMessage): void {
        if(!this.onmessage) {
            logger.debug({ method: message.method }, 'Unhandled inbound message');
            return;
        }
        try {
            this.onmessage(message);
        } catch (error) {
            logger.error({ method: message.method, error: _.isError(error) ? error.message : String(error) }, 'Inbound message handler failed');
        }
    }

    private async request<T>(method: string, params: unknown, schema: ResultSchema<T>): Promise<T> {
        if(this.closed) {
            throw new TransportClosedError(`Transport closed: cannot send ${method}`);
        }

        const { id, response } = this.correlator.issue(method);
        const line = serializeMessage(createRequest(id, method, params));
        logger.debug({ line }, 'Sending');

        const written = this.transport.writeLine(line).catch((error: unknown) => {
            this.correlator.reject(id, _.isError(error) ? error : new Error(String(error)));
        });

        // Awaited together so a rejection during the write is observed at once
        const [message] = await Promise.all([response, written]);
        if(message.error) {
            throw new RpcError(message.error.code, message.error.message, message.error.data);
        }
        if(!_.has(message, 'result')) {
            throw new ProtocolError(`Response to ${method} carries neither result nor error`);
        }

        try {
            return schema.parse(message.result);
        } catch (error) {
            throw new ProtocolError(`Failed to deserialize ${method} result: ${JSON.stringify(message.result)}`, { cause: error });
        }
    }

    private async notify(method: string, params?: unknown): Promise<void> {
        const line = serializeMessage(createNotification(method, params));
        logger.debug({ line }, 'Sending');
        await this.transport.writeLine(line);
    }

    async initialize(): Promise<ServerInfo> {
        const result = await this.request('initialize', {
            protocolVersion: PROTOCOL_VERSION,
            capabilities:    {},
            clientInfo:      CLIENT_INFO,
        }, InitializeResultSchema);

        this.serverInfo = {
            name:            result.serverInfo.name,
            version:         result.serverInfo.version,
            protocolType:    'MCP',
            protocolVersion: result.protocolVersion,
            capabilities:    _.filter(CAPABILITY_KEYS, key => result.capabilities[key] !== undefined),
        };

        await this.notify('notifications/initialized');
        logger.info({ server: this.serverInfo.name, version: this.serverInfo.version }, 'Connected to MCP server');

        return this.serverInfo;
    }

    async listTools(): Promise<ToolDescriptor[]> {
        const result = await this.request('tools/list', undefined, ListToolsResultSchema);
        return _.map(result.tools, tool => ({
            name:        tool.name,
            description: tool.description,
            inputSchema: { ...tool.inputSchema },
        }));
    }

    async callTool(name: string, args?: ToolArguments): Promise<ToolCallResult> {
        const result = await this.request('tools/call', { name, arguments: args }, CallToolResultSchema);
        return {
            content: _.map(result.content, toContentItem),
            isError: result.isError ?? false,
        };
    }

    async listPrompts(): Promise<PromptDescriptor[]> {
        const result = await this.request('prompts/list', undefined, ListPromptsResultSchema);
        return _.map(result.prompts, prompt => ({
            name:        prompt.name,
            description: prompt.description,
            arguments:   _.map(prompt.arguments ?? [], argument => ({
                name:        argument.name,
                description: argument.description,
                required:    argument.required ?? false,
            })),
        }));
    }

    async getPrompt(name: string, args?: Record<string, string>): Promise<PromptResult> {
        const result = await this.request('prompts/get', { name, arguments: args }, GetPromptResultSchema);
        return {
            description: result.description,
            messages:    _.map(result.messages, message => ({
                role:    message.role,
                content: [toContentItem(message.content)],
            })),
        };
    }

    async listResources(): Promise<ResourceDescriptor[]> {
        const result = await this.request('resources/list', undefined, ListResourcesResultSchema);
        return _.map(result.resources, resource => ({
            uri:         resource.uri,
            name:        resource.name,
            description: resource.description,
            mimeType:    resource.mimeType,
        }));
    }

    async readResource(uri: string): Promise<ResourceReadResult> {
        const result = await this.request('resources/read', { uri }, ReadResourceResultSchema);
        return { contents: _.map<McpResourceContents, ResourceContent>(result.contents, toResourceContent) };
    }

    getServerInfo(): ServerInfo | undefined {
        return this.serverInfo;
    }

    getLogs(): string[] {
        const drained = this.logs;
        this.logs = [];
        return drained;
    }

    /**
     * Kill the server. Calls still waiting fail with TransportClosedError.
     */
    async shutdown(): Promise<void> {
        logger.debug({ pending: this.correlator.pendingCount }, 'Shutting down MCP server');
        this.closed = true;
        this.correlator.rejectAll(new TransportClosedError('Transport closed: client shut down'));
        this.transport.close();

        const grace = cancellableDelay(SHUTDOWN_GRACE_MS);
        await Promise.race([this.readLoops, grace.promise]);
        grace.cancel();
    }
}
