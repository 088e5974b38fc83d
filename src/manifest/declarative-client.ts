/**
 * UTCP client: tools from a static manual, executed over HTTP or as local commands
 *
 * Holds no process and no background work; each call stands alone. Prompts and
 * resources are not part of a manual, so the list calls return nothing and
 * getPrompt/readResource always reject.
 */

import _ from 'lodash';
import { ToolNotFoundError, UnsupportedOperationError } from '../errors.js';
import type {
    CapabilityClient,
    PromptDescriptor,
    PromptResult,
    ResourceDescriptor,
    ResourceReadResult,
    ServerInfo,
    ToolArguments,
    ToolCallResult,
    ToolDescriptor
} from '../types/capability.js';
import type { JsonSchemaDocument, Manifest } from '../types/manifest.js';
import { logger } from '../utils/logger.js';
import { loadManifest } from './manifest-loader.js';
import { ToolExecutor, type ToolExecutorOptions } from './tool-executor.js';
import { VariableSubstitutor, type Environment } from './variable-substitution.js';

const BACKEND_NAME = 'UTCP';

/**
 * Object form of a tool's input schema. `true` (accept anything) becomes `{}`
 * and `false` becomes `{ not: {} }`; values that are not schemas at all give `{}`.
 */
function toInputSchema(inputs: JsonSchemaDocument): Record<string, unknown> {
    if(_.isObject(inputs) && !_.isArray(inputs)) {
        return { ...inputs };
    }
    return inputs === false ? { not: {} } : {};
}

export interface DeclarativeClientOptions extends ToolExecutorOptions {
    /** Fallback for variables the manual does not define; defaults to process.env */
    env?: Environment
}

export class DeclarativeClient implements CapabilityClient {
    readonly protocolType = 'UTCP' as const;

    private readonly executor: ToolExecutor;
    private readonly serverInfo: ServerInfo;
    private logs: string[] = [];

    constructor(private readonly manifest: Manifest, options: DeclarativeClientOptions = {}) {
        const substitutor = new VariableSubstitutor(manifest.variables, options.env);
        this.executor = new ToolExecutor(substitutor, options);
        this.serverInfo = {
            name:         manifest.info.title,
            version:      manifest.info.version,
            protocolType: 'UTCP',
            capabilities: [
                `${manifest.tools.length} tools`,
                'HTTP execution',
                'CLI execution',
            ],
        };
    }

    /**
     * Load a manual from disk. Any read, JSON or schema problem rejects with ManifestError.
     */
    static async load(path: string, options: DeclarativeClientOptions = {}): Promise<DeclarativeClient> {
        const manifest = await loadManifest(path);
        return new DeclarativeClient(manifest, options);
    }

    private log(message: string): void {
        this.logs.push(message);
    }

    async initialize(): Promise<ServerInfo> {
        this.log('UTCP client initialized');
        logger.info({ manual: this.serverInfo.name, tools: this.manifest.tools.length }, 'Loaded UTCP manual');
        return this.serverInfo;
    }

    async listTools(): Promise<ToolDescriptor[]> {
        return _.map(this.manifest.tools, tool => ({
            name:        tool.name,
            description: tool.description,
            inputSchema: toInputSchema(tool.inputs),
        }));
    }

    async callTool(name: string, args?: ToolArguments): Promise<ToolCallResult> {
        const tool = _.find(this.manifest.tools, { name });
        if(!tool) {
            throw new ToolNotFoundError(name);
        }

        this.log(`Calling tool: ${name} with args: ${JSON.stringify(args ?? null)}`);
        const result = await this.executor.execute(tool, args);
        this.log(`Tool '${name}' execution completed`);

        return result;
    }

    async listPrompts(): Promise<PromptDescriptor[]> {
        return [];
    }

    async getPrompt(_name: string, _args?: Record<string, string>): Promise<PromptResult> {
        throw new UnsupportedOperationError('prompts', BACKEND_NAME);
    }

    async listResources(): Promise<ResourceDescriptor[]> {
        return [];
    }

    async readResource(_uri: string): Promise<ResourceReadResult> {
        throw new UnsupportedOperationError('resources', BACKEND_NAME);
    }

    getServerInfo(): ServerInfo | undefined {
        return this.serverInfo;
    }

    getLogs(): string[] {
        const drained = this.logs;
        this.logs = [];
        return drained;
    }

    async shutdown(): Promise<void> {
        this.log('UTCP client shutdown');
    }
}
