/**
 * Capability interface shared by the MCP (subprocess) and UTCP (manifest) backends
 */

export type ProtocolType = 'MCP' | 'UTCP';

export interface ServerInfo {
    name:             string
    version:          string
    protocolType:     ProtocolType
    protocolVersion?: string
    capabilities:     string[]
}

export interface ToolDescriptor {
    name:         string
    description?: string
    inputSchema:  Record<string, unknown>
}

export interface PromptArgumentDescriptor {
    name:         string
    description?: string
    required:     boolean
}

export interface PromptDescriptor {
    name:         string
    description?: string
    arguments:    PromptArgumentDescriptor[]
}

export interface ResourceDescriptor {
    uri:          string
    name:         string
    description?: string
    mimeType?:    string
}

export type ResourceContent
    = | { type: 'text', uri: string, mimeType?: string, text: string }
      | { type: 'blob', uri: string, mimeType?: string, blob: string };

export type ContentItem
    = | { type: 'text', text: string }
      | { type: 'image', data: string, mimeType: string }
      | { type: 'resource', resource: ResourceContent };

export interface ToolCallResult {
    /** In the order the backend produced them */
    content: ContentItem[]
    isError: boolean
}

export interface PromptMessage {
    role:    string
    content: ContentItem[]
}

export interface PromptResult {
    description?: string
    messages:     PromptMessage[]
}

export interface ResourceReadResult {
    contents: ResourceContent[]
}

export type ToolArguments = Record<string, unknown>;

/**
 * The whole surface a consumer may call. `initialize` must be awaited once
 * before anything else; `shutdown` must be called on every exit path.
 */
export interface CapabilityClient {
    readonly protocolType: ProtocolType

    initialize(): Promise<ServerInfo>
    listTools(): Promise<ToolDescriptor[]>
    listPrompts(): Promise<PromptDescriptor[]>
    listResources(): Promise<ResourceDescriptor[]>
    callTool(name: string, args?: ToolArguments): Promise<ToolCallResult>
    getPrompt(name: string, args?: Record<string, string>): Promise<PromptResult>
    readResource(uri: string): Promise<ResourceReadResult>
    getServerInfo(): ServerInfo | undefined

    /** Returns only the lines accumulated since the previous call */
    getLogs(): string[]
    shutdown(): Promise<void>
}
