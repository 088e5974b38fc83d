/**
 * toolscope library entry point
 */

export * from './errors.js';
export * from './types/capability.js';
export type { Manifest, ManifestTool, CallTemplate, AuthSpec } from './types/manifest.js';
export { ManifestSchema } from './types/manifest.js';

export { createClient, withClient, type ClientTarget, type ManifestTarget, type RpcTarget } from './client-factory.js';

export { RpcClient, DEFAULT_REQUEST_TIMEOUT_MS, type RpcClientOptions, type RpcSpawnOptions } from './rpc/rpc-client.js';
export { LineTransport, ProcessLineTransport, type LineStreams } from './rpc/line-transport.js';
export { RequestCorrelator } from './rpc/request-correlator.js';
export type { InboundMessage } from './rpc/protocol.js';

export { DeclarativeClient, type DeclarativeClientOptions } from './manifest/declarative-client.js';
export { loadManifest } from './manifest/manifest-loader.js';
export { VariableSubstitutor } from './manifest/variable-substitution.js';
export { ToolExecutor, DEFAULT_HTTP_TIMEOUT_MS } from './manifest/tool-executor.js';

export { logger, setLogLevel, attachLogSink } from './utils/logger.js';
export { LogBuffer, type LogEntry } from './utils/log-buffer.js';
