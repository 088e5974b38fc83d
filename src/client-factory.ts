/**
 * Backend selection
 *
 * A target names either an MCP server command or a UTCP manual path; the
 * factory picks the matching client. withClient() scopes a client so the
 * server process is shut down on every exit path.
 */

import { DeclarativeClient } from './manifest/declarative-client.js';
import { RpcClient } from './rpc/rpc-client.js';
import type { CapabilityClient, ServerInfo } from './types/capability.js';
import { logger } from './utils/logger.js';

export interface RpcTarget {
    kind:              'rpc'
    command:           string
    args?:             string[]
    env?:              Record<string, string>
    cwd?:              string
    requestTimeoutMs?: number
}

export interface ManifestTarget {
    kind: 'manifest'
    path: string
}

export type ClientTarget = RpcTarget | ManifestTarget;

export async function createClient(target: ClientTarget): Promise<CapabilityClient> {
    switch(target.kind) {
        case 'rpc':
            return RpcClient.spawn(target.command, target.args, {
                env:              target.env,
                cwd:              target.cwd,
                requestTimeoutMs: target.requestTimeoutMs,
            });
        case 'manifest':
            return DeclarativeClient.load(target.path);
    }
}

/**
 * Create and initialize a client, run `fn`, and shut the client down whether
 * `fn` returns or throws. A failed initialize also shuts the client down.
 */
export async function withClient<T>(
    target: ClientTarget,
    fn: (client: CapabilityClient, serverInfo: ServerInfo) => Promise<T>,
    factory: (target: ClientTarget) => Promise<CapabilityClient> = createClient
): Promise<T> {
    const client = await factory(target);
    try {
        const serverInfo = await client.initialize();
        return await fn(client, serverInfo);
    } finally {
        try {
            await client.shutdown();
        } catch (error) {
            logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Client shutdown failed');
        }
    }
}
