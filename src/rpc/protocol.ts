/**
 * JSON-RPC 2.0 framing for the newline-delimited stdio protocol
 *
 * Every outbound message is one line of JSON. Inbound lines are classified as
 * an inbound message (has a method: a notification or a server-initiated
 * request), a response (has an id), or invalid. A response carrying neither
 * result nor error still completes its call, which then fails.
 */

import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '2024-11-05';
export const CLIENT_INFO = {
    name:    'toolscope',
    version: '0.1.0',
} as const;

export type RequestId = number | string;

export interface JsonRpcRequest {
    jsonrpc: typeof JSONRPC_VERSION
    id:      number
    method:  string
    params?: unknown
}

export interface JsonRpcNotification {
    jsonrpc: typeof JSONRPC_VERSION
    method:  string
    params?: unknown
}

export const JsonRpcErrorObjectSchema = z.object({
    code:    z.number().int(),
    message: z.string(),
    data:    z.unknown().optional(),
});

const JsonRpcResponseSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id:      z.union([z.number(), z.string(), z.null()]),
    result:  z.unknown().optional(),
    error:   JsonRpcErrorObjectSchema.optional(),
});

const JsonRpcInboundSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id:      z.union([z.number(), z.string()]).optional(),
    method:  z.string(),
    params:  z.unknown().optional(),
});

export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

/** Notification, or a request the server sends to the client */
export type InboundMessage = z.infer<typeof JsonRpcInboundSchema>;

export type ClassifiedLine
    = | { kind: 'response', message: JsonRpcResponse }
      | { kind: 'inbound', message: InboundMessage }
      | { kind: 'invalid', reason: string };

export function createRequest(id: number, method: string, params?: unknown): JsonRpcRequest {
    return params === undefined
        ? { jsonrpc: JSONRPC_VERSION, id, method }
        : { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createNotification(method: string, params?: unknown): JsonRpcNotification {
    return params === undefined
        ? { jsonrpc: JSONRPC_VERSION, method }
        : { jsonrpc: JSONRPC_VERSION, method, params };
}

export function serializeMessage(message: JsonRpcRequest | JsonRpcNotification): string {
    return JSON.stringify(message);
}

/**
 * Classify one line read from the server's stdout. Never throws.
 */
export function classifyLine(line: string): ClassifiedLine {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch (error) {
        return { kind: 'invalid', reason: error instanceof Error ? error.message : String(error) };
    }

    const inbound = JsonRpcInboundSchema.safeParse(parsed);
    if(inbound.success) {
        return { kind: 'inbound', message: inbound.data };
    }

    const response = JsonRpcResponseSchema.safeParse(parsed);
    if(response.success) {
        return { kind: 'response', message: response.data };
    }

    return { kind: 'invalid', reason: 'Not a JSON-RPC 2.0 message' };
}
