/**
 * Error taxonomy shared by both backends.
 *
 * Recoverable local faults (a bad line on stdout, a late response) are absorbed
 * and logged by the RPC client; everything else reaches the caller as one of
 * these classes so consumers can branch on `instanceof`.
 */

export class ToolscopeError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Spawning the server process or wiring its pipes failed */
export class TransportError extends ToolscopeError {}

/** The server's output stream ended while calls were pending, or before a call was issued */
export class TransportClosedError extends ToolscopeError {
    constructor(message = 'Transport closed', options?: ErrorOptions) {
        super(message, options);
    }
}

/** A message from the server was well-formed JSON-RPC but not the shape the call expected */
export class ProtocolError extends ToolscopeError {}

/** The server answered a request with a JSON-RPC error object */
export class RpcError extends ToolscopeError {
    readonly code: number;
    readonly data?: unknown;

    constructor(code: number, message: string, data?: unknown) {
        super(`RPC error: ${message} (code: ${code})`);
        this.code = code;
        this.data = data;
    }
}

export class RequestTimeoutError extends ToolscopeError {
    readonly method: string;
    readonly timeoutMs: number;

    constructor(method: string, timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms: ${method}`);
        this.method = method;
        this.timeoutMs = timeoutMs;
    }
}

/** Manifest file missing, not JSON, or failing schema validation */
export class ManifestError extends ToolscopeError {}

export class SubstitutionError extends ToolscopeError {
    readonly variable: string;

    constructor(variable: string, field?: string) {
        const where = field ? ` in ${field}` : '';
        super(`Variable \${${variable}} not found${where}`);
        this.variable = variable;
    }
}

/** HTTP transport failure or process spawn failure while running a manifest tool */
export class ExecutionError extends ToolscopeError {}

export class ToolNotFoundError extends ToolscopeError {
    readonly tool: string;

    constructor(tool: string) {
        super(`Tool '${tool}' not found`);
        this.tool = tool;
    }
}

export class UnsupportedOperationError extends ToolscopeError {
    readonly operation: string;

    constructor(operation: string, backend: string) {
        super(`${backend} does not support ${operation}`);
        this.operation = operation;
    }
}
