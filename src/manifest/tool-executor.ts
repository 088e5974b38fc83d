/**
 * Tool Executor
 *
 * Runs a manual tool's call template:
 * - http: `${VAR}` substitution in the URL, `{arg}` path parameters from the
 *   call arguments, auth, header templates, optional JSON body; any 2xx is success
 * - cli: each command is substituted the same way, split on whitespace and run
 *   without a shell
 */

import { spawn } from 'node:child_process';
import _ from 'lodash';
import { ExecutionError } from '../errors.js';
import type { ToolArguments, ToolCallResult } from '../types/capability.js';
import type { AuthSpec, CliCallTemplate, HttpCallTemplate, ManifestTool } from '../types/manifest.js';
import { logger } from '../utils/logger.js';
import type { VariableSubstitutor } from './variable-substitution.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

export interface ToolExecutorOptions {
    /** Deadline for each HTTP request; defaults to 30 seconds */
    httpTimeoutMs?: number
}

export interface CommandOutput {
    stdout:   string
    stderr:   string
    exitCode: number | null
}

function stringifyArgument(value: unknown): string {
    return _.isString(value) ? value : JSON.stringify(value);
}

/**
 * Replace `{name}` with the matching call argument. Placeholders with no
 * matching argument are left in place.
 */
export function substituteArguments(template: string, args: ToolArguments = {}): string {
    let result = template;
    for(const [key, value] of _.toPairs(args)) {
        const placeholder = `{${key}}`;
        if(_.includes(result, placeholder)) {
            // A replacer function keeps `$&`, `$$` and friends in the value literal
            const text = stringifyArgument(value);
            result = result.replaceAll(placeholder, () => text);
        }
    }
    return result;
}

/**
 * Run one command without a shell and collect its output
 *
 * @throws ExecutionError when the process cannot be started
 */
export function runCommand(file: string, args: string[]): Promise<CommandOutput> {
    return new Promise((resolve, reject) => {
        const child = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let settled = false;

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.once('error', (error: Error) => {
            if(!settled) {
                settled = true;
                reject(new ExecutionError(`Failed to execute command: ${_.join([file, ...args], ' ')}: ${error.message}`, { cause: error }));
            }
        });

        child.once('close', (code: number | null) => {
            if(!settled) {
                settled = true;
                resolve({
                    stdout:   Buffer.concat(stdout).toString('utf-8'),
                    stderr:   Buffer.concat(stderr).toString('utf-8'),
                    exitCode: code,
                });
            }
        });
    });
}

export class ToolExecutor {
    private readonly httpTimeoutMs: number;

    constructor(private readonly substitutor: VariableSubstitutor, options: ToolExecutorOptions = {}) {
        this.httpTimeoutMs = options.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    }

    async execute(tool: ManifestTool, args?: ToolArguments): Promise<ToolCallResult> {
        const template = tool.tool_call_template;
        switch(template.call_template_type) {
            case 'http':
                return this.executeHttp(template, args);
            case 'cli':
                return this.executeCli(template, args);
        }
    }

    private applyAuth(auth: AuthSpec, url: URL, headers: Headers): void {
        switch(auth.auth_type) {
            case 'api_key': {
                const key = this.substitutor.substitute(auth.api_key, 'API key');
                if(auth.header_name !== undefined) {
                    headers.set(auth.header_name, key);
                } else if(auth.query_param_name !== undefined) {
                    url.searchParams.append(auth.query_param_name, key);
                } else {
                    headers.set('Authorization', `ApiKey ${key}`);
                }
                return;
            }
            case 'bearer': {
                const token = this.substitutor.substitute(auth.token, 'bearer token');
                headers.set('Authorization', `Bearer ${token}`);
                return;
            }
            case 'basic': {
                const username = this.substitutor.substitute(auth.username, 'username');
                const password = this.substitutor.substitute(auth.password, 'password');
                headers.set('Authorization', `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`);
                return;
            }
        }
    }

    /**
     * Auth first, then header templates, so a template can override auth headers
     *
     * @throws ExecutionError when a substituted header name or value is not a valid HTTP header
     */
    private buildHeaders(template: HttpCallTemplate, url: URL): Headers {
        const headers = new Headers();
        try {
            if(template.auth) {
                this.applyAuth(template.auth, url, headers);
            }
            for(const [name, value] of _.toPairs(this.substitutor.substituteRecord(template.headers, 'header'))) {
                headers.set(name, value);
            }
        } catch (error) {
            if(!(error instanceof TypeError)) {
                throw error;
            }
            throw new ExecutionError(`Invalid HTTP header: ${error.message}`, { cause: error });
        }
        return headers;
    }

    private async executeHttp(template: HttpCallTemplate, args?: ToolArguments): Promise<ToolCallResult> {
        const rawUrl = substituteArguments(this.substitutor.substitute(template.url, 'URL'), args);

        let url: URL;
        try {
            url = new URL(rawUrl);
        } catch (error) {
            throw new ExecutionError(`Invalid URL: ${rawUrl}`, { cause: error });
        }

        const headers = this.buildHeaders(template, url);

        let body: string | undefined;
        if(template.body_field !== undefined && args !== undefined && _.has(args, template.body_field)) {
            // fetch refuses a body on GET
            if(template.http_method === 'GET') {
                throw new ExecutionError(`Cannot send body field '${template.body_field}' with a GET request`);
            }
            body = JSON.stringify(args[template.body_field]);
            if(!headers.has('Content-Type')) {
                headers.set('Content-Type', 'application/json');
            }
        }

        logger.debug({ method: template.http_method, url: url.toString() }, 'Executing HTTP tool');

        let response: Response;
        try {
            response = await fetch(url.toString(), {
                method: template.http_method,
                headers,
                body,
                signal: AbortSignal.timeout(this.httpTimeoutMs),
            });
        } catch (error) {
            const reason = _.isError(error) && error.name === 'TimeoutError'
                ? `timed out after ${this.httpTimeoutMs}ms`
                : (_.isError(error) ? error.message : String(error));
            throw new ExecutionError(`HTTP request failed: ${reason}`, { cause: error });
        }

        let text: string;
        try {
            text = await response.text();
        } catch (error) {
            throw new ExecutionError('Failed to read response body', { cause: error });
        }

        return {
            content: [{ type: 'text', text }],
            isError: !response.ok,
        };
    }

    private async executeCli(template: CliCallTemplate, args?: ToolArguments): Promise<ToolCallResult> {
        const outputs: string[] = [];

        for(const commandTemplate of template.commands) {
            const command = substituteArguments(this.substitutor.substitute(commandTemplate, 'command'), args);
            const [file, ...commandArgs] = _.compact(_.split(command, /\s+/));
            if(file === undefined) {
                continue;
            }

            logger.debug({ command }, 'Executing CLI tool command');
            const output = await runCommand(file, commandArgs);

            if(!template.append_to_final_output) {
                const text = output.stderr !== ''
                    ? `${output.stdout}\nSTDERR:\n${output.stderr}`
                    : output.stdout;
                return {
                    content: [{ type: 'text', text }],
                    isError: output.exitCode !== 0,
                };
            }

            // Individual exit codes are not reported in accumulating mode
            outputs.push(output.stdout);
        }

        return {
            content: [{ type: 'text', text: _.join(outputs, '\n') }],
            isError: false,
        };
    }
}
