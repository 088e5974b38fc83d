/**
 * JSON document loading with zod validation
 *
 * Reads the file, parses JSON and validates against a schema, turning every
 * failure into the caller's error type with a consistent message.
 */

import { readFile } from 'node:fs/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { ZodError } from 'zod';
import _ from 'lodash';
import { logger } from './logger.js';

export interface LoadJsonDocumentOptions<T> {
    /** Path to the document */
    path:      string

    /** Output type may differ from input when the schema applies defaults */
    schema:    ZodType<T, ZodTypeDef, unknown>

    /** Human-readable name used in error messages, e.g. "UTCP manual" */
    label:     string

    /** Wraps the message in the caller's error class */
    makeError: (message: string, cause: unknown) => Error
}

/**
 * Format zod issues as `path: message` pairs
 */
export function formatZodIssues(error: ZodError): string {
    return _.join(_.map(error.issues, issue => `${issue.path.length > 0 ? _.join(issue.path, '.') : '(root)'}: ${issue.message}`), ', ');
}

/**
 * Load and validate a JSON document
 *
 * @throws the error built by `makeError` if the file is unreadable, not JSON, or invalid
 */
export async function loadJsonDocument<T>(options: LoadJsonDocumentOptions<T>): Promise<T> {
    const { path, schema, label, makeError } = options;

    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        throw makeError(`Failed to read ${label} file: ${path}`, error);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw makeError(`Failed to parse ${label} JSON: ${_.isError(error) ? error.message : String(error)}`, error);
    }

    try {
        return schema.parse(raw);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ path, issues: error.issues }, `Invalid ${label}`);
            throw makeError(`Invalid ${label}: ${formatZodIssues(error)}`, error);
        }
        throw error;
    }
}
