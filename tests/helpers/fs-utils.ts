/**
 * File system test helpers
 * Temporary files and directories, removed by cleanup()
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import _ from 'lodash';

const cleanupRegistry: string[] = [];

/**
 * Create a temporary directory with a unique name
 *
 * @example
 * ```typescript
 * beforeEach(async () => {
 *   testDir = await createTempDir('manifest');
 * });
 *
 * afterEach(async () => {
 *   await cleanup();
 * });
 * ```
 */
export async function createTempDir(prefix = 'toolscope-test'): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
    cleanupRegistry.push(dir);
    return dir;
}

/**
 * Write `content` (objects are JSON-encoded) to a new file in a fresh temp directory
 */
export async function createTempFile(content: string | object, filename = 'manual.json'): Promise<string> {
    const dir = await createTempDir();
    const path = join(dir, filename);
    await writeFile(path, _.isString(content) ? content : JSON.stringify(content, null, 2), 'utf-8');
    return path;
}

export async function cleanup(): Promise<void> {
    const paths = cleanupRegistry.splice(0);
    await Promise.all(_.map(paths, path => rm(path, { recursive: true, force: true })));
}
