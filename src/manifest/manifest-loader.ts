/**
 * Manifest Loader
 */

import { ManifestError } from '../errors.js';
import { ManifestSchema, type Manifest } from '../types/manifest.js';
import { loadJsonDocument } from '../utils/config-loader.js';
import { logger } from '../utils/logger.js';

/**
 * Read and validate a UTCP manual
 *
 * @throws ManifestError if the file is unreadable, not JSON, or fails validation
 */
export async function loadManifest(path: string): Promise<Manifest> {
    const manifest = await loadJsonDocument({
        path,
        schema:    ManifestSchema,
        label:     'UTCP manual',
        makeError: (message, cause) => new ManifestError(message, { cause }),
    });

    logger.debug({ path, title: manifest.info.title, tools: manifest.tools.length }, 'Loaded manifest');
    return manifest;
}
