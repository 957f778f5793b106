/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: CLI commands
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ValidationError, describeError } from '../core/errors.js';

/**
 * Read a JSON file supplied by the user and parse it.
 * The result is unvalidated; check it against a schema before use.
 *
 * @throws {ValidationError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ValidationError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    const content = readFileSync(absolutePath, 'utf-8');
    try {
        const data: unknown = JSON.parse(content);
        return data;
    } catch (err) {
        throw new ValidationError(`Failed to parse JSON file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: describeError(err),
        });
    }
}
