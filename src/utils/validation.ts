/**
 * Zod-backed validation of caller-supplied data.
 *
 * Dependency direction: validation.ts → zod, core/errors
 * Used by: coaching service, CLI commands
 */

import type { z } from 'zod';
import { ValidationError } from '../core/errors.js';

/** Render zod issues as indented `path: message` lines. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
    return issues
        .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('\n');
}

/**
 * Validate a value against a schema.
 *
 * @param label - Name of the expected shape, used in the error message
 * @throws {ValidationError} listing every failing field
 */
export function validateInput<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    value: unknown,
    label: string,
): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(
            `Invalid ${label}:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }
    return result.data;
}
