/**
 * Response parser: reads the structured payload out of an agent's reply.
 *
 * Agents are asked to answer with a fenced block:
 *   ```json
 *   { ... }
 *   ```
 * When no such block is present the whole reply is parsed as JSON.
 *
 * Dependency direction: response-parser.ts → zod, core/errors
 * Used by: coaching service
 */

import type { z } from 'zod';
import { ContractError, describeError } from '../core/errors.js';
import { formatIssues } from '../utils/validation.js';

const FENCE_OPEN = '```json';
const FENCE_CLOSE = '```';

/** Longest raw reply quoted back in an error. */
const EXCERPT_LENGTH = 500;

/**
 * The JSON text of a reply: the content between the opening ```json fence
 * and the last closing fence, or the trimmed reply when there is no fence.
 */
export function extractJsonText(reply: string): string {
    const start = reply.indexOf(FENCE_OPEN);
    const end = reply.lastIndexOf(FENCE_CLOSE);
    if (start !== -1 && end !== -1 && start < end) {
        return reply.slice(start + FENCE_OPEN.length, end).trim();
    }
    return reply.trim();
}

function excerpt(text: string): string {
    return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}…` : text;
}

/**
 * Parse and validate a reply.
 *
 * @param label - Name of the expected response shape
 * @throws {ContractError} when the reply is not JSON or does not match the schema
 */
export function parseAgentResponse<T>(
    reply: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
): T {
    const jsonText = extractJsonText(reply);

    let data: unknown;
    try {
        data = JSON.parse(jsonText);
    } catch (error) {
        throw new ContractError(
            `Failed to parse the agent response as JSON: ${describeError(error)}`,
            { label, raw: excerpt(reply) },
        );
    }

    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ContractError(
            `Agent response did not match ${label}:\n${formatIssues(result.error.issues)}`,
            { label, issues: result.error.issues },
        );
    }
    return result.data;
}
