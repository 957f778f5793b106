/**
 * Tests for input validation and JSON file helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { validateInput } from '../../src/utils/validation.js';
import { readJsonFile } from '../../src/utils/fs.js';
import { ValidationError } from '../../src/core/errors.js';

describe('validateInput', () => {
    const schema = z.object({ userId: z.number().int() });

    it('returns parsed data', () => {
        expect(validateInput(schema, { userId: 7 }, 'Request')).toEqual({ userId: 7 });
    });

    it('throws ValidationError listing the issues', () => {
        expect(() => validateInput(schema, { userId: 'x' }, 'Request')).toThrow(
            new ValidationError('Invalid Request:\n  - userId: Expected number, received string'),
        );
    });

    it('labels root-level issues', () => {
        expect(() => validateInput(schema, null, 'Request')).toThrow(
            'Invalid Request:\n  - (root): Expected object, received null',
        );
    });
});

describe('readJsonFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'mission-coach-test-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('parses a JSON file', () => {
        const file = join(dir, 'payload.json');
        writeFileSync(file, '{"preferences": {"a": "1"}}');
        expect(readJsonFile(file)).toEqual({ preferences: { a: '1' } });
    });

    it('throws ValidationError for a missing file', () => {
        expect(() => readJsonFile(join(dir, 'missing.json'))).toThrow(ValidationError);
    });

    it('throws ValidationError for invalid JSON', () => {
        const file = join(dir, 'broken.json');
        writeFileSync(file, '{ nope');
        expect(() => readJsonFile(file)).toThrow(/Failed to parse JSON file/);
    });
});
