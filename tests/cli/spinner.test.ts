/**
 * Tests for the request spinner wrapper.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const spinner = vi.hoisted(() => ({
    start: vi.fn(),
    stop: vi.fn(),
    fail: vi.fn(),
}));

vi.mock('ora', () => ({
    default: vi.fn(() => spinner),
}));

import { withSpinner } from '../../src/cli/utils/spinner.js';
import { ProviderError } from '../../src/core/errors.js';

beforeEach(() => {
    vi.clearAllMocks();
    spinner.start.mockReturnValue(spinner);
});

describe('withSpinner', () => {
    it('stops the spinner and returns the result', async () => {
        const result = await withSpinner('Thinking...', async () => 'done');

        expect(result).toBe('done');
        expect(spinner.start).toHaveBeenCalledTimes(1);
        expect(spinner.stop).toHaveBeenCalledTimes(1);
        expect(spinner.fail).not.toHaveBeenCalled();
    });

    it('fails the spinner and rethrows when the request rejects', async () => {
        const failure = new ProviderError('Missing API key for provider "upstage"');

        await expect(withSpinner('Thinking...', () => Promise.reject(failure))).rejects.toBe(failure);
        expect(spinner.fail).toHaveBeenCalledWith('Request failed');
        expect(spinner.stop).not.toHaveBeenCalled();
    });
});
