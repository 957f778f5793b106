/**
 * Spinner wrapper for a single agent request.
 *
 * Dependency direction: spinner.ts → ora
 * Used by: ask, examples and chat commands
 */

import ora from 'ora';

/** Run `task` behind a spinner; the spinner is stopped on success and failed on error. */
export async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
    const spinner = ora(text).start();
    try {
        const result = await task();
        spinner.stop();
        return result;
    } catch (err) {
        spinner.fail('Request failed');
        throw err;
    }
}
