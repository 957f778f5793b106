/**
 * Promise-chained mutex.
 *
 * Tasks passed to `runExclusive` run one at a time in submission order,
 * whether they are synchronous or async. A rejected task releases the
 * lock for the next one.
 *
 * Dependency direction: mutex.ts → nothing (leaf module)
 * Used by: personalization store
 */

export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    /** Run `task` once every previously submitted task has settled. */
    runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
        const run = this.tail.then(() => task());
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}
