/**
 * Runs CPU-bound tasks on a bounded number of cooperative workers, yielding to
 * the event loop before each task. Results keep task order whatever the worker
 * count. An aborted signal stops the whole run before the next task starts.
 */
export async function runPool<T>(
    tasks: readonly (() => T)[],
    workers: number,
    signal?: AbortSignal
): Promise<T[]> {
    const results: T[] = new Array<T>(tasks.length);
    let next = 0;

    const worker = async () => {
        while (next < tasks.length) {
            const i = next++;
            // Yield to event loop to prevent blocking
            await new Promise(resolve => setImmediate(resolve));
            signal?.throwIfAborted();
            results[i] = tasks[i]();
        }
    };

    signal?.throwIfAborted();
    const size = Math.max(1, Math.min(workers, tasks.length));
    await Promise.all(Array.from({ length: size }, () => worker()));
    return results;
}
