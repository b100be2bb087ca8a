export type LogFn = (message: string) => void;

let sink: LogFn = (message: string) => console.log(message);

export const setLogger = (logger: LogFn) => {
    sink = logger;
};

export const log: LogFn = (message: string) => sink(message);

/**
 * Runs `fn` and logs `[PERF] label: Nms` when it settles.
 */
export async function timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    try {
        return await fn();
    } finally {
        log(`[PERF] ${label}: ${Date.now() - started}ms`);
    }
}
