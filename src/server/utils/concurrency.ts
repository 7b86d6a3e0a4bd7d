/**
 * Concurrency limiter returned by {@link pLimit}
 */
export type LimitFunction = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 * Similar to p-limit but lightweight and built-in.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk (function returning a promise) and executes it with concurrency limit
 */
export function pLimit(concurrency: number): LimitFunction {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    const run = async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };

    return run;
}

/**
 * Run `fn` over every item with at most `limit` in flight and settle them all.
 * Results keep the order of `items`, regardless of completion order.
 */
export async function settleWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    const limitFn = pLimit(limit);
    return Promise.allSettled(items.map((item, index) => limitFn(() => fn(item, index))));
}
