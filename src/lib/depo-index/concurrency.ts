/**
 * Limits the number of async operations in flight.
 *
 * @returns A function that runs a thunk once a slot is free
 */
export function pLimit(concurrency: number) {
    if (!(Number.isInteger(concurrency) && concurrency > 0)) {
        throw new TypeError("Expected `concurrency` to be a positive integer");
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

    return async <T>(fn: () => Promise<T>): Promise<T> => {
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
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results are
 * stored by input index, so completion order never shows in the output.
 */
export async function mapWithConcurrency<T, R>(
    items: T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const run = pLimit(limit);
    const results = new Array<R>(items.length);

    await Promise.all(
        items.map((item, index) =>
            run(async () => {
                results[index] = await fn(item, index);
            })
        )
    );
    return results;
}
