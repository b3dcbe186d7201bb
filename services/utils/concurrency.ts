// Bounded fan-out for provider calls: at most `concurrency` tasks in flight.
export const pLimit = (concurrency: number) => {
    let active = 0;
    const queue: (() => void)[] = [];

    const next = () => {
        active--;
        const task = queue.shift();
        if (task) task();
    };

    return <T>(fn: () => Promise<T>): Promise<T> =>
        new Promise<T>((resolve, reject) => {
            const run = () => {
                active++;
                void fn().then(resolve, reject).finally(next);
            };
            if (active < concurrency) run();
            else queue.push(run);
        });
};
