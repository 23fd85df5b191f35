import { StrategyTimeoutError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Single-writer-per-key lock.
 *
 * Each key owns a promise chain; tasks for the same key run one after
 * another, tasks for different keys run concurrently. There is no global lock.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    /**
     * Run `task` once every earlier task for `key` has settled.
     */
    async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /**
     * Run `task` while holding every key. Keys are taken in sorted order so
     * two multi-key writers can never wait on each other.
     */
    async runMany<T>(keys: Iterable<string>, task: () => Promise<T> | T): Promise<T> {
        const sorted = [...new Set(keys)].sort();

        const acquire = async (index: number): Promise<T> => {
            const key = sorted[index];
            if (key === undefined) return task();
            return this.run(key, () => acquire(index + 1));
        };

        return acquire(0);
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}

/**
 * Run `task` with a deadline. The task receives a signal that aborts when the
 * deadline passes or `parent` aborts; the returned promise rejects with
 * `StrategyTimeoutError` (or the parent's reason) without waiting for the task.
 * A result that arrives afterwards is discarded.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController();

    const aborted = new Promise<never>((_, reject) => {
        controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    const onParentAbort = (): void => controller.abort(parent?.reason);
    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer = setTimeout(
        () => controller.abort(new StrategyTimeoutError(label, timeoutMs)),
        Math.max(0, timeoutMs)
    );

    const pending = controller.signal.aborted
        ? Promise.reject(controller.signal.reason)
        : Promise.resolve().then(() => task(controller.signal));

    try {
        return await Promise.race([pending, aborted]);
    } finally {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
        if (controller.signal.aborted) {
            pending.catch((error: unknown) => {
                logger.debug({ label, error: errorMessage(error) }, 'Discarded result after deadline');
            });
        }
    }
}

/**
 * Milliseconds left before `deadline` (epoch ms), never negative.
 */
export function remaining(deadline: number): number {
    return Math.max(0, deadline - Date.now());
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
