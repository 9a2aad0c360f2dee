/**
 * WorkerPool: Bounded Fan-Out for the JSON Walker
 *
 * A counting semaphore with an unbounded FIFO wait queue. The walker
 * submits one task per string field; at most `maxWorkers` run at a
 * time, and results come back in submission order no matter which task
 * finishes first.
 *
 *   ┌──────────────────────────────────────────────┐
 *   │  mapInOrder(items, fn)                       │
 *   │                                              │
 *   │  ┌───────────┐  slot free?  ┌─────────────┐  │
 *   │  │ acquire() ├────YES──────►│  run task   │  │
 *   │  │           │              └─────────────┘  │
 *   │  │           │   NO         ┌─────────────┐  │
 *   │  │           ├─────────────►│  wait FIFO  │  │
 *   │  └───────────┘              └─────────────┘  │
 *   └──────────────────────────────────────────────┘
 *
 * A task must not wait on other pool tasks while it holds a slot, or
 * the pool deadlocks once every slot is held by a waiting parent.
 *
 * @module
 * @internal
 */

export interface WorkerPoolOptions {
    /** @minimum 1 */
    readonly maxWorkers: number;
}

type Release = () => void;

export class WorkerPool {
    private readonly _maxWorkers: number;
    private _active = 0;
    private readonly _pending: Array<() => void> = [];

    constructor(options: WorkerPoolOptions) {
        this._maxWorkers = Math.max(1, Math.floor(options.maxWorkers));
    }

    // ── Public API ───────────────────────────────────────

    get maxWorkers(): number {
        return this._maxWorkers;
    }

    /** Tasks currently holding a slot. */
    get active(): number {
        return this._active;
    }

    /** Tasks waiting for a slot. */
    get queued(): number {
        return this._pending.length;
    }

    /**
     * Run `task` once a slot is free. The slot is released whether the
     * task resolves or throws.
     */
    async run<T>(task: () => T | Promise<T>): Promise<T> {
        const release = await this._acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }

    /**
     * Apply `fn` to every item through the pool. The result array is
     * index-aligned with `items`. The first rejection rejects the whole
     * call after every task has settled.
     */
    async mapInOrder<T, R>(
        items: readonly T[],
        fn: (item: T, index: number) => R | Promise<R>,
    ): Promise<R[]> {
        const settled = await Promise.allSettled(
            items.map((item, index) => this.run(() => fn(item, index))),
        );
        const results: R[] = [];
        for (const outcome of settled) {
            if (outcome.status === 'rejected') throw outcome.reason;
            results.push(outcome.value);
        }
        return results;
    }

    // ── Private ──────────────────────────────────────────

    private _acquire(): Promise<Release> {
        if (this._active < this._maxWorkers) {
            this._active++;
            return Promise.resolve(this._createRelease());
        }
        return new Promise<Release>(resolve => {
            this._pending.push(() => resolve(this._createRelease()));
        });
    }

    private _createRelease(): Release {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this._active--;
            this._drainNext();
        };
    }

    private _drainNext(): void {
        if (this._active >= this._maxWorkers) return;
        const next = this._pending.shift();
        if (next === undefined) return;
        this._active++;
        next();
    }
}
