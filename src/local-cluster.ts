import {
    type Cluster,
    type Future,
    settleFutures,
    unwrapOutcomes,
} from './cluster';
import {
    type DeferredValue,
    type GraphScope,
    workUnitKey,
} from './deferred';
import { FutureCancelledError } from './errors';
import type {
    FutureStatus,
    TaskOutcome,
    WorkUnit,
} from './types';

export type TaskRunner = (unit: WorkUnit) => Promise<Uint8Array>;

export type TaskFailureListener = (key: string, error: unknown) => void;

export type LocalClusterOptions = {
    onTaskFailure?: TaskFailureListener;
    workers?: number;
};

const DEFAULT_WORKERS = 4;

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function logTaskFailure(key: string, error: unknown): void {
    console.error('bucket-fanout task failed', {
        error: describeError(error),
        task_key: key,
    });
}

function ignoreTaskFailure(): void {}

function createSettlement<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
} {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((innerResolve) => {
        resolve = innerResolve;
    });

    return { promise, resolve };
}

interface ScheduledTask {
    isRunnable(): boolean;
    run(): Promise<void>;
}

class LocalFuture<T> implements Future<T>, ScheduledTask {
    private state: FutureStatus = 'pending';

    private started = false;

    private readonly outcome = createSettlement<TaskOutcome<T>>();

    constructor(
        readonly key: string,
        private readonly task: () => Promise<T>,
        private readonly onFailure: TaskFailureListener,
    ) {}

    status(): FutureStatus {
        return this.state;
    }

    async result(): Promise<T> {
        const outcome = await this.outcome.promise;

        if (outcome.status === 'rejected') {
            throw outcome.error;
        }

        return outcome.value;
    }

    cancel(): boolean {
        if (this.started || this.state !== 'pending') {
            return false;
        }

        this.state = 'cancelled';
        this.outcome.resolve({
            error: new FutureCancelledError(this.key),
            key: this.key,
            status: 'rejected',
        });

        return true;
    }

    isRunnable(): boolean {
        return !this.started && this.state === 'pending';
    }

    async run(): Promise<void> {
        if (!this.isRunnable()) {
            return;
        }

        this.started = true;

        try {
            const value = await this.task();

            this.state = 'finished';
            this.outcome.resolve({
                key: this.key,
                status: 'fulfilled',
                value,
            });
        } catch (error) {
            this.state = 'error';
            this.outcome.resolve({
                error,
                key: this.key,
                status: 'rejected',
            });
            this.notifyFailure(error);
        }
    }

    private notifyFailure(error: unknown): void {
        try {
            this.onFailure(this.key, error);
        } catch (listenerError) {
            console.error('bucket-fanout task failure listener failed', {
                error: describeError(listenerError),
                task_key: this.key,
            });
        }
    }
}

/**
 * In-process cluster. Work units queue FIFO and run on at most `workers`
 * concurrent slots; graph nodes other than reads run outside the slots so a
 * graph waiting on its own reads cannot starve them.
 */
export class LocalCluster implements Cluster {
    private readonly queue: ScheduledTask[] = [];

    private readonly inFlight = new Set<Promise<void>>();

    private readonly onTaskFailure: TaskFailureListener;

    private readonly workers: number;

    private activeSlots = 0;

    private executedReadCount = 0;

    private submittedTaskCount = 0;

    constructor(
        private readonly runner: TaskRunner,
        options: LocalClusterOptions = {},
    ) {
        const workers = options.workers ?? DEFAULT_WORKERS;

        if (!Number.isInteger(workers) || workers <= 0) {
            throw new Error('local cluster workers must be a positive integer');
        }

        this.workers = workers;
        this.onTaskFailure = options.onTaskFailure ?? logTaskFailure;
    }

    get executedReads(): number {
        return this.executedReadCount;
    }

    get submittedTasks(): number {
        return this.submittedTaskCount;
    }

    get pendingTasks(): number {
        return this.queue.length;
    }

    submit(unit: WorkUnit): Future<Uint8Array> {
        return this.enqueueRead(unit, this.onTaskFailure);
    }

    /**
     * Starts evaluating a graph at once. Reads inside the graph queue like
     * submitted units, but a failed read is reported once, under the graph's
     * own future.
     */
    compute<T>(value: DeferredValue<T>): Future<T> {
        const scope: GraphScope = {
            runWorkUnit: (unit) => {
                return this.enqueueRead(unit, ignoreTaskFailure).result();
            },
        };
        const future = new LocalFuture(
            value.key,
            () => value.evaluate(scope),
            this.onTaskFailure,
        );

        this.track(future.run());

        return future;
    }

    async gather<T>(futures: readonly Future<T>[]): Promise<T[]> {
        return unwrapOutcomes(await this.gatherSettled(futures));
    }

    async gatherSettled<T>(
        futures: readonly Future<T>[],
    ): Promise<TaskOutcome<T>[]> {
        return settleFutures(futures);
    }

    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all(Array.from(this.inFlight));
        }
    }

    private enqueueRead(
        unit: WorkUnit,
        onFailure: TaskFailureListener,
    ): LocalFuture<Uint8Array> {
        const future = new LocalFuture(
            workUnitKey(unit),
            () => this.executeRead(unit),
            onFailure,
        );

        this.submittedTaskCount += 1;
        this.queue.push(future);
        this.pump();

        return future;
    }

    private async executeRead(unit: WorkUnit): Promise<Uint8Array> {
        this.executedReadCount += 1;

        return this.runner(unit);
    }

    private pump(): void {
        while (this.activeSlots < this.workers && this.queue.length > 0) {
            const next = this.queue.shift();

            if (!next || !next.isRunnable()) {
                continue;
            }

            this.activeSlots += 1;
            this.track(next.run().finally(() => {
                this.activeSlots -= 1;
                this.pump();
            }));
        }
    }

    private track(pending: Promise<void>): void {
        const tracked: Promise<void> = pending.finally(() => {
            this.inFlight.delete(tracked);
        });

        this.inFlight.add(tracked);
    }
}
