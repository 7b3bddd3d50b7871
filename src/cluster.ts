import type { DeferredValue } from './deferred';
import { PartialBatchFailure } from './errors';
import type {
    FutureStatus,
    TaskOutcome,
    WorkUnit,
} from './types';

export interface Future<T> {
    readonly key: string;
    status(): FutureStatus;
    result(): Promise<T>;
    cancel(): boolean;
}

export interface Cluster {
    submit(unit: WorkUnit): Future<Uint8Array>;
    compute<T>(value: DeferredValue<T>): Future<T>;
    gather<T>(futures: readonly Future<T>[]): Promise<T[]>;
    gatherSettled<T>(
        futures: readonly Future<T>[],
    ): Promise<TaskOutcome<T>[]>;
}

export async function settleFutures<T>(
    futures: readonly Future<T>[],
): Promise<TaskOutcome<T>[]> {
    return Promise.all(
        futures.map(async (future): Promise<TaskOutcome<T>> => {
            try {
                return {
                    key: future.key,
                    status: 'fulfilled',
                    value: await future.result(),
                };
            } catch (error) {
                return {
                    error,
                    key: future.key,
                    status: 'rejected',
                };
            }
        }),
    );
}

export function unwrapOutcomes<T>(outcomes: TaskOutcome<T>[]): T[] {
    const values: T[] = [];

    for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
            throw new PartialBatchFailure(outcomes);
        }

        values.push(outcome.value);
    }

    return values;
}
