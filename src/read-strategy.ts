import type {
    Cluster,
    Future,
} from './cluster';
import {
    type DeferredValue,
    deferRead,
} from './deferred';
import type { ReadTaskBuilder } from './task-builder';
import type {
    ReadBatchSummary,
    TaskOutcome,
} from './types';

export type DispatchedRead = {
    future: Future<Uint8Array>;
    key: string;
    kind: 'dispatched';
};

export type DeferredRead = {
    key: string;
    kind: 'deferred';
    value: DeferredValue<Uint8Array>;
};

export type ReadHandle =
    | DispatchedRead
    | DeferredRead;

export type ReadBytesOptions = {
    lazy?: boolean;
};

export class ReadExecutionStrategy {
    constructor(
        private readonly builder: ReadTaskBuilder,
        private readonly cluster: Cluster,
    ) {}

    readBytes(
        bucket: string,
        prefix: string,
        options: { lazy: true },
    ): Promise<DeferredRead[]>;
    readBytes(
        bucket: string,
        prefix?: string,
        options?: { lazy?: false },
    ): Promise<DispatchedRead[]>;
    readBytes(
        bucket: string,
        prefix?: string,
        options?: ReadBytesOptions,
    ): Promise<ReadHandle[]>;
    async readBytes(
        bucket: string,
        prefix = '',
        options: ReadBytesOptions = {},
    ): Promise<ReadHandle[]> {
        const units = await this.builder.buildReadTasks(bucket, prefix);

        if (options.lazy) {
            return units.map((unit) => {
                const handle: DeferredRead = {
                    key: unit.key,
                    kind: 'deferred',
                    value: deferRead(unit),
                };

                return Object.freeze(handle);
            });
        }

        return units.map((unit) => {
            const handle: DispatchedRead = {
                future: this.cluster.submit(unit),
                key: unit.key,
                kind: 'dispatched',
            };

            return Object.freeze(handle);
        });
    }
}

/**
 * Turns every handle into a future, submitting deferred ones. Dispatched
 * handles pass through, so positions line up with the input.
 */
export function submitHandles(
    cluster: Cluster,
    handles: readonly ReadHandle[],
): Future<Uint8Array>[] {
    return handles.map((handle) => {
        if (handle.kind === 'dispatched') {
            return handle.future;
        }

        return cluster.compute(handle.value);
    });
}

/**
 * Submits what is still deferred and waits for every handle. Outcomes are
 * keyed by object key, one per handle, in handle order.
 */
export async function gatherHandles(
    cluster: Cluster,
    handles: readonly ReadHandle[],
): Promise<TaskOutcome<Uint8Array>[]> {
    const outcomes = await cluster.gatherSettled(
        submitHandles(cluster, handles),
    );

    return outcomes.map((outcome, position) => {
        return {
            ...outcome,
            key: handles[position].key,
        };
    });
}

export function summarizeOutcomes(
    outcomes: TaskOutcome<Uint8Array>[],
): ReadBatchSummary {
    const summary: ReadBatchSummary = {
        failedKeys: [],
        fulfilled: 0,
        handles: outcomes.length,
        rejected: 0,
        totalBytes: 0,
    };

    for (const outcome of outcomes) {
        if (outcome.status === 'fulfilled') {
            summary.fulfilled += 1;
            summary.totalBytes += outcome.value.byteLength;
            continue;
        }

        summary.rejected += 1;
        summary.failedKeys.push(outcome.key);
    }

    return summary;
}
