import type { TaskOutcome } from './types';

export type ObjectStoreErrorKind =
    | 'BucketNotFound'
    | 'AccessDenied'
    | 'ObjectNotFound'
    | 'TransientIOError';

function describeTarget(
    bucket: string,
    key: string | undefined,
): string {
    return key === undefined
        ? `bucket=${bucket}`
        : `bucket=${bucket} key=${key}`;
}

export abstract class ObjectStoreError extends Error {
    abstract readonly kind: ObjectStoreErrorKind;

    readonly bucket: string;

    readonly key?: string;

    constructor(
        message: string,
        target: {
            bucket: string;
            key?: string;
        },
        options?: {
            cause?: unknown;
        },
    ) {
        super(
            `${message} (${describeTarget(target.bucket, target.key)})`,
            options,
        );
        this.bucket = target.bucket;
        this.key = target.key;
    }
}

export class BucketNotFoundError extends ObjectStoreError {
    readonly kind = 'BucketNotFound';

    constructor(bucket: string, options?: { cause?: unknown }) {
        super('bucket does not exist', { bucket }, options);
        this.name = 'BucketNotFoundError';
    }
}

export class AccessDeniedError extends ObjectStoreError {
    readonly kind = 'AccessDenied';

    constructor(
        target: {
            bucket: string;
            key?: string;
        },
        options?: { cause?: unknown },
    ) {
        super('access denied', target, options);
        this.name = 'AccessDeniedError';
    }
}

export class ObjectNotFoundError extends ObjectStoreError {
    readonly kind = 'ObjectNotFound';

    declare readonly key: string;

    constructor(
        bucket: string,
        key: string,
        options?: { cause?: unknown },
    ) {
        super('object does not exist', { bucket, key }, options);
        this.name = 'ObjectNotFoundError';
    }
}

export class TransientIOError extends ObjectStoreError {
    readonly kind = 'TransientIOError';

    readonly attempts: number;

    constructor(
        target: {
            bucket: string;
            key?: string;
        },
        attempts: number,
        options?: { cause?: unknown },
    ) {
        super(
            `transient object-store failure after attempt ${attempts}`,
            target,
            options,
        );
        this.name = 'TransientIOError';
        this.attempts = attempts;
    }
}

function collectFailedPositions<T>(
    outcomes: TaskOutcome<T>[],
): number[] {
    const positions: number[] = [];

    outcomes.forEach((outcome, position) => {
        if (outcome.status === 'rejected') {
            positions.push(position);
        }
    });

    return positions;
}

/**
 * Raised by `gather` once every task in a batch has settled and at least one
 * failed. A batch in which every task failed raises it too, so callers always
 * get the per-position outcomes rather than a single task's error.
 */
export class PartialBatchFailure<T> extends Error {
    readonly failedKeys: string[];

    readonly failedPositions: number[];

    readonly outcomes: TaskOutcome<T>[];

    constructor(outcomes: TaskOutcome<T>[]) {
        const failedPositions = collectFailedPositions(outcomes);
        const failedKeys = failedPositions.map((position) => {
            return outcomes[position].key;
        });

        super(
            `${failedPositions.length} of ${outcomes.length} tasks failed: `
            + failedKeys.join(', '),
        );
        this.name = 'PartialBatchFailure';
        this.failedKeys = failedKeys;
        this.failedPositions = failedPositions;
        this.outcomes = outcomes;
    }
}

export class FutureCancelledError extends Error {
    readonly futureKey: string;

    constructor(futureKey: string) {
        super(`future ${futureKey} was cancelled`);
        this.name = 'FutureCancelledError';
        this.futureKey = futureKey;
    }
}

export function isObjectStoreError(
    value: unknown,
): value is ObjectStoreError {
    return value instanceof ObjectStoreError;
}
