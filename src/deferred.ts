import { randomUUID } from 'node:crypto';
import type { WorkUnit } from './types';

/**
 * Execution context a cluster hands to a graph while computing it. Nodes
 * never run outside a scope, so building or combining deferred values
 * performs no reads.
 */
export interface GraphScope {
    runWorkUnit(unit: WorkUnit): Promise<Uint8Array>;
}

export class DeferredValue<T> {
    private readonly evaluations = new WeakMap<GraphScope, Promise<T>>();

    private constructor(
        readonly key: string,
        readonly dependencies: readonly DeferredValue<unknown>[],
        private readonly run: (scope: GraphScope) => Promise<T>,
    ) {
        Object.freeze(this.dependencies);
    }

    static fromWorkUnit(unit: WorkUnit): DeferredValue<Uint8Array> {
        return new DeferredValue(
            workUnitKey(unit),
            [],
            (scope) => scope.runWorkUnit(unit),
        );
    }

    static derive<T, R>(
        label: string,
        inputs: readonly DeferredValue<T>[],
        fn: (values: T[]) => R | Promise<R>,
    ): DeferredValue<R> {
        return new DeferredValue<R>(
            `${label}-${randomUUID()}`,
            [...inputs],
            async (scope): Promise<R> => {
                const values = await Promise.all(
                    inputs.map((input) => input.evaluate(scope)),
                );

                return fn(values);
            },
        );
    }

    /**
     * Computes this node within a scope. A node shared by several parents is
     * computed once per scope.
     */
    evaluate(scope: GraphScope): Promise<T> {
        const existing = this.evaluations.get(scope);

        if (existing) {
            return existing;
        }

        const pending = this.run(scope);

        this.evaluations.set(scope, pending);

        return pending;
    }
}

export function workUnitKey(unit: WorkUnit): string {
    return `${unit.operation}-${unit.bucket}/${unit.key}`;
}

export function deferRead(unit: WorkUnit): DeferredValue<Uint8Array> {
    return DeferredValue.fromWorkUnit(unit);
}

export function mapDeferred<T, R>(
    value: DeferredValue<T>,
    fn: (input: T) => R | Promise<R>,
    label = 'map',
): DeferredValue<R> {
    return DeferredValue.derive<T, R>(label, [value], ([input]) => fn(input));
}

export function combineDeferred<T, R>(
    values: readonly DeferredValue<T>[],
    fn: (inputs: T[]) => R | Promise<R>,
    label = 'combine',
): DeferredValue<R> {
    return DeferredValue.derive<T, R>(label, values, fn);
}

export function collectDeferred<T>(
    values: readonly DeferredValue<T>[],
): DeferredValue<T[]> {
    return DeferredValue.derive<T, T[]>('collect', values, (inputs) => inputs);
}

export function graphSize(value: DeferredValue<unknown>): number {
    const seen = new Set<DeferredValue<unknown>>();
    const pending: DeferredValue<unknown>[] = [value];

    while (pending.length > 0) {
        const next = pending.pop();

        if (!next || seen.has(next)) {
            continue;
        }

        seen.add(next);
        pending.push(...next.dependencies);
    }

    return seen.size;
}
