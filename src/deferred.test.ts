import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
    collectDeferred,
    combineDeferred,
    deferRead,
    type GraphScope,
    graphSize,
    mapDeferred,
} from './deferred';
import { createReadWorkUnit } from './task-builder';
import { TEST_BUCKET } from './test-helpers';

function createCountingScope(bodies: Record<string, string>) {
    const reads: string[] = [];
    const scope: GraphScope = {
        runWorkUnit: async (unit) => {
            reads.push(unit.key);
            return new Uint8Array(Buffer.from(bodies[unit.key] ?? '', 'utf8'));
        },
    };

    return { reads, scope };
}

describe('deferRead', () => {
    it('keys the node by operation, bucket and key', () => {
        const value = deferRead(createReadWorkUnit(TEST_BUCKET, 'a/b.csv'));

        assert.equal(value.key, 'readKey-fanout-test/a/b.csv');
        assert.deepEqual(value.dependencies, []);
    });

    it('reads nothing until evaluated in a scope', async () => {
        const { reads, scope } = createCountingScope({ 'k': 'abc' });
        const value = deferRead(createReadWorkUnit(TEST_BUCKET, 'k'));

        assert.deepEqual(reads, []);

        const bytes = await value.evaluate(scope);

        assert.equal(Buffer.from(bytes).toString('utf8'), 'abc');
        assert.deepEqual(reads, ['k']);
    });
});

describe('derived deferred values', () => {
    it('maps a value without reading at construction', async () => {
        const { reads, scope } = createCountingScope({ 'k': 'hello' });
        const length = mapDeferred(
            deferRead(createReadWorkUnit(TEST_BUCKET, 'k')),
            (bytes) => bytes.byteLength,
        );

        assert.equal(reads.length, 0);
        assert.match(length.key, /^map-/);
        assert.equal(await length.evaluate(scope), 5);
    });

    it('combines values in input order', async () => {
        const { scope } = createCountingScope({ 'a': 'x', 'b': 'yy', 'c': 'zzz' });
        const reads = ['a', 'b', 'c'].map((key) => {
            return deferRead(createReadWorkUnit(TEST_BUCKET, key));
        });
        const joined = combineDeferred(
            reads,
            (values) => values
                .map((bytes) => Buffer.from(bytes).toString('utf8'))
                .join('|'),
            'join',
        );

        assert.match(joined.key, /^join-/);
        assert.equal(await joined.evaluate(scope), 'x|yy|zzz');
    });

    it('evaluates a shared dependency once per scope', async () => {
        const { reads, scope } = createCountingScope({ 'shared': 'abc' });
        const shared = deferRead(createReadWorkUnit(TEST_BUCKET, 'shared'));
        const left = mapDeferred(shared, (bytes) => bytes.byteLength);
        const right = mapDeferred(shared, (bytes) => bytes[0]);
        const both = collectDeferred([left, right]);

        assert.deepEqual(await both.evaluate(scope), [3, 97]);
        assert.deepEqual(reads, ['shared']);

        const second = createCountingScope({ 'shared': 'abc' });

        await both.evaluate(second.scope);

        assert.deepEqual(second.reads, ['shared']);
    });

    it('propagates a failed dependency', async () => {
        const scope: GraphScope = {
            runWorkUnit: async () => {
                throw new Error('read failed');
            },
        };
        const value = collectDeferred([
            deferRead(createReadWorkUnit(TEST_BUCKET, 'k')),
        ]);

        await assert.rejects(value.evaluate(scope), /read failed/);
    });
});

describe('graphSize', () => {
    it('counts distinct nodes', () => {
        const shared = deferRead(createReadWorkUnit(TEST_BUCKET, 'shared'));
        const other = deferRead(createReadWorkUnit(TEST_BUCKET, 'other'));
        const left = mapDeferred(shared, (bytes) => bytes.byteLength);
        const right = combineDeferred([shared, other], (values) => values.length);
        const root = collectDeferred<number>([left, right]);

        assert.equal(graphSize(shared), 1);
        assert.equal(graphSize(root), 5);
    });
});
