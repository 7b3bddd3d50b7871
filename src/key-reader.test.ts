import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
    AccessDeniedError,
    BucketNotFoundError,
    ObjectNotFoundError,
    TransientIOError,
} from './errors';
import { KeyReader } from './key-reader';
import { ListingEngine } from './listing';
import {
    createTestStore,
    decodeUtf8,
    TEST_BUCKET,
} from './test-helpers';

describe('KeyReader.readKey', () => {
    it('returns the content written to the key', async () => {
        const data = 'a'.repeat(10);
        const reader = new KeyReader(createTestStore({
            'tmp/test/file1': data,
        }));

        const content = await reader.readKey(TEST_BUCKET, 'tmp/test/file1');

        assert.equal(decodeUtf8(content), data);
    });

    it('returns binary content byte for byte', async () => {
        const body = new Uint8Array([0, 255, 10, 13, 128]);
        const reader = new KeyReader(createTestStore({ 'blob.bin': body }));

        const content = await reader.readKey(TEST_BUCKET, 'blob.bin');

        assert.deepEqual(Array.from(content), [0, 255, 10, 13, 128]);
    });

    it('does not share buffers with the store', async () => {
        const store = createTestStore({ 'k': 'abc' });
        const reader = new KeyReader(store);
        const first = await reader.readKey(TEST_BUCKET, 'k');

        first[0] = 0;

        const second = await reader.readKey(TEST_BUCKET, 'k');

        assert.equal(decodeUtf8(second), 'abc');
    });

    it('signals ObjectNotFound for a missing key', async () => {
        const reader = new KeyReader(createTestStore());

        await assert.rejects(
            reader.readKey(TEST_BUCKET, 'nope'),
            (error: unknown) => {
                assert.ok(error instanceof ObjectNotFoundError);
                assert.equal(error.kind, 'ObjectNotFound');
                assert.equal(error.bucket, TEST_BUCKET);
                assert.equal(error.key, 'nope');
                assert.equal(
                    error.message,
                    'object does not exist (bucket=fanout-test key=nope)',
                );
                return true;
            },
        );
    });

    it('signals ObjectNotFound for a key deleted after listing', async () => {
        const store = createTestStore({ 'tmp/a': 'x', 'tmp/b': 'y' });
        const listing = new ListingEngine(store);
        const reader = new KeyReader(store);
        const entries = await listing.list(TEST_BUCKET, 'tmp/');

        store.deleteObject(TEST_BUCKET, 'tmp/a');

        assert.equal(entries.length, 2);
        await assert.rejects(
            reader.readKey(TEST_BUCKET, entries[0].key),
            ObjectNotFoundError,
        );
        assert.equal(
            decodeUtf8(await reader.readKey(TEST_BUCKET, entries[1].key)),
            'y',
        );
    });

    it('signals AccessDenied on permission failure', async () => {
        const store = createTestStore({ 'k': 'v' });
        const reader = new KeyReader(store);

        store.denyAccess(TEST_BUCKET);

        await assert.rejects(
            reader.readKey(TEST_BUCKET, 'k'),
            AccessDeniedError,
        );
    });

    it('surfaces transient failures without retrying', async () => {
        const store = createTestStore({ 'k': 'v' });
        const reader = new KeyReader(store);

        store.failNextReads(TEST_BUCKET, 'k', 1);

        await assert.rejects(reader.readKey(TEST_BUCKET, 'k'), TransientIOError);
        assert.equal(store.reads, 1);
        assert.equal(decodeUtf8(await reader.readKey(TEST_BUCKET, 'k')), 'v');
    });

    it('signals BucketNotFound for a missing bucket', async () => {
        const reader = new KeyReader(createTestStore());

        await assert.rejects(
            reader.readKey('other-bucket', 'k'),
            BucketNotFoundError,
        );
    });

    it('rejects an empty key', async () => {
        const reader = new KeyReader(createTestStore());

        await assert.rejects(
            reader.readKey(TEST_BUCKET, ''),
            /read key must not be empty/,
        );
    });
});
