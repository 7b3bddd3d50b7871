import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { parseFanoutEnv } from './env';

const BASE_ENV = {
    FANOUT_BUCKET: 'fanout-test',
    FANOUT_S3_REGION: 'us-east-1',
};

describe('parseFanoutEnv', () => {
    it('applies defaults', () => {
        const config = parseFanoutEnv({ ...BASE_ENV });

        assert.deepEqual(config, {
            action: 'read_bytes',
            bucket: 'fanout-test',
            delimiter: undefined,
            key: undefined,
            lazy: false,
            prefix: '',
            s3: {
                endpoint: undefined,
                forcePathStyle: false,
                listPageSize: 1000,
                maxAttempts: 3,
                region: 'us-east-1',
                retryBaseMs: 200,
            },
            storeMode: 's3',
            workers: 4,
        });
    });

    it('reads every override', () => {
        const config = parseFanoutEnv({
            ...BASE_ENV,
            FANOUT_ACTION: 'list',
            FANOUT_DELIMITER: '/',
            FANOUT_LAZY: 'yes',
            FANOUT_PREFIX: 'tmp/test/',
            FANOUT_S3_ENDPOINT: ' http://localhost:9000 ',
            FANOUT_S3_FORCE_PATH_STYLE: 'on',
            FANOUT_S3_LIST_PAGE_SIZE: '250',
            FANOUT_S3_MAX_ATTEMPTS: '5',
            FANOUT_S3_RETRY_BASE_MS: '50',
            FANOUT_WORKERS: '8',
        });

        assert.equal(config.action, 'list');
        assert.equal(config.delimiter, '/');
        assert.equal(config.lazy, true);
        assert.equal(config.prefix, 'tmp/test/');
        assert.equal(config.workers, 8);
        assert.deepEqual(config.s3, {
            endpoint: 'http://localhost:9000',
            forcePathStyle: true,
            listPageSize: 250,
            maxAttempts: 5,
            region: 'us-east-1',
            retryBaseMs: 50,
        });
    });

    it('keeps prefix whitespace and trailing delimiters as given', () => {
        const config = parseFanoutEnv({
            ...BASE_ENV,
            FANOUT_PREFIX: 'logs/ 2026/',
        });

        assert.equal(config.prefix, 'logs/ 2026/');
    });

    it('caps the list page size', () => {
        const config = parseFanoutEnv({
            ...BASE_ENV,
            FANOUT_S3_LIST_PAGE_SIZE: '5000',
        });

        assert.equal(config.s3?.listPageSize, 1000);
    });

    it('falls back on invalid positive integers', () => {
        const config = parseFanoutEnv({
            ...BASE_ENV,
            FANOUT_WORKERS: '-2',
        });

        assert.equal(config.workers, 4);
    });

    it('requires a bucket', () => {
        assert.throws(
            () => parseFanoutEnv({ FANOUT_S3_REGION: 'us-east-1' }),
            /FANOUT_BUCKET is required/,
        );
    });

    it('requires a region for the s3 store', () => {
        assert.throws(
            () => parseFanoutEnv({ FANOUT_BUCKET: 'b' }),
            /FANOUT_S3_REGION is required/,
        );
    });

    it('needs no region for the in-memory store', () => {
        const config = parseFanoutEnv({
            FANOUT_BUCKET: 'b',
            FANOUT_STORE: 'in_memory',
        });

        assert.equal(config.storeMode, 'in_memory');
        assert.equal(config.s3, undefined);
    });

    it('rejects an unknown store', () => {
        assert.throws(
            () => parseFanoutEnv({ ...BASE_ENV, FANOUT_STORE: 'gcs' }),
            /FANOUT_STORE must be one of s3\|in_memory/,
        );
    });

    it('rejects an unknown action', () => {
        assert.throws(
            () => parseFanoutEnv({ ...BASE_ENV, FANOUT_ACTION: 'write' }),
            /FANOUT_ACTION must be one of list\|read_key\|read_bytes/,
        );
    });

    it('rejects a malformed boolean', () => {
        assert.throws(
            () => parseFanoutEnv({ ...BASE_ENV, FANOUT_LAZY: 'maybe' }),
            /FANOUT_LAZY must be true or false when provided/,
        );
    });

    it('requires a key for read_key', () => {
        assert.throws(
            () => parseFanoutEnv({ ...BASE_ENV, FANOUT_ACTION: 'read_key' }),
            /FANOUT_KEY is required when FANOUT_ACTION=read_key/,
        );
    });
});
