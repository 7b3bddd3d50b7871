import {
    GetObjectCommand,
    ListObjectsV2Command,
    S3Client,
    type S3ClientConfig,
} from '@aws-sdk/client-s3';
import {
    AccessDeniedError,
    BucketNotFoundError,
    ObjectNotFoundError,
    ObjectStoreError,
    TransientIOError,
} from './errors';
import type {
    GetObjectRequest,
    ListRequest,
    ObjectStore,
    RawListEntry,
} from './object-store';

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_MS = 200;
const MAX_LIST_PAGE_SIZE = 1000;

const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'EPIPE',
    'ETIMEDOUT',
    'InternalError',
    'NetworkingError',
    'RequestTimeout',
    'ServiceUnavailable',
    'SlowDown',
    'TimeoutError',
    'TooManyRequests',
    'Throttling',
]);

const ACCESS_DENIED_CODES = new Set([
    'AccessDenied',
    'AllAccessDisabled',
    'Forbidden',
    'InvalidAccessKeyId',
    'SignatureDoesNotMatch',
]);

const MISSING_KEY_CODES = new Set([
    'NoSuchKey',
    'NotFound',
]);

export type S3ObjectStoreConfig = {
    endpoint?: string;
    forcePathStyle?: boolean;
    listPageSize?: number;
    maxAttempts?: number;
    region: string;
    retryBaseMs?: number;
    sleep?: (ms: number) => Promise<void>;
};

type ErrorFacts = {
    code: string;
    retryable: boolean;
    statusCode: number;
};

type StoreOperation = 'list' | 'getObject';

function sleepMs(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return Boolean(value)
        && typeof value === 'object'
        && !Array.isArray(value);
}

function readErrorFacts(error: unknown): ErrorFacts {
    if (!isRecord(error)) {
        return {
            code: '',
            retryable: false,
            statusCode: 0,
        };
    }

    const metadata: Record<string, unknown> = isRecord(error.$metadata)
        ? error.$metadata
        : {};
    const statusCode = Number(
        metadata.httpStatusCode || error.statusCode || 0,
    );
    const code = String(error.Code || error.code || error.name || '');
    const retryable = error.retryable === true
        || isRecord(error.$retryable);

    return {
        code,
        retryable,
        statusCode: Number.isFinite(statusCode) ? statusCode : 0,
    };
}

function isTransient(facts: ErrorFacts): boolean {
    if (facts.retryable) {
        return true;
    }

    if (facts.statusCode === 429 || facts.statusCode >= 500) {
        return true;
    }

    return TRANSIENT_ERROR_CODES.has(facts.code);
}

export function computeRetryDelayMs(
    attempt: number,
    retryBaseMs: number,
): number {
    const cappedAttempt = Math.min(Math.max(attempt, 1), 8);

    return retryBaseMs * (2 ** (cappedAttempt - 1));
}

export function classifyObjectStoreError(
    error: unknown,
    operation: StoreOperation,
    target: {
        bucket: string;
        key?: string;
    },
    attempts: number,
): unknown {
    if (error instanceof ObjectStoreError) {
        return error;
    }

    const facts = readErrorFacts(error);

    if (facts.code === 'NoSuchBucket') {
        return new BucketNotFoundError(target.bucket, { cause: error });
    }

    if (ACCESS_DENIED_CODES.has(facts.code) || facts.statusCode === 403) {
        return new AccessDeniedError(target, { cause: error });
    }

    if (
        MISSING_KEY_CODES.has(facts.code)
        || facts.statusCode === 404
    ) {
        if (operation === 'getObject' && target.key !== undefined) {
            return new ObjectNotFoundError(target.bucket, target.key, {
                cause: error,
            });
        }

        return new BucketNotFoundError(target.bucket, { cause: error });
    }

    if (isTransient(facts)) {
        return new TransientIOError(target, attempts, { cause: error });
    }

    return error;
}

async function readStreamBody(
    body: AsyncIterable<unknown>,
): Promise<Uint8Array> {
    const chunks: Buffer[] = [];

    for await (const chunk of body) {
        if (typeof chunk === 'string') {
            chunks.push(Buffer.from(chunk, 'utf8'));
            continue;
        }

        if (chunk instanceof Uint8Array) {
            chunks.push(Buffer.from(chunk));
            continue;
        }

        throw new Error('unsupported object-store body chunk type');
    }

    return new Uint8Array(Buffer.concat(chunks));
}

function hasByteArrayTransform(
    value: object,
): value is { transformToByteArray: () => Promise<Uint8Array> } {
    return 'transformToByteArray' in value
        && typeof value.transformToByteArray === 'function';
}

function isAsyncIterable(
    value: object,
): value is AsyncIterable<unknown> {
    return Symbol.asyncIterator in value;
}

export async function readBodyAsBytes(
    body: unknown,
): Promise<Uint8Array> {
    if (typeof body === 'string') {
        return new Uint8Array(Buffer.from(body, 'utf8'));
    }

    if (body instanceof Uint8Array) {
        return Uint8Array.from(body);
    }

    if (typeof body === 'object' && body !== null) {
        if (hasByteArrayTransform(body)) {
            return body.transformToByteArray();
        }

        if (isAsyncIterable(body)) {
            return readStreamBody(body);
        }
    }

    throw new Error('unsupported object-store body type');
}

function requireName(value: string, label: string): string {
    const normalized = String(value || '').trim();

    if (!normalized) {
        throw new Error(`object-store ${label} must not be empty`);
    }

    return normalized;
}

export class S3ObjectStore implements ObjectStore {
    private readonly listPageSize: number;

    private readonly maxAttempts: number;

    private readonly retryBaseMs: number;

    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly client: S3Client,
        config: Omit<S3ObjectStoreConfig, 'region'> = {},
    ) {
        this.listPageSize = Math.min(
            Math.max(config.listPageSize ?? MAX_LIST_PAGE_SIZE, 1),
            MAX_LIST_PAGE_SIZE,
        );
        this.maxAttempts = Math.max(
            config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
            1,
        );
        this.retryBaseMs = Math.max(
            config.retryBaseMs ?? DEFAULT_RETRY_BASE_MS,
            0,
        );
        this.sleep = config.sleep ?? sleepMs;
    }

    async list(input: ListRequest): Promise<RawListEntry[]> {
        const bucket = requireName(input.bucket, 'bucket');
        const entries: RawListEntry[] = [];
        let continuationToken: string | undefined;

        for (;;) {
            const response = await this.withRetry(
                'list',
                { bucket },
                () => this.client.send(
                    new ListObjectsV2Command({
                        Bucket: bucket,
                        ContinuationToken: continuationToken,
                        Delimiter: input.delimiter || undefined,
                        MaxKeys: this.listPageSize,
                        Prefix: input.prefix || undefined,
                    }),
                ),
            );

            for (const item of response.Contents || []) {
                if (!item.Key) {
                    continue;
                }

                entries.push({
                    etag: item.ETag ?? null,
                    isCommonPrefix: false,
                    key: item.Key,
                    lastModified: item.LastModified
                        ? item.LastModified.toISOString()
                        : null,
                    size: item.Size ?? 0,
                });
            }

            for (const commonPrefix of response.CommonPrefixes || []) {
                if (!commonPrefix.Prefix) {
                    continue;
                }

                entries.push({
                    isCommonPrefix: true,
                    key: commonPrefix.Prefix,
                    size: null,
                });
            }

            if (!response.IsTruncated) {
                break;
            }

            continuationToken = response.NextContinuationToken;

            if (!continuationToken) {
                break;
            }
        }

        return entries;
    }

    async getObject(input: GetObjectRequest): Promise<Uint8Array> {
        const bucket = requireName(input.bucket, 'bucket');
        const key = input.key;

        if (!key) {
            throw new Error('object-store read key must not be empty');
        }

        return this.withRetry('getObject', { bucket, key }, async () => {
            const response = await this.client.send(
                new GetObjectCommand({
                    Bucket: bucket,
                    Key: key,
                }),
            );

            if (!response.Body) {
                throw new Error(`missing object body for key ${key}`);
            }

            return readBodyAsBytes(response.Body);
        });
    }

    private async withRetry<T>(
        operation: StoreOperation,
        target: {
            bucket: string;
            key?: string;
        },
        task: () => Promise<T>,
    ): Promise<T> {
        for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
            try {
                return await task();
            } catch (error) {
                const classified = classifyObjectStoreError(
                    error,
                    operation,
                    target,
                    attempt,
                );

                if (
                    attempt >= this.maxAttempts
                    || !(classified instanceof TransientIOError)
                ) {
                    throw classified;
                }

                await this.sleep(computeRetryDelayMs(attempt, this.retryBaseMs));
            }
        }

        throw new Error('unreachable retry state');
    }
}

export function createS3ObjectStore(
    config: S3ObjectStoreConfig,
): S3ObjectStore {
    const clientConfig: S3ClientConfig = {
        forcePathStyle: Boolean(config.forcePathStyle),
        maxAttempts: 1,
        region: config.region,
    };

    if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
    }

    const client = new S3Client(clientConfig);

    return new S3ObjectStore(client, {
        listPageSize: config.listPageSize,
        maxAttempts: config.maxAttempts,
        retryBaseMs: config.retryBaseMs,
        sleep: config.sleep,
    });
}
