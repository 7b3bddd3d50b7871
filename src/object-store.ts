import {
    AccessDeniedError,
    BucketNotFoundError,
    ObjectNotFoundError,
    TransientIOError,
} from './errors';

export type RawListEntry = {
    etag?: string | null;
    isCommonPrefix: boolean;
    key: string;
    lastModified?: string | null;
    size: number | null;
};

export type ListRequest = {
    bucket: string;
    delimiter?: string;
    prefix: string;
};

export type GetObjectRequest = {
    bucket: string;
    key: string;
};

export interface ObjectStore {
    list(input: ListRequest): Promise<RawListEntry[]>;
    getObject(input: GetObjectRequest): Promise<Uint8Array>;
}

type StoredObject = {
    body: Uint8Array;
    etag: string;
    lastModified: string;
};

function nowIso(): string {
    return new Date().toISOString();
}

function toBytes(body: string | Uint8Array): Uint8Array {
    if (typeof body === 'string') {
        return new Uint8Array(Buffer.from(body, 'utf8'));
    }

    return Uint8Array.from(body);
}

export function compareKeys(
    left: string,
    right: string,
): number {
    if (left === right) {
        return 0;
    }

    return left < right ? -1 : 1;
}

export class InMemoryObjectStore implements ObjectStore {
    private readonly buckets = new Map<string, Map<string, StoredObject>>();

    private readonly deniedBuckets = new Set<string>();

    private readonly pendingReadFaults = new Map<string, number>();

    private revision = 0;

    private readCount = 0;

    private listCount = 0;

    constructor(
        private readonly timeProvider: () => string = nowIso,
    ) {}

    get reads(): number {
        return this.readCount;
    }

    get lists(): number {
        return this.listCount;
    }

    createBucket(bucket: string): void {
        if (!this.buckets.has(bucket)) {
            this.buckets.set(bucket, new Map());
        }
    }

    deleteBucket(bucket: string): void {
        this.buckets.delete(bucket);
    }

    putObject(
        bucket: string,
        key: string,
        body: string | Uint8Array,
    ): void {
        const objects = this.requireBucket(bucket);

        this.revision += 1;
        objects.set(key, {
            body: toBytes(body),
            etag: `"rev-${this.revision}"`,
            lastModified: this.timeProvider(),
        });
    }

    deleteObject(bucket: string, key: string): void {
        this.requireBucket(bucket).delete(key);
    }

    denyAccess(bucket: string): void {
        this.deniedBuckets.add(bucket);
    }

    allowAccess(bucket: string): void {
        this.deniedBuckets.delete(bucket);
    }

    failNextReads(
        bucket: string,
        key: string,
        count: number,
    ): void {
        this.pendingReadFaults.set(`${bucket}/${key}`, count);
    }

    async list(input: ListRequest): Promise<RawListEntry[]> {
        this.listCount += 1;

        const objects = this.requireBucket(input.bucket);

        this.assertAccess(input.bucket);

        const entries: RawListEntry[] = [];
        const commonPrefixes = new Set<string>();
        const keys = Array.from(objects.keys())
            .filter((key) => key.startsWith(input.prefix))
            .sort(compareKeys);

        for (const key of keys) {
            if (input.delimiter) {
                const remainder = key.slice(input.prefix.length);
                const at = remainder.indexOf(input.delimiter);

                if (at >= 0) {
                    commonPrefixes.add(
                        input.prefix
                        + remainder.slice(0, at + input.delimiter.length),
                    );
                    continue;
                }
            }

            const stored = objects.get(key);

            if (!stored) {
                continue;
            }

            entries.push({
                etag: stored.etag,
                isCommonPrefix: false,
                key,
                lastModified: stored.lastModified,
                size: stored.body.byteLength,
            });
        }

        for (const prefix of commonPrefixes) {
            entries.push({
                isCommonPrefix: true,
                key: prefix,
                size: null,
            });
        }

        return entries;
    }

    async getObject(input: GetObjectRequest): Promise<Uint8Array> {
        this.readCount += 1;

        const objects = this.requireBucket(input.bucket);

        this.assertAccess(input.bucket, input.key);

        const faultKey = `${input.bucket}/${input.key}`;
        const remainingFaults = this.pendingReadFaults.get(faultKey) ?? 0;

        if (remainingFaults > 0) {
            this.pendingReadFaults.set(faultKey, remainingFaults - 1);
            throw new TransientIOError(
                { bucket: input.bucket, key: input.key },
                1,
            );
        }

        const stored = objects.get(input.key);

        if (!stored) {
            throw new ObjectNotFoundError(input.bucket, input.key);
        }

        return Uint8Array.from(stored.body);
    }

    private requireBucket(bucket: string): Map<string, StoredObject> {
        const objects = this.buckets.get(bucket);

        if (!objects) {
            throw new BucketNotFoundError(bucket);
        }

        return objects;
    }

    private assertAccess(bucket: string, key?: string): void {
        if (this.deniedBuckets.has(bucket)) {
            throw new AccessDeniedError({ bucket, key });
        }
    }
}
