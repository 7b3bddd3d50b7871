import { KeyReader } from './key-reader';
import { LocalCluster } from './local-cluster';
import { InMemoryObjectStore } from './object-store';

export const TEST_BUCKET = 'fanout-test';

export const FIXED_TIME = '2026-02-16T12:00:00.000Z';

export function createTestStore(
    objects: Record<string, string | Uint8Array> = {},
    bucket = TEST_BUCKET,
): InMemoryObjectStore {
    const store = new InMemoryObjectStore(() => FIXED_TIME);

    store.createBucket(bucket);

    for (const [key, body] of Object.entries(objects)) {
        store.putObject(bucket, key, body);
    }

    return store;
}

/**
 * Six one-byte objects: tmp/test/data-{0,1,2}/file-{0,1}.csv.
 */
export function createDataFileStore(
    bucket = TEST_BUCKET,
): InMemoryObjectStore {
    const store = createTestStore({}, bucket);

    for (let i = 0; i < 3; i += 1) {
        for (let j = 0; j < 2; j += 1) {
            store.putObject(bucket, `tmp/test/data-${i}/file-${j}.csv`, 'a');
        }
    }

    return store;
}

export const DATA_FILE_KEYS = [
    'tmp/test/data-0/file-0.csv',
    'tmp/test/data-0/file-1.csv',
    'tmp/test/data-1/file-0.csv',
    'tmp/test/data-1/file-1.csv',
    'tmp/test/data-2/file-0.csv',
    'tmp/test/data-2/file-1.csv',
];

export function createTestCluster(
    store: InMemoryObjectStore,
    workers = 2,
): {
    cluster: LocalCluster;
    failures: string[];
} {
    const reader = new KeyReader(store);
    const failures: string[] = [];
    const cluster = new LocalCluster(
        (unit) => reader.readKey(unit.bucket, unit.key),
        {
            onTaskFailure: (key) => {
                failures.push(key);
            },
            workers,
        },
    );

    return { cluster, failures };
}

export function decodeUtf8(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('utf8');
}
