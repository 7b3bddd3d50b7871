import { BucketReader } from './bucket-reader';
import { parseFanoutEnv, type FanoutEnv } from './env';
import { KeyReader } from './key-reader';
import { LocalCluster } from './local-cluster';
import {
    InMemoryObjectStore,
    type ObjectStore,
} from './object-store';
import { gatherHandles, summarizeOutcomes } from './read-strategy';
import { createS3ObjectStore } from './s3-object-store';
import type {
    ListingEntry,
    ReadBatchSummary,
} from './types';

export type RuntimeStoreSummary =
    | {
        mode: 'in_memory';
    }
    | {
        endpoint: string | null;
        mode: 's3';
        region: string;
    };

export type RuntimeBootstrap = {
    cluster: LocalCluster;
    config: FanoutEnv;
    reader: BucketReader;
    store: RuntimeStoreSummary;
};

export type RuntimeDependencyOverrides = {
    createStore?: (config: FanoutEnv) => ObjectStore;
    onTaskFailure?: (key: string, error: unknown) => void;
};

export type ActionSummary =
    | {
        action: 'list';
        entries: ListingEntry[];
    }
    | {
        action: 'read_key';
        byteLength: number;
        key: string;
    }
    | (ReadBatchSummary & {
        action: 'read_bytes';
        lazy: boolean;
    });

function createDefaultStore(config: FanoutEnv): ObjectStore {
    if (config.storeMode === 'in_memory') {
        const store = new InMemoryObjectStore();

        store.createBucket(config.bucket);

        return store;
    }

    if (!config.s3) {
        throw new Error('s3 store config is required when FANOUT_STORE=s3');
    }

    return createS3ObjectStore({
        endpoint: config.s3.endpoint,
        forcePathStyle: config.s3.forcePathStyle,
        listPageSize: config.s3.listPageSize,
        maxAttempts: config.s3.maxAttempts,
        region: config.s3.region,
        retryBaseMs: config.s3.retryBaseMs,
    });
}

function summarizeStore(config: FanoutEnv): RuntimeStoreSummary {
    if (config.storeMode === 'in_memory' || !config.s3) {
        return {
            mode: 'in_memory',
        };
    }

    return {
        endpoint: config.s3.endpoint || null,
        mode: 's3',
        region: config.s3.region,
    };
}

export function createRuntime(
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): RuntimeBootstrap {
    const config = parseFanoutEnv(env);
    const createStore = dependencies.createStore || createDefaultStore;
    const store = createStore(config);
    const workerReader = new KeyReader(store);
    const cluster = new LocalCluster(
        (unit) => workerReader.readKey(unit.bucket, unit.key),
        {
            onTaskFailure: dependencies.onTaskFailure,
            workers: config.workers,
        },
    );

    return {
        cluster,
        config,
        reader: new BucketReader(store, cluster),
        store: summarizeStore(config),
    };
}

export async function runAction(
    runtime: RuntimeBootstrap,
): Promise<ActionSummary> {
    const { config, reader } = runtime;

    if (config.action === 'list') {
        return {
            action: 'list',
            entries: await reader.listObjects(
                config.bucket,
                config.prefix,
                config.delimiter,
                { includeGroups: true },
            ),
        };
    }

    if (config.action === 'read_key') {
        const key = config.key || '';
        const content = await reader.readKeyContent(config.bucket, key);

        return {
            action: 'read_key',
            byteLength: content.byteLength,
            key,
        };
    }

    const handles = await reader.readBytes(config.bucket, config.prefix, {
        lazy: config.lazy,
    });
    const outcomes = await gatherHandles(runtime.cluster, handles);

    await runtime.cluster.drain();

    return {
        ...summarizeOutcomes(outcomes),
        action: 'read_bytes',
        lazy: config.lazy,
    };
}
