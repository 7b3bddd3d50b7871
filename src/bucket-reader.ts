import type { Cluster } from './cluster';
import { KeyReader } from './key-reader';
import { ListingEngine } from './listing';
import type { ObjectStore } from './object-store';
import {
    type DeferredRead,
    type DispatchedRead,
    type ReadBytesOptions,
    ReadExecutionStrategy,
    type ReadHandle,
} from './read-strategy';
import { ReadTaskBuilder } from './task-builder';
import type {
    ListingEntry,
    ListingOptions,
    WorkUnit,
} from './types';

/**
 * Read surface over one object store and one cluster. Both are passed in
 * once and used for every call; nothing is looked up from ambient state.
 */
export class BucketReader {
    readonly listing: ListingEngine;

    readonly reader: KeyReader;

    readonly taskBuilder: ReadTaskBuilder;

    readonly strategy: ReadExecutionStrategy;

    constructor(
        store: ObjectStore,
        readonly cluster: Cluster,
    ) {
        this.listing = new ListingEngine(store);
        this.reader = new KeyReader(store);
        this.taskBuilder = new ReadTaskBuilder(this.listing);
        this.strategy = new ReadExecutionStrategy(this.taskBuilder, cluster);
    }

    listObjects(
        bucket: string,
        prefix = '',
        delimiter?: string,
        options: ListingOptions = {},
    ): Promise<ListingEntry[]> {
        return this.listing.list(bucket, prefix, delimiter, options);
    }

    readKeyContent(bucket: string, key: string): Promise<Uint8Array> {
        return this.reader.readKey(bucket, key);
    }

    buildReadTasks(bucket: string, prefix = ''): Promise<WorkUnit[]> {
        return this.taskBuilder.buildReadTasks(bucket, prefix);
    }

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
    readBytes(
        bucket: string,
        prefix = '',
        options: ReadBytesOptions = {},
    ): Promise<ReadHandle[]> {
        return this.strategy.readBytes(bucket, prefix, options);
    }
}
