import { normalizeBucket } from './listing';
import type { ObjectStore } from './object-store';

export class KeyReader {
    constructor(private readonly store: ObjectStore) {}

    async readKey(bucket: string, key: string): Promise<Uint8Array> {
        const normalizedBucket = normalizeBucket(bucket);

        if (!key) {
            throw new Error('read key must not be empty');
        }

        return this.store.getObject({
            bucket: normalizedBucket,
            key,
        });
    }
}
