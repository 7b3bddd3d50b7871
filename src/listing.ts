import {
    compareKeys,
    type ObjectStore,
    type RawListEntry,
} from './object-store';
import type {
    KeyGroup,
    ListingEntry,
    ListingOptions,
    ObjectSummary,
} from './types';

export function normalizeBucket(bucket: string): string {
    const normalized = String(bucket || '').trim();

    if (!normalized) {
        throw new Error('bucket must not be empty');
    }

    return normalized;
}

function toObjectSummary(entry: RawListEntry): ObjectSummary {
    const summary: ObjectSummary = {
        etag: entry.etag ?? null,
        isGroup: false,
        key: entry.key,
        kind: 'object',
        lastModified: entry.lastModified ?? null,
        size: entry.size ?? 0,
    };

    return Object.freeze(summary);
}

function toKeyGroup(key: string): KeyGroup {
    const group: KeyGroup = {
        isGroup: true,
        key,
        kind: 'group',
    };

    return Object.freeze(group);
}

/**
 * Returns the group key a listed key collapses into, or null when the key
 * sits directly at the prefix level. A key equal to the prefix has an empty
 * remainder and never forms a group.
 */
export function groupKeyFor(
    key: string,
    prefix: string,
    delimiter: string,
): string | null {
    const remainder = key.slice(prefix.length);
    const at = remainder.indexOf(delimiter);

    if (at < 0) {
        return null;
    }

    return prefix + remainder.slice(0, at + delimiter.length);
}

/**
 * Builds the ordered listing view from raw store entries. Store output is
 * re-filtered and re-grouped here so ordering and grouping hold whatever
 * the capability returns.
 */
export function buildListingView(
    rawEntries: RawListEntry[],
    prefix: string,
    delimiter: string | undefined,
    options: ListingOptions = {},
): ListingEntry[] {
    const objects = new Map<string, ObjectSummary>();
    const groups = new Map<string, KeyGroup>();

    for (const entry of rawEntries) {
        if (!entry.key.startsWith(prefix)) {
            continue;
        }

        if (entry.isCommonPrefix) {
            if (delimiter) {
                groups.set(entry.key, toKeyGroup(entry.key));
            }

            continue;
        }

        const groupKey = delimiter
            ? groupKeyFor(entry.key, prefix, delimiter)
            : null;

        if (groupKey !== null) {
            groups.set(groupKey, toKeyGroup(groupKey));
            continue;
        }

        objects.set(entry.key, toObjectSummary(entry));
    }

    const view: ListingEntry[] = Array.from(objects.values());

    if (options.includeGroups) {
        for (const group of groups.values()) {
            if (!objects.has(group.key)) {
                view.push(group);
            }
        }
    }

    return view.sort((left, right) => compareKeys(left.key, right.key));
}

export class ListingEngine {
    constructor(private readonly store: ObjectStore) {}

    async list(
        bucket: string,
        prefix = '',
        delimiter?: string,
        options: ListingOptions = {},
    ): Promise<ListingEntry[]> {
        const normalizedBucket = normalizeBucket(bucket);
        const normalizedPrefix = prefix || '';
        const normalizedDelimiter = delimiter || undefined;
        const rawEntries = await this.store.list({
            bucket: normalizedBucket,
            delimiter: normalizedDelimiter,
            prefix: normalizedPrefix,
        });

        return buildListingView(
            rawEntries,
            normalizedPrefix,
            normalizedDelimiter,
            options,
        );
    }

    async listSummaries(
        bucket: string,
        prefix = '',
    ): Promise<ObjectSummary[]> {
        const entries = await this.list(bucket, prefix);
        const summaries: ObjectSummary[] = [];

        for (const entry of entries) {
            if (entry.kind === 'object') {
                summaries.push(entry);
            }
        }

        return summaries;
    }
}
