export type ObjectSummary = {
    etag: string | null;
    isGroup: false;
    key: string;
    kind: 'object';
    lastModified: string | null;
    size: number;
};

export type KeyGroup = {
    isGroup: true;
    key: string;
    kind: 'group';
};

export type ListingEntry =
    | ObjectSummary
    | KeyGroup;

export type ListingOptions = {
    includeGroups?: boolean;
};

export type WorkOperation = 'readKey';

export type WorkUnit = {
    bucket: string;
    key: string;
    operation: WorkOperation;
};

export type FutureStatus =
    | 'pending'
    | 'finished'
    | 'error'
    | 'cancelled';

export type TaskOutcome<T> =
    | {
        key: string;
        status: 'fulfilled';
        value: T;
    }
    | {
        error: unknown;
        key: string;
        status: 'rejected';
    };

export type ReadBatchSummary = {
    failedKeys: string[];
    fulfilled: number;
    handles: number;
    rejected: number;
    totalBytes: number;
};
