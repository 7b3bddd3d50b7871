export type ObjectStoreMode =
    | 's3'
    | 'in_memory';

export type FanoutAction =
    | 'list'
    | 'read_key'
    | 'read_bytes';

export type S3StoreEnv = {
    endpoint?: string;
    forcePathStyle: boolean;
    listPageSize: number;
    maxAttempts: number;
    region: string;
    retryBaseMs: number;
};

export type FanoutEnv = {
    action: FanoutAction;
    bucket: string;
    delimiter?: string;
    key?: string;
    lazy: boolean;
    prefix: string;
    s3?: S3StoreEnv;
    storeMode: ObjectStoreMode;
    workers: number;
};

function parsePositiveInt(
    value: string | undefined,
    fallback: number,
): number {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);

    if (!Number.isFinite(parsed) || parsed <= 0) {
        return fallback;
    }

    return parsed;
}

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function readRequiredString(
    env: NodeJS.ProcessEnv,
    key: string,
): string {
    const value = readOptionalString(env[key]);

    if (!value) {
        throw new Error(`${key} is required`);
    }

    return value;
}

function parseBoolean(
    value: string | undefined,
    fallback: boolean,
    key: string,
): boolean {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return fallback;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new Error(`${key} must be true or false when provided`);
}

function parseStoreMode(
    value: string | undefined,
): ObjectStoreMode {
    const normalized = readOptionalString(value) || 's3';

    if (normalized === 's3' || normalized === 'in_memory') {
        return normalized;
    }

    throw new Error('FANOUT_STORE must be one of s3|in_memory');
}

function parseAction(
    value: string | undefined,
): FanoutAction {
    const normalized = readOptionalString(value) || 'read_bytes';

    if (
        normalized === 'list'
        || normalized === 'read_key'
        || normalized === 'read_bytes'
    ) {
        return normalized;
    }

    throw new Error(
        'FANOUT_ACTION must be one of list|read_key|read_bytes',
    );
}

// Prefix and delimiter are used as given: a trailing "/" or a space is
// part of the key space.
function readRawString(
    value: string | undefined,
): string | undefined {
    return value === undefined || value === '' ? undefined : value;
}

export function parseFanoutEnv(
    env: NodeJS.ProcessEnv,
): FanoutEnv {
    const storeMode = parseStoreMode(env.FANOUT_STORE);
    const action = parseAction(env.FANOUT_ACTION);
    let s3: S3StoreEnv | undefined;

    if (storeMode === 's3') {
        s3 = {
            endpoint: readOptionalString(env.FANOUT_S3_ENDPOINT),
            forcePathStyle: parseBoolean(
                env.FANOUT_S3_FORCE_PATH_STYLE,
                false,
                'FANOUT_S3_FORCE_PATH_STYLE',
            ),
            listPageSize: Math.min(
                parsePositiveInt(env.FANOUT_S3_LIST_PAGE_SIZE, 1000),
                1000,
            ),
            maxAttempts: parsePositiveInt(env.FANOUT_S3_MAX_ATTEMPTS, 3),
            region: readRequiredString(env, 'FANOUT_S3_REGION'),
            retryBaseMs: parsePositiveInt(env.FANOUT_S3_RETRY_BASE_MS, 200),
        };
    }

    const key = readRawString(env.FANOUT_KEY);

    if (action === 'read_key' && !key) {
        throw new Error('FANOUT_KEY is required when FANOUT_ACTION=read_key');
    }

    return {
        action,
        bucket: readRequiredString(env, 'FANOUT_BUCKET'),
        delimiter: readRawString(env.FANOUT_DELIMITER),
        key,
        lazy: parseBoolean(env.FANOUT_LAZY, false, 'FANOUT_LAZY'),
        prefix: readRawString(env.FANOUT_PREFIX) ?? '',
        s3,
        storeMode,
        workers: parsePositiveInt(env.FANOUT_WORKERS, 4),
    };
}
