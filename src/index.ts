import { createRuntime, runAction } from './runtime';

async function main(): Promise<void> {
    const runtime = createRuntime(process.env);
    const { config } = runtime;

    console.log('bucket-fanout run started', {
        action: config.action,
        bucket: config.bucket,
        delimiter: config.delimiter ?? null,
        lazy: config.lazy,
        prefix: config.prefix,
        store: runtime.store,
        workers: config.workers,
    });

    const summary = await runAction(runtime);

    if (summary.action === 'list') {
        console.log('bucket-fanout listing', {
            entries: summary.entries.map((entry) => {
                return entry.kind === 'group'
                    ? { group: true, key: entry.key }
                    : { key: entry.key, size: entry.size };
            }),
        });
    }

    if (summary.action === 'read_bytes' && summary.rejected > 0) {
        console.error('bucket-fanout read batch partially failed', {
            failed_keys: summary.failedKeys,
            rejected: summary.rejected,
        });
        process.exitCode = 1;
    }

    console.log('bucket-fanout run stopped', {
        summary: summary.action === 'list'
            ? { action: 'list', entries: summary.entries.length }
            : summary,
    });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('bucket-fanout failed', error);
        process.exitCode = 1;
    });
}
