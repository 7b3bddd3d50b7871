import type { ListingEngine } from './listing';
import type { WorkUnit } from './types';

export function createReadWorkUnit(
    bucket: string,
    key: string,
): WorkUnit {
    const unit: WorkUnit = {
        bucket,
        key,
        operation: 'readKey',
    };

    return Object.freeze(unit);
}

export class ReadTaskBuilder {
    constructor(private readonly listing: ListingEngine) {}

    async buildReadTasks(
        bucket: string,
        prefix = '',
    ): Promise<WorkUnit[]> {
        const summaries = await this.listing.listSummaries(bucket, prefix);

        return summaries.map((summary) => {
            return createReadWorkUnit(bucket.trim(), summary.key);
        });
    }
}
