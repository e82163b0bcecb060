import { getLogger } from '../utils/logger.js';
import { BiblioRagError } from '../utils/errors.js';
import type { DatasetGeneration } from './generations.js';

const logger = getLogger();

/**
 * A read handle on one generation. Queries hold a lease for their whole
 * run, so a swap never closes stores under an in-flight query.
 */
export interface DatasetLease {
    readonly dataset: DatasetGeneration;
    release(): void;
}

interface Entry {
    dataset: DatasetGeneration;
    leases: number;
    retired: boolean;
}

/**
 * Process-wide pointer to the current dataset generation.
 *
 * `publish()` replaces the pointer; it never mutates a generation. The
 * previous generation is closed once its last lease is released.
 */
export class DatasetRegistry {
    private current: Entry | null = null;
    private readonly retiring = new Set<Entry>();

    /**
     * Make `dataset` the generation new queries run against.
     */
    publish(dataset: DatasetGeneration): void {
        const previous = this.current;
        this.current = { dataset, leases: 0, retired: false };

        if (previous) {
            previous.retired = true;
            if (previous.leases === 0) {
                previous.dataset.close();
            } else {
                this.retiring.add(previous);
            }
        }

        logger.info(
            { generation: dataset.generation, previous: previous?.dataset.generation ?? null },
            'Dataset generation published'
        );
    }

    /**
     * Lease the current generation.
     *
     * @throws BiblioRagError (DATASET_NOT_FOUND) when nothing is published
     */
    acquire(): DatasetLease {
        const entry = this.current;
        if (!entry) throw new BiblioRagError('DATASET_NOT_FOUND', 'No dataset generation is published');

        entry.leases++;
        let released = false;
        return {
            dataset: entry.dataset,
            release: () => {
                if (released) return;
                released = true;
                entry.leases--;
                if (entry.retired && entry.leases === 0) {
                    entry.dataset.close();
                    this.retiring.delete(entry);
                    logger.debug({ generation: entry.dataset.generation }, 'Retired generation closed');
                }
            },
        };
    }

    /**
     * Generation number new queries would use, or null.
     */
    currentGeneration(): number | null {
        return this.current?.dataset.generation ?? null;
    }

    /**
     * Number of retired generations still held open by leases.
     */
    retiringCount(): number {
        return this.retiring.size;
    }

    /**
     * Close the current generation. Outstanding leases on it keep working
     * until released.
     */
    close(): void {
        const entry = this.current;
        this.current = null;
        if (!entry) return;
        entry.retired = true;
        if (entry.leases === 0) entry.dataset.close();
        else this.retiring.add(entry);
    }
}
