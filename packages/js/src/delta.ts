/**
 * Delta Graph Builder
 *
 * Collects the triples a row deletes and inserts. Both sides keep
 * insertion order and collapse duplicates by triple identity.
 */

import { toNTriplesLine } from './terms.js';
import { Triple } from './types.js';

export class DeltaGraph {
    private readonly deleted = new Map<string, Triple>();
    private readonly inserted = new Map<string, Triple>();

    delete(triple: Triple): this {
        this.deleted.set(toNTriplesLine(triple), triple);
        return this;
    }

    insert(triple: Triple): this {
        this.inserted.set(toNTriplesLine(triple), triple);
        return this;
    }

    get deletions(): Triple[] {
        return [...this.deleted.values()];
    }

    get insertions(): Triple[] {
        return [...this.inserted.values()];
    }

    get size(): { deletions: number; insertions: number } {
        return { deletions: this.deleted.size, insertions: this.inserted.size };
    }

    /**
     * Drop every triple that is both deleted and inserted. Returns the
     * number of triples removed from each side.
     */
    cancel(): number {
        let cancelled = 0;
        for (const key of [...this.deleted.keys()]) {
            if (this.inserted.has(key)) {
                this.deleted.delete(key);
                this.inserted.delete(key);
                cancelled += 1;
            }
        }
        return cancelled;
    }

    isEmpty(): boolean {
        return this.deleted.size === 0 && this.inserted.size === 0;
    }
}
