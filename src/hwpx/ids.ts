/**
 * Structural ID generation for tables, sub-lists, pictures, fields and
 * binary items.
 *
 * Each document owns one generator and there is no shared
 * instance. Seeded generators replay the same sequence, unseeded ones
 * draw from the OS CSPRNG.
 *
 * @module hwpx/ids
 */

import { createHash, randomInt } from 'crypto';

export const STRUCTURAL_ID_MIN = 100_000_000;
export const STRUCTURAL_ID_MAX = 999_999_999;

const ID_SPAN = STRUCTURAL_ID_MAX - STRUCTURAL_ID_MIN + 1;

export class IdGenerator {
    private readonly issued = new Set<number>();
    private readonly nameCounters = new Map<string, number>();
    private draws = 0;

    constructor(readonly seed?: number) {}

    get deterministic(): boolean {
        return this.seed !== undefined;
    }

    /** Number of IDs issued so far. */
    get size(): number {
        return this.issued.size;
    }

    /** Next integer ID in [STRUCTURAL_ID_MIN, STRUCTURAL_ID_MAX], never repeated by this instance. */
    next(): number {
        let candidate = this.draw();
        while (this.issued.has(candidate)) {
            candidate = this.draw();
        }
        this.issued.add(candidate);
        return candidate;
    }

    /** Sequential name per prefix: `image1`, `image2`, ... */
    nextName(prefix: string): string {
        const n = (this.nameCounters.get(prefix) ?? 0) + 1;
        this.nameCounters.set(prefix, n);
        return `${prefix}${n}`;
    }

    private draw(): number {
        const k = this.draws++;
        if (this.seed === undefined) {
            return randomInt(STRUCTURAL_ID_MIN, STRUCTURAL_ID_MAX + 1);
        }
        const digest = createHash('sha256').update(`${this.seed}:${k}`).digest();
        return STRUCTURAL_ID_MIN + (digest.readUInt32BE(0) % ID_SPAN);
    }
}
