/**
 * ParamBag — Consumable Multi-Map of Request Pairs
 *
 * The decoder's private working copy of the request. Keys may repeat and
 * arrive in any order; every read *takes* the entries it returns, so a
 * sibling subtree never sees keys already claimed by another one.
 *
 * @internal
 * @module
 */
import { type Pair } from '../params/ParamType.js';

interface Entry<V> {
    readonly key: string;
    readonly value: V;
    taken: boolean;
}

export class ParamBag<V> {
    private readonly _entries: Entry<V>[] = [];
    private readonly _index = new Map<string, number[]>();

    constructor(pairs: Iterable<Pair<V>> = []) {
        for (const [key, value] of pairs) {
            const positions = this._index.get(key);
            if (positions) positions.push(this._entries.length);
            else this._index.set(key, [this._entries.length]);
            this._entries.push({ key, value, taken: false });
        }
    }

    /** First untaken value of `key`, left in place. */
    peek(key: string): V | undefined {
        const entry = this.firstUntaken(key);
        return entry?.value;
    }

    /** First untaken value of `key`, removed from the bag. */
    take(key: string): V | undefined {
        const entry = this.firstUntaken(key);
        if (!entry) return undefined;
        entry.taken = true;
        return entry.value;
    }

    /** Every untaken value of `key`, in request order, removed from the bag. */
    takeAll(key: string): V[] {
        const values: V[] = [];
        for (const position of this._index.get(key) ?? []) {
            const entry = this._entries[position];
            if (entry && !entry.taken) {
                entry.taken = true;
                values.push(entry.value);
            }
        }
        return values;
    }

    /** Whether an untaken entry exists for `key`. */
    has(key: string): boolean {
        return this.firstUntaken(key) !== undefined;
    }

    /** Distinct untaken keys, in order of first appearance. */
    keys(): string[] {
        const seen = new Set<string>();
        for (const entry of this._entries) {
            if (!entry.taken) seen.add(entry.key);
        }
        return Array.from(seen);
    }

    /** Every untaken pair, in request order, removed from the bag. */
    takeRemaining(): Pair<V>[] {
        const rest: Pair<V>[] = [];
        for (const entry of this._entries) {
            if (!entry.taken) {
                entry.taken = true;
                rest.push([entry.key, entry.value]);
            }
        }
        return rest;
    }

    /** Number of untaken entries. */
    get size(): number {
        let count = 0;
        for (const entry of this._entries) {
            if (!entry.taken) count++;
        }
        return count;
    }

    private firstUntaken(key: string): Entry<V> | undefined {
        for (const position of this._index.get(key) ?? []) {
            const entry = this._entries[position];
            if (entry && !entry.taken) return entry;
        }
        return undefined;
    }
}

/**
 * Forward-only reader over the URL path segments that follow
 * the service's registered prefix.
 *
 * @internal
 */
export class SegmentCursor {
    private _position = 0;

    constructor(private readonly _segments: readonly string[] = []) {}

    /** Next segment, left in place. */
    peek(): string | undefined {
        return this._segments[this._position];
    }

    /** Next segment, consumed. */
    next(): string | undefined {
        const segment = this._segments[this._position];
        if (segment !== undefined) this._position++;
        return segment;
    }

    /** Every segment not yet consumed, consumed. */
    rest(): string[] {
        const remaining = this._segments.slice(this._position);
        this._position = this._segments.length;
        return remaining;
    }

    /** Segments not yet consumed, left in place. */
    remaining(): readonly string[] {
        return this._segments.slice(this._position);
    }
}
