/**
 * Exact L2 nearest-neighbor index (brute force)
 *
 * Holds every vector in one Float32Array, row-major, in insertion order.
 * Every search scans all vectors; no quantization.
 */
import { DimensionMismatchError } from "../../../shared/lib/errors.js";
import type { IndexHit } from "../../../shared/models/SearchResult.js";

export class VectorIndex {
    private readonly data: Float32Array;

    private constructor(data: Float32Array, readonly dimension: number, readonly vectorCount: number) {
        this.data = data;
    }

    /**
     * Copies `vectors` into a new index. Every vector must have `dimension`
     * components.
     */
    static fromVectors(vectors: ReadonlyArray<ArrayLike<number>>, dimension: number): VectorIndex {
        if (!Number.isInteger(dimension) || dimension < 1) {
            throw new RangeError(`Invalid index dimension: ${dimension}`);
        }

        const data = new Float32Array(vectors.length * dimension);
        vectors.forEach((vector, position) => {
            if (vector.length !== dimension) {
                throw new DimensionMismatchError(dimension, vector.length, `Vector at position ${position}`);
            }
            data.set(Array.from(vector), position * dimension);
        });

        assertFinite(data, dimension);
        return new VectorIndex(data, dimension, vectors.length);
    }

    /**
     * Wraps a copy of an already flattened row-major buffer.
     */
    static fromFlat(data: Float32Array, dimension: number, vectorCount: number): VectorIndex {
        if (!Number.isInteger(dimension) || dimension < 1) {
            throw new RangeError(`Invalid index dimension: ${dimension}`);
        }
        if (data.length !== dimension * vectorCount) {
            throw new RangeError(
                `Flat buffer holds ${data.length} values, expected ${vectorCount} x ${dimension}`
            );
        }
        const copy = Float32Array.from(data);
        assertFinite(copy, dimension);
        return new VectorIndex(copy, dimension, vectorCount);
    }

    /** Copy of the underlying row-major data, for serialization. */
    toFlat(): Float32Array {
        return Float32Array.from(this.data);
    }

    /**
     * The `k` closest vectors to `query`, ascending by Euclidean distance.
     * Equal distances keep insertion order.
     */
    search(query: ArrayLike<number>, k: number): IndexHit[] {
        if (query.length !== this.dimension) {
            throw new DimensionMismatchError(this.dimension, query.length, "Query vector");
        }
        if (!Number.isInteger(k) || k < 1) {
            throw new RangeError(`k must be a positive integer, got ${k}`);
        }

        const limit = Math.min(k, this.vectorCount);
        const q = Float64Array.from(query);
        const hits: IndexHit[] = [];

        for (let position = 0; position < this.vectorCount; position++) {
            const offset = position * this.dimension;
            let sum = 0;
            for (let d = 0; d < this.dimension; d++) {
                const diff = (q[d] ?? 0) - (this.data[offset + d] ?? 0);
                sum += diff * diff;
            }

            const last = hits[hits.length - 1];
            if (hits.length === limit && last !== undefined && sum >= last.distance) {
                continue;
            }
            insertSorted(hits, { position, distance: sum });
            if (hits.length > limit) {
                hits.pop();
            }
        }

        return hits.map((hit) => ({ position: hit.position, distance: Math.sqrt(hit.distance) }));
    }
}

/** Index of the first NaN or infinite component, or -1. */
export function firstNonFinite(data: Float32Array): number {
    return data.findIndex((value) => !Number.isFinite(value));
}

function assertFinite(data: Float32Array, dimension: number): void {
    const at = firstNonFinite(data);
    if (at !== -1) {
        throw new RangeError(`Vector at position ${Math.floor(at / dimension)} has a non-finite component`);
    }
}

/**
 * Inserts after every hit with a distance <= the new one, so earlier
 * positions win ties.
 */
function insertSorted(hits: IndexHit[], hit: IndexHit): void {
    let low = 0;
    let high = hits.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        const current = hits[mid];
        if (current !== undefined && current.distance <= hit.distance) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    hits.splice(low, 0, hit);
}
