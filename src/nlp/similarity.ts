/**
 * Dot product of two equal-length dense vectors.
 * Extra trailing components of the longer vector are ignored.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
    const n = Math.min(a.length, b.length);
    let sum = 0;
    for (let i = 0; i < n; i++) {
        sum += (a[i] ?? 0) * (b[i] ?? 0);
    }
    return sum;
}

/**
 * Euclidean length.
 */
export function norm(v: readonly number[]): number {
    return Math.sqrt(dot(v, v));
}

/**
 * Scale a vector to unit length. The zero vector is returned unchanged
 * (as a copy) since it has no direction.
 */
export function normalizeVector(v: readonly number[]): number[] {
    const length = norm(v);
    if (length === 0) return [...v];
    return v.map((x) => x / length);
}
