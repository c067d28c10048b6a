import { DistanceCalculator } from '../types/algorithm';

/** Straight-line distance, for callers that plan without a street grid */
export const euclideanDistanceCalculator: DistanceCalculator = (from, to) => Math.hypot(to.x - from.x, to.y - from.y);

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should measure the straight line between two points', () => {
        expect(euclideanDistanceCalculator({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
        expect(euclideanDistanceCalculator({ x: -1, y: -1 }, { x: -1, y: -1 })).toBe(0);
        expect(euclideanDistanceCalculator({ x: 10, y: 1 }, { x: 4, y: -7 })).toBe(10);
    });
}
