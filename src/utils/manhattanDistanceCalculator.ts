import { DistanceCalculator } from '../types/algorithm';

/** Grid distance between two points. Default metric of the planner. */
export const manhattanDistanceCalculator: DistanceCalculator = (from, to) => {
    return Math.abs(from.x - to.x) + Math.abs(from.y - to.y);
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should sum the axis offsets', () => {
        expect(manhattanDistanceCalculator({ x: 0, y: 0 }, { x: 10, y: 10 })).toBe(20);
        expect(manhattanDistanceCalculator({ x: 3, y: -2 }, { x: -1, y: 4 })).toBe(10);
    });

    test('should be symmetric', () => {
        const a = { x: 1.5, y: 7 };
        const b = { x: -4, y: 2.25 };

        expect(manhattanDistanceCalculator(a, b)).toBe(manhattanDistanceCalculator(b, a));
    });
}
