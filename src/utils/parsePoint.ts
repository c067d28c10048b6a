import { PLANNING_ERRORS, PlanningError } from '../errors';
import { Point } from '../types/types';

/**
 * Parses a `"x, y"` address label into a point.
 *
 * Labels come from hand-written package records, so anything other than two finite numbers separated by a comma is
 * rejected with {@link PLANNING_ERRORS.INVALID_INPUT}.
 */
export const parsePoint = (label: string): Point => {
    const parts = label.split(',').map(part => part.trim());

    if (parts.length !== 2 || parts.some(part => part === '')) {
        throw new PlanningError(PLANNING_ERRORS.INVALID_INPUT, `Malformed coordinate label: "${label}"`);
    }

    const [x, y] = parts.map(Number);

    if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new PlanningError(PLANNING_ERRORS.INVALID_INPUT, `Malformed coordinate label: "${label}"`);
    }

    return { x, y };
};

export const formatPoint = ({ x, y }: Point): string => `${x}, ${y}`;

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('parsePoint', () => {
        test('should parse integer and float coordinates', () => {
            expect(parsePoint('0, 0')).toEqual({ x: 0, y: 0 });
            expect(parsePoint('10,10')).toEqual({ x: 10, y: 10 });
            expect(parsePoint(' -2.5 , 7.25 ')).toEqual({ x: -2.5, y: 7.25 });
        });

        test('should reject labels that are not two numbers', () => {
            expect(() => parsePoint('Addr')).toThrowError('Malformed coordinate label: "Addr"');
            expect(() => parsePoint('1, 2, 3')).toThrowError(PlanningError);
            expect(() => parsePoint('1,')).toThrowError(PlanningError);
            expect(() => parsePoint('north, 5')).toThrowError(PlanningError);
        });

        test('should round-trip through formatPoint', () => {
            expect(formatPoint({ x: 101, y: -3 })).toBe('101, -3');
            expect(parsePoint(formatPoint({ x: 101, y: -3 }))).toEqual({ x: 101, y: -3 });
        });
    });
}
