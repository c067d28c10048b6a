import z from 'zod';

import { PLANNING_ERRORS, PlanningError } from './errors';
import { PlannerConfig } from './types/algorithm';
import { manhattanDistanceCalculator } from './utils/manhattanDistanceCalculator';

export const DEFAULT_PARTITION_ROUNDS = 10;
export const DEFAULT_MAX_WEIGHT_PER_ROUTE = 100;

export const DEFAULT_PLANNER_CONFIG: Readonly<PlannerConfig> = {
    distanceCalc: manhattanDistanceCalculator,
    partitionRounds: DEFAULT_PARTITION_ROUNDS,
    maxWeightPerRoute: DEFAULT_MAX_WEIGHT_PER_ROUTE,
    routeId: sequence => `R${sequence}`,
    logger: console,
};

const numericSettingsSchema = z.object({
    partitionRounds: z.number().int().min(1),
    maxWeightPerRoute: z.number().positive(),
});

/** Merges overrides over the defaults and validates the numeric settings */
export const resolvePlannerConfig = (overrides: Partial<PlannerConfig> = {}): PlannerConfig => {
    const config: PlannerConfig = { ...DEFAULT_PLANNER_CONFIG, ...overrides };

    const parsed = numericSettingsSchema.safeParse(config);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new PlanningError(PLANNING_ERRORS.INVALID_INPUT, `Invalid planner config: ${details}`);
    }

    return config;
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should fall back to defaults', () => {
        const config = resolvePlannerConfig();

        expect(config.partitionRounds).toBe(10);
        expect(config.maxWeightPerRoute).toBe(100);
        expect(config.routeId(3)).toBe('R3');
        expect(config.distanceCalc({ x: 0, y: 0 }, { x: 2, y: 3 })).toBe(5);
    });

    test('should keep overrides', () => {
        const config = resolvePlannerConfig({ partitionRounds: 4, routeId: n => `T-${n}` });

        expect(config.partitionRounds).toBe(4);
        expect(config.routeId(1)).toBe('T-1');
        expect(config.maxWeightPerRoute).toBe(100);
    });

    test('should reject invalid numeric settings', () => {
        expect(() => resolvePlannerConfig({ partitionRounds: 0 })).toThrowError(PlanningError);
        expect(() => resolvePlannerConfig({ maxWeightPerRoute: -5 })).toThrowError(
            /^Invalid planner config: maxWeightPerRoute: /,
        );
    });
}
