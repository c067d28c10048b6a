/**
 * Entry points of the route planning engine.
 *
 * Every call is synchronous and works on the objects it is given: packages, vehicles and drivers are updated in
 * place (route binding, load, `Exception` status) and new routes are returned. Callers that share one fleet between
 * several workers must run planning calls one at a time.
 */

import { assignPackages } from './algorithms/assignment';
import { materializeClusters, partitionPackages } from './algorithms/cluster';
import { ORIGIN, sequenceRoute } from './algorithms/tour';
import { resolvePlannerConfig } from './config';
import { isPlanningError, PLANNING_ERRORS, PlanningIssue } from './errors';
import { PartitionResult, PlannerConfig, PlanResult, StrategyInput } from './types/algorithm';
import { Driver, Package, Point, Route, Vehicle } from './types/types';

export { summarize } from './analytics';

export interface AutoPartitionInput {
    packages: ReadonlyArray<Package>;
    k: number;
    maxWeightPerRoute?: number; // defaults to the configured maxWeightPerRoute
    depot?: Point;
    routes: Map<string, Route>; // receives the materialized routes
    vehicles?: ReadonlyArray<Vehicle>;
    drivers?: ReadonlyArray<Driver>;
}

/** Runs `run`, turning a PlanningError into a result-level issue */
const recoverPlanningError = <T extends { issues: PlanningIssue[] }>(run: () => T, empty: () => T): T => {
    try {
        return run();
    } catch (error) {
        if (!isPlanningError(error)) {
            throw error;
        }

        const result = empty();
        result.issues.push(error.toIssue());
        return result;
    }
};

/** Wraps a route id generator so that it skips ids already taken */
const skipTakenIds = (routeId: PlannerConfig['routeId'], taken: ReadonlyMap<string, Route>) => {
    let skipped = 0;

    return (sequence: number): string => {
        let id = routeId(sequence + skipped);
        while (taken.has(id)) {
            ++skipped;
            id = routeId(sequence + skipped);
        }
        return id;
    };
};

/** Assigns every unassigned package to a vehicle and sequences each resulting route */
export const planRoutes = (
    { packages, vehicles, drivers, depot = ORIGIN, existingRoutes }: StrategyInput,
    overrides: Partial<PlannerConfig> = {},
): PlanResult =>
    recoverPlanningError(
        () => {
            const config = resolvePlannerConfig(overrides);
            const routeId = existingRoutes ? skipTakenIds(config.routeId, existingRoutes) : config.routeId;
            const result = assignPackages(packages, vehicles, drivers, { routeId, logger: config.logger });

            for (const route of result.routes.values()) {
                sequenceRoute(route, depot, config.distanceCalc);
            }

            config.logger.info(`[Planner] Generated ${result.routes.size} optimized route(s).`);
            return result;
        },
        () => ({ routes: new Map<string, Route>(), issues: [] }),
    );

/** Clusters the unassigned packages into at most `k` routes and stores them in `input.routes` */
export const autoPartitionRoutes = (
    { packages, k, maxWeightPerRoute, depot = ORIGIN, routes, vehicles = [], drivers = [] }: AutoPartitionInput,
    overrides: Partial<PlannerConfig> = {},
): PartitionResult =>
    recoverPlanningError(
        () => {
            const config = resolvePlannerConfig(overrides);

            if (k < 1) {
                return {
                    routeIds: [],
                    issues: [
                        { code: PLANNING_ERRORS.INVALID_INPUT, message: `Route count must be at least 1, got ${k}` },
                    ],
                };
            }

            const pool = packages.filter(pkg => pkg.assignedRouteId === undefined);
            const outcome = partitionPackages(pool, k, maxWeightPerRoute ?? config.maxWeightPerRoute, config);
            const result = materializeClusters(outcome, { routes, vehicles, drivers, depot }, config);

            config.logger.info(`[Planner] Generated ${result.routeIds.length} partitioned route(s).`);
            return result;
        },
        () => ({ routeIds: [], issues: [] }),
    );
