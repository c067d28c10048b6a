import { autoPartitionRoutes, planRoutes } from '../planner';
import { PlannerConfig, PlanResult, RouteStrategy, StrategyInput } from '../types/algorithm';
import { Route } from '../types/types';

/** Greedy round-robin assignment followed by a nearest-neighbor tour per vehicle */
export class NearestNeighborStrategy implements RouteStrategy {
    readonly name = 'nearest-neighbor';

    computeRoutes(input: StrategyInput, config: Partial<PlannerConfig> = {}): PlanResult {
        return planRoutes(input, config);
    }
}

/**
 * Cluster-first planning: packages are partitioned by location into one cluster per available vehicle (or a fixed
 * `routeCount`), then each cluster is bound to a vehicle and sequenced.
 */
export class ClusterStrategy implements RouteStrategy {
    readonly name = 'cluster';

    constructor(private readonly routeCount?: number) {}

    computeRoutes(
        { packages, vehicles, drivers, depot, existingRoutes }: StrategyInput,
        config: Partial<PlannerConfig> = {},
    ): PlanResult {
        const store = new Map<string, Route>(existingRoutes ?? []);
        const k = this.routeCount ?? vehicles.filter(vehicle => vehicle.status === 'Available').length;

        const { routeIds, issues } = autoPartitionRoutes(
            { packages, k, depot, routes: store, vehicles, drivers },
            config,
        );

        const routes = new Map<string, Route>();
        for (const id of routeIds) {
            const route = store.get(id);
            if (route !== undefined) {
                routes.set(id, route);
            }
        }

        return { routes, issues };
    }
}
