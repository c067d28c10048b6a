import { PLANNING_ERRORS, PlanningIssue } from '../../errors';
import { PartitionResult, PlannerConfig } from '../../types/algorithm';
import { Driver, Point, Route, Vehicle } from '../../types/types';
import { addPackageToRoute, createRoute } from '../../utils/route-utils';
import { findVehicleIndex } from '../assignment';
import { commit } from '../capacity-ledger';
import { sequenceRoute } from '../tour';
import { PartitionOutcome } from './partition';

export { partitionPackages } from './partition';
export type { Cluster, PartitionOutcome } from './partition';

export interface MaterializeContext {
    routes: Map<string, Route>;
    vehicles: ReadonlyArray<Vehicle>;
    drivers: ReadonlyArray<Driver>;
    depot: Point;
}

const nextAutoRouteId = (routes: ReadonlyMap<string, Route>, clusterIndex: number): string => {
    let sequence = routes.size + 1;
    while (routes.has(`AR${sequence}_${clusterIndex}`)) {
        ++sequence;
    }

    return `AR${sequence}_${clusterIndex}`;
};

/**
 * Turns every non-empty cluster into a sequenced route stored in `context.routes`.
 *
 * Clusters are bound round-robin to available vehicles that can carry their whole weight, one cluster per vehicle.
 * A cluster no vehicle can carry still becomes a route, without a vehicle. Packages left unplaced by the partition
 * are marked `Exception`.
 */
export const materializeClusters = (
    { clusters, unplaced }: PartitionOutcome,
    { routes, vehicles, drivers, depot }: MaterializeContext,
    { distanceCalc, logger }: Pick<PlannerConfig, 'distanceCalc' | 'logger'>,
): PartitionResult => {
    const routeIds: string[] = [];
    const issues: PlanningIssue[] = [];

    const freeVehicles = vehicles.filter(vehicle => vehicle.status === 'Available');
    let vehicleCursor = 0;
    let driverCursor = 0;

    clusters.forEach((cluster, index) => {
        if (cluster.members.length === 0) {
            return;
        }

        const routeId = nextAutoRouteId(routes, index);
        const vehicleIndex = findVehicleIndex(freeVehicles, cluster.accumulatedWeight, vehicleCursor);

        let route: Route;

        if (vehicleIndex === -1) {
            route = createRoute(routeId);

            if (vehicles.length > 0) {
                logger.warn(
                    `[Partition] No vehicle can carry cluster ${index} (weight ${cluster.accumulatedWeight}); ` +
                        `${routeId} left unbound.`,
                );
            }
        } else {
            const [vehicle] = freeVehicles.splice(vehicleIndex, 1);
            vehicleCursor = freeVehicles.length > 0 ? vehicleIndex % freeVehicles.length : 0;

            const driver = drivers.length > 0 ? drivers[driverCursor] : undefined;
            if (driver !== undefined) {
                driver.currentRouteId = routeId;
                driverCursor = (driverCursor + 1) % drivers.length;
            }

            route = createRoute(routeId, vehicle.id, driver?.id);
            commit(vehicle, cluster.accumulatedWeight, routeId);
        }

        for (const pkg of cluster.members) {
            addPackageToRoute(route, pkg);
        }

        sequenceRoute(route, depot, distanceCalc);
        routes.set(route.id, route);
        routeIds.push(route.id);
    });

    for (const pkg of unplaced) {
        pkg.status = 'Exception';
        issues.push({
            code: PLANNING_ERRORS.CAPACITY_EXCEEDED,
            message: `Package ${pkg.id} (weight ${pkg.weight}) fits in no cluster`,
            packageId: pkg.id,
        });
        logger.warn(`[Partition] Package ${pkg.id} fits in no cluster; marking Exception.`);
    }

    return { routeIds, issues };
};
