/**
 * @module assignment-engine
 * @description
 * Greedy package→vehicle assignment.
 *
 * Algorithm:
 * 1. Walks the unassigned packages in insertion order.
 * 2. For each package, scans the available vehicles starting from a rotating cursor and takes the first one with
 *    enough residual capacity.
 * 3. The first package a vehicle takes opens a route for it, bound to the next driver in round-robin order.
 * 4. A package no vehicle can carry is marked `Exception`; the batch goes on.
 *
 * The vehicle cursor moves one past the vehicle where the scan ended after every package, so consecutive packages
 * are spread across the fleet.
 *
 * Complexity:
 * O(P * V) for P packages and V vehicles.
 */

import { PLANNING_ERRORS, PlanningIssue } from '../../errors';
import { PlannerConfig, PlanResult } from '../../types/algorithm';
import { Driver, Package, Route, Vehicle } from '../../types/types';
import { addPackageToRoute, createRoute } from '../../utils/route-utils';
import { canAccept, commit } from '../capacity-ledger';

/** Round-robin state of one assignment run */
export interface AssignmentCursor {
    vehicle: number;
    driver: number;
    routeSequence: number;
}

/** Index of the first vehicle from `start` (wrapping) that can take `weight`, or -1 */
export const findVehicleIndex = (vehicles: ReadonlyArray<Vehicle>, weight: number, start: number): number => {
    for (let offset = 0; offset < vehicles.length; ++offset) {
        const index = (start + offset) % vehicles.length;
        if (canAccept(vehicles[index], weight)) {
            return index;
        }
    }

    return -1;
};

export const assignPackages = (
    packages: ReadonlyArray<Package>,
    vehicles: ReadonlyArray<Vehicle>,
    drivers: ReadonlyArray<Driver>,
    { routeId, logger }: Pick<PlannerConfig, 'routeId' | 'logger'>,
): PlanResult => {
    const routes = new Map<string, Route>();
    const issues: PlanningIssue[] = [];

    const availableVehicles = vehicles.filter(vehicle => vehicle.status === 'Available');

    if (availableVehicles.length === 0 || drivers.length === 0) {
        const message = availableVehicles.length === 0 ? 'No vehicles available' : 'No drivers available';
        logger.warn(`[Assignment] ${message}; no routes generated.`);
        issues.push({ code: PLANNING_ERRORS.INVALID_INPUT, message });
        return { routes, issues };
    }

    const cursor: AssignmentCursor = { vehicle: 0, driver: 0, routeSequence: 1 };
    const routeByVehicle = new Map<string, Route>();

    for (const pkg of packages) {
        if (pkg.assignedRouteId !== undefined) {
            continue;
        }

        const vehicleIndex = findVehicleIndex(availableVehicles, pkg.weight, cursor.vehicle);

        if (vehicleIndex === -1) {
            pkg.status = 'Exception';
            issues.push({
                code: PLANNING_ERRORS.CAPACITY_EXCEEDED,
                message: `No vehicle can carry package ${pkg.id} (weight ${pkg.weight})`,
                packageId: pkg.id,
            });
            logger.warn(`[Assignment] Capacity exceeded for package ${pkg.id}; marking Exception.`);

            cursor.vehicle = (cursor.vehicle + 1) % availableVehicles.length;
            continue;
        }

        const vehicle = availableVehicles[vehicleIndex];
        let route = routeByVehicle.get(vehicle.id);

        if (route === undefined) {
            const driver = drivers[cursor.driver];

            route = createRoute(routeId(cursor.routeSequence), vehicle.id, driver.id);
            driver.currentRouteId = route.id;

            routes.set(route.id, route);
            routeByVehicle.set(vehicle.id, route);

            ++cursor.routeSequence;
            cursor.driver = (cursor.driver + 1) % drivers.length;
        }

        commit(vehicle, pkg.weight, route.id);
        addPackageToRoute(route, pkg);

        cursor.vehicle = (vehicleIndex + 1) % availableVehicles.length;
    }

    return { routes, issues };
};
