/**
 * @module capacity-ledger
 * @description
 * Tracks vehicle load against capacity.
 *
 * `commit` is a read-then-write on `currentLoad`; planning runs over the same vehicles must not interleave.
 */

import { PLANNING_ERRORS, PlanningError } from '../errors';
import { Vehicle } from '../types/types';

export const canAccept = (vehicle: Pick<Vehicle, 'capacity' | 'currentLoad'>, weight: number): boolean =>
    vehicle.currentLoad + weight <= vehicle.capacity;

/**
 * Adds `weight` to the vehicle's load. The first commit for a route puts the vehicle in use and binds the route.
 * Leaves the vehicle untouched when the weight does not fit.
 */
export const commit = (vehicle: Vehicle, weight: number, routeId: string): void => {
    if (!canAccept(vehicle, weight)) {
        throw new PlanningError(
            PLANNING_ERRORS.CAPACITY_EXCEEDED,
            `Vehicle ${vehicle.id} cannot accept ${weight} (load ${vehicle.currentLoad}/${vehicle.capacity})`,
        );
    }

    vehicle.currentLoad += weight;

    if (vehicle.currentRouteId !== routeId) {
        vehicle.currentRouteId = routeId;
        vehicle.status = 'InUse';
    }
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    const makeVehicle = (capacity: number, currentLoad: number = 0): Vehicle => ({
        id: 'V1',
        capacity,
        currentLoad,
        status: 'Available',
    });

    describe('canAccept', () => {
        test('should accept weight up to the exact capacity', () => {
            expect(canAccept(makeVehicle(500), 500)).toBe(true);
            expect(canAccept(makeVehicle(500, 499.5), 0.5)).toBe(true);
        });

        test('should refuse weight over capacity', () => {
            expect(canAccept(makeVehicle(500), 600)).toBe(false);
            expect(canAccept(makeVehicle(10, 9), 2)).toBe(false);
        });
    });

    describe('commit', () => {
        test('should bind the route and put the vehicle in use on first commit', () => {
            const vehicle = makeVehicle(10);

            commit(vehicle, 4, 'R1');
            commit(vehicle, 3, 'R1');

            expect(vehicle).toEqual({ id: 'V1', capacity: 10, currentLoad: 7, status: 'InUse', currentRouteId: 'R1' });
        });

        test('should leave the vehicle unchanged when the weight does not fit', () => {
            const vehicle = makeVehicle(10, 8);

            expect(() => commit(vehicle, 5, 'R1')).toThrowError('Vehicle V1 cannot accept 5 (load 8/10)');
            expect(vehicle).toEqual({ id: 'V1', capacity: 10, currentLoad: 8, status: 'Available' });
        });
    });
}
