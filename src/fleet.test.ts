import { describe, it, expect, vi } from 'vitest';

import { NearestNeighborStrategy } from './algorithms/strategies';
import { isPlanningError, PLANNING_ERRORS, PlanningErrorCode } from './errors';
import { FleetState } from './fleet';
import { problemJsonSchema } from './types/problem-json';
import { Driver, Package, Vehicle } from './types/types';

const makePackage = (id: string, x: number, y: number, weight: number = 1): Package => ({
    id,
    location: { x, y },
    weight,
    status: 'Created',
});

const makeVehicle = (id: string, capacity: number): Vehicle => ({
    id,
    capacity,
    currentLoad: 0,
    status: 'Available',
});

const makeDriver = (id: string): Driver => ({ id, name: `Driver ${id}` });

const makeFleet = () => {
    const fleet = new FleetState({ logger: { info: vi.fn(), warn: vi.fn() } });
    fleet.addVehicle(makeVehicle('V1', 10));
    fleet.addDriver(makeDriver('D1'));
    fleet.addDriver(makeDriver('D2'));
    return fleet;
};

const errorCodeOf = (action: () => unknown): PlanningErrorCode | undefined => {
    try {
        action();
    } catch (error) {
        return isPlanningError(error) ? error.code : undefined;
    }
    return undefined;
};

describe('FleetState', () => {
    it('should only accept well-formed, unique package ids', () => {
        const fleet = makeFleet();

        expect(fleet.addPackage(makePackage('PKG001', 0, 0))).toBe(true);
        expect(fleet.addPackage(makePackage('PKG001', 5, 5))).toBe(false);
        expect(fleet.addPackage(makePackage('pkg-002', 0, 0))).toBe(false);
        expect(fleet.addPackage(makePackage('AB1', 0, 0))).toBe(false);
        expect([...fleet.packages.keys()]).toEqual(['PKG001']);
    });

    it('should reject duplicate vehicles and drivers', () => {
        const fleet = makeFleet();

        expect(fleet.addVehicle(makeVehicle('V1', 99))).toBe(false);
        expect(fleet.addDriver(makeDriver('D2'))).toBe(false);
        expect(fleet.getVehicle('V1').capacity).toBe(10);
    });

    it('should signal lookups of unknown ids', () => {
        const fleet = makeFleet();

        expect(() => fleet.getPackage('PKG404')).toThrowError('Package PKG404 not found');
        expect(errorCodeOf(() => fleet.getPackage('PKG404'))).toBe(PLANNING_ERRORS.PACKAGE_NOT_FOUND);
        expect(errorCodeOf(() => fleet.getRoute('R9'))).toBe(PLANNING_ERRORS.ROUTE_NOT_FOUND);
        expect(errorCodeOf(() => fleet.getVehicle('V9'))).toBe(PLANNING_ERRORS.VEHICLE_NOT_FOUND);
        expect(errorCodeOf(() => fleet.getDriver('D9'))).toBe(PLANNING_ERRORS.DRIVER_NOT_FOUND);
        expect(errorCodeOf(() => fleet.optimizeRoute('R9'))).toBe(PLANNING_ERRORS.ROUTE_NOT_FOUND);
    });

    it('should move a scanned package in transit only from Created', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 0, 0));
        fleet.addPackage({ ...makePackage('PKG002', 0, 0), status: 'Delivered' });

        expect(fleet.scanPackage('PKG001').status).toBe('InTransit');
        expect(fleet.scanPackage('PKG002').status).toBe('Delivered');
    });

    it('should store proof of delivery with a status update', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 0, 0));

        const pkg = fleet.updatePackageStatus('PKG001', 'Delivered', 'signed by recipient');

        expect(pkg.status).toBe('Delivered');
        expect(pkg.proofOfDelivery).toBe('signed by recipient');
    });

    it('should build and optimize a route by hand', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 0, 0));
        fleet.addPackage(makePackage('PKG002', 10, 10));

        const route = fleet.createRoute('R1', ['PKG002', 'PKG001', 'UNKNOWN1']);

        expect(route.packageIds).toEqual(['PKG002', 'PKG001']);
        expect(route.optimized).toBe(false);
        expect(fleet.getPackage('PKG001').status).toBe('InTransit');

        fleet.optimizeRoute('R1');

        expect(fleet.getRoute('R1').orderedStops).toEqual([
            { x: 0, y: 0 },
            { x: 10, y: 10 },
        ]);
        expect(fleet.getRoute('R1').totalDistance).toBe(40);
        expect(fleet.getRoute('R1').optimized).toBe(true);
    });

    it('should not put a package on two routes or reuse a route id', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 0, 0));
        fleet.createRoute('R1', ['PKG001']);

        expect(fleet.createRoute('R2', ['PKG001']).packageIds).toEqual([]);
        expect(() => fleet.createRoute('R1', [])).toThrowError('Route R1 already exists');
        expect(errorCodeOf(() => fleet.createRoute('R1', []))).toBe(PLANNING_ERRORS.INVALID_INPUT);
    });

    it('should store strategy routes next to existing ones', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 0, 0));
        fleet.addPackage(makePackage('PKG002', 10, 10, 2));
        fleet.addPackage(makePackage('PKG003', 3, 0, 2));
        fleet.createRoute('R1', ['PKG001']);

        const { routes, issues } = fleet.computeRoutes(new NearestNeighborStrategy());

        expect(issues).toEqual([]);
        expect([...routes.keys()]).toEqual(['R2']);
        expect([...fleet.routes.keys()]).toEqual(['R1', 'R2']);
        expect(fleet.getRoute('R2')).toEqual({
            id: 'R2',
            vehicleId: 'V1',
            driverId: 'D1',
            orderedStops: [
                { x: 3, y: 0 },
                { x: 10, y: 10 },
            ],
            packageIds: ['PKG002', 'PKG003'],
            totalDistance: 40,
            optimized: true,
            status: 'Planned',
        });
        expect(fleet.getVehicle('V1').currentLoad).toBe(4);
    });

    it('should walk a route through its lifecycle and release the vehicle', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 2, 2));
        fleet.computeRoutes(new NearestNeighborStrategy());

        expect(() => fleet.startRoute('R1', 'D2')).toThrowError('Route R1 is assigned to driver D1');

        expect(fleet.startRoute('R1', 'D1').status).toBe('InProgress');
        expect(fleet.completeRoute('R1').status).toBe('Completed');

        expect(fleet.getVehicle('V1')).toEqual({ id: 'V1', capacity: 10, currentLoad: 0, status: 'Available' });
        expect(fleet.getDriver('D1').currentRouteId).toBeUndefined();
        expect(() => fleet.completeRoute('R1')).toThrowError('Route R1 is Completed, not InProgress');
        expect(() => fleet.startRoute('R1', 'D1')).toThrowError('Route R1 is Completed, not Planned');
    });

    it('should let any driver start a route without one', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG001', 2, 2));
        fleet.createRoute('R1', ['PKG001']);

        fleet.startRoute('R1', 'D2');

        expect(fleet.getRoute('R1').driverId).toBe('D2');
        expect(fleet.getDriver('D2').currentRouteId).toBe('R1');
        expect(fleet.routesForDriver('D2').map(({ id }) => id)).toEqual(['R1']);
    });

    it('should partition packages into vehicle-bound routes and report on them', () => {
        const fleet = makeFleet();
        fleet.addVehicle(makeVehicle('V2', 10));
        fleet.addPackage(makePackage('PKG-A1', 0, 0));
        fleet.addPackage(makePackage('PKG-B1', 1, 1));
        fleet.addPackage(makePackage('PKG-C1', 100, 100));
        fleet.addPackage(makePackage('PKG-D1', 101, 101));

        const { routeIds, issues } = fleet.autoCreateRoutes(2);

        expect(issues).toEqual([]);
        expect(routeIds).toEqual(['AR1_0', 'AR2_1']);
        expect(routeIds.map(id => [fleet.getRoute(id).vehicleId, fleet.getRoute(id).driverId])).toEqual([
            ['V1', 'D1'],
            ['V2', 'D2'],
        ]);
        expect(fleet.routesForDriver('D1').map(({ id }) => id)).toEqual(['AR1_0']);
        expect([...fleet.packages.values()].map(({ status }) => status)).toEqual([
            'InTransit',
            'InTransit',
            'InTransit',
            'InTransit',
        ]);

        fleet.updatePackageStatus('PKG-A1', 'Delivered');

        expect(fleet.report()).toEqual({
            totalPackages: 4,
            delivered: 1,
            pending: 3,
            successRate: 25,
            totalDistance: 408,
            activeVehicles: 2,
        });
    });

    it('should build from a problem document', () => {
        const problem = problemJsonSchema.parse({
            depot: { x: 1, y: 1 },
            packages: [
                { id: 'PKG001', location: '4, 5', weight: 2 },
                { id: 'bad', location: { x: 0, y: 0 }, weight: 1 },
            ],
            vehicles: [{ id: 'V1', capacity: 20 }],
            drivers: [{ id: 'D1', name: 'Driver D1' }],
            constraints: { maxWeightPerRoute: 50 },
        });

        const logger = { info: vi.fn(), warn: vi.fn() };
        const fleet = FleetState.fromProblem(problem, { logger });

        expect(fleet.depot).toEqual({ x: 1, y: 1 });
        expect(fleet.config.maxWeightPerRoute).toBe(50);
        expect([...fleet.packages.keys()]).toEqual(['PKG001']);
        expect(fleet.getPackage('PKG001').location).toEqual({ x: 4, y: 5 });
        expect(fleet.getVehicle('V1')).toEqual({ id: 'V1', capacity: 20, currentLoad: 0, status: 'Available' });
        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith('[Fleet] Skipping package bad: malformed or duplicate id.');
    });

    it('should warn about every record of a problem document it skips', () => {
        const problem = problemJsonSchema.parse({
            packages: [
                { id: 'P1', location: '1, 1', weight: 1 },
                { id: 'PKG001', location: '2, 2', weight: 1 },
                { id: 'PKG001', location: '3, 3', weight: 1 },
            ],
            vehicles: [
                { id: 'V1', capacity: 10 },
                { id: 'V1', capacity: 20 },
            ],
            drivers: [
                { id: 'D1', name: 'Driver D1' },
                { id: 'D1', name: 'Driver D1' },
            ],
        });
        const logger = { info: vi.fn(), warn: vi.fn() };

        const fleet = FleetState.fromProblem(problem, { logger });

        expect(fleet.packages.size).toBe(1);
        expect(logger.warn.mock.calls).toEqual([
            ['[Fleet] Skipping package P1: malformed or duplicate id.'],
            ['[Fleet] Skipping package PKG001: malformed or duplicate id.'],
            ['[Fleet] Skipping vehicle V1: duplicate id.'],
            ['[Fleet] Skipping driver D1: duplicate id.'],
        ]);
    });

    it('should place a package that failed before once a bigger vehicle joins', () => {
        const fleet = makeFleet();
        fleet.addPackage(makePackage('PKG-600', 5, 5, 20));

        fleet.computeRoutes(new NearestNeighborStrategy());

        expect(fleet.getPackage('PKG-600').status).toBe('Exception');
        expect(fleet.routes.size).toBe(0);

        fleet.addVehicle(makeVehicle('V2', 50));
        const { routes, issues } = fleet.computeRoutes(new NearestNeighborStrategy());

        expect(issues).toEqual([]);
        expect(routes.get('R1')?.vehicleId).toBe('V2');
        expect(fleet.getPackage('PKG-600')).toMatchObject({ status: 'InTransit', assignedRouteId: 'R1' });
    });
});
