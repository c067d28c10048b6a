import { Package, Point, Route } from '../types/types';

export const pointsEqual = (a: Point, b: Point): boolean => a.x === b.x && a.y === b.y;

export const createRoute = (id: string, vehicleId?: string, driverId?: string): Route => {
    const route: Route = {
        id,
        orderedStops: [],
        packageIds: [],
        totalDistance: 0,
        optimized: false,
        status: 'Planned',
    };

    if (vehicleId !== undefined) {
        route.vehicleId = vehicleId;
    }
    if (driverId !== undefined) {
        route.driverId = driverId;
    }

    return route;
};

/**
 * Registers the package on the route and records its stop unless an equal point is already there. A package that is
 * still `Created` or was an `Exception` goes in transit.
 */
export const addPackageToRoute = (route: Route, pkg: Package): void => {
    if (!route.packageIds.includes(pkg.id)) {
        route.packageIds.push(pkg.id);
    }

    if (!route.orderedStops.some(stop => pointsEqual(stop, pkg.location))) {
        route.orderedStops.push({ x: pkg.location.x, y: pkg.location.y });
    }

    pkg.assignedRouteId = route.id;

    if (pkg.status === 'Created' || pkg.status === 'Exception') {
        pkg.status = 'InTransit';
    }
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    const makePackage = (id: string, x: number, y: number): Package => ({
        id,
        location: { x, y },
        weight: 1,
        status: 'Created',
    });

    test('should create an empty planned route', () => {
        expect(createRoute('R1', 'V1')).toEqual({
            id: 'R1',
            vehicleId: 'V1',
            orderedStops: [],
            packageIds: [],
            totalDistance: 0,
            optimized: false,
            status: 'Planned',
        });
    });

    test('should share one stop between packages at the same point', () => {
        const route = createRoute('R1');
        const first = makePackage('PKG-001', 5, 5);
        const second = makePackage('PKG-002', 5, 5);

        addPackageToRoute(route, first);
        addPackageToRoute(route, second);
        addPackageToRoute(route, first);

        expect(route.packageIds).toEqual(['PKG-001', 'PKG-002']);
        expect(route.orderedStops).toEqual([{ x: 5, y: 5 }]);
        expect(second.assignedRouteId).toBe('R1');
        expect(second.status).toBe('InTransit');
    });

    test('should take a package out of Exception but leave later statuses alone', () => {
        const route = createRoute('R1');
        const failed: Package = { ...makePackage('PKG-001', 1, 1), status: 'Exception' };
        const delivered: Package = { ...makePackage('PKG-002', 2, 2), status: 'Delivered' };

        addPackageToRoute(route, failed);
        addPackageToRoute(route, delivered);

        expect(failed.status).toBe('InTransit');
        expect(delivered.status).toBe('Delivered');
    });
}
