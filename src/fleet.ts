import { ORIGIN, sequenceRoute } from './algorithms/tour';
import { summarize } from './analytics';
import { resolvePlannerConfig } from './config';
import { PLANNING_ERRORS, PlanningError } from './errors';
import { autoPartitionRoutes } from './planner';
import {
    AnalyticsReport,
    PartitionResult,
    PlannerConfig,
    PlanResult,
    RouteStrategy,
    StrategyInput,
} from './types/algorithm';
import { Problem } from './types/problem-json';
import { Driver, Package, PackageStatus, Point, Route, Vehicle } from './types/types';
import { addPackageToRoute, createRoute } from './utils/route-utils';

export const PACKAGE_ID_PATTERN = /^[A-Z0-9-]{6,20}$/;

/**
 * Canonical package, vehicle, driver and route maps of one depot, and the actions the surrounding application runs
 * against them. Planning calls delegate to the planner; lookups of unknown ids throw {@link PlanningError}.
 */
export class FleetState {
    readonly packages = new Map<string, Package>();
    readonly vehicles = new Map<string, Vehicle>();
    readonly drivers = new Map<string, Driver>();
    readonly routes = new Map<string, Route>();

    readonly config: PlannerConfig;

    constructor(
        overrides: Partial<PlannerConfig> = {},
        readonly depot: Point = ORIGIN,
    ) {
        this.config = resolvePlannerConfig(overrides);
    }

    static fromProblem(problem: Problem, overrides: Partial<PlannerConfig> = {}): FleetState {
        const maxWeightPerRoute = problem.constraints?.maxWeightPerRoute;
        const fleet = new FleetState(
            maxWeightPerRoute === undefined ? overrides : { maxWeightPerRoute, ...overrides },
            problem.depot,
        );

        const { logger } = fleet.config;

        for (const pkg of problem.packages) {
            if (!fleet.addPackage(pkg)) {
                logger.warn(`[Fleet] Skipping package ${pkg.id}: malformed or duplicate id.`);
            }
        }
        for (const vehicle of problem.vehicles) {
            if (!fleet.addVehicle(vehicle)) {
                logger.warn(`[Fleet] Skipping vehicle ${vehicle.id}: duplicate id.`);
            }
        }
        for (const driver of problem.drivers) {
            if (!fleet.addDriver(driver)) {
                logger.warn(`[Fleet] Skipping driver ${driver.id}: duplicate id.`);
            }
        }

        return fleet;
    }

    /** Rejects malformed and duplicate ids */
    addPackage(pkg: Package): boolean {
        if (!PACKAGE_ID_PATTERN.test(pkg.id) || this.packages.has(pkg.id)) {
            return false;
        }
        this.packages.set(pkg.id, pkg);
        return true;
    }

    addVehicle(vehicle: Vehicle): boolean {
        if (this.vehicles.has(vehicle.id)) {
            return false;
        }
        this.vehicles.set(vehicle.id, vehicle);
        return true;
    }

    addDriver(driver: Driver): boolean {
        if (this.drivers.has(driver.id)) {
            return false;
        }
        this.drivers.set(driver.id, driver);
        return true;
    }

    getPackage(id: string): Package {
        const pkg = this.packages.get(id);
        if (!pkg) {
            throw new PlanningError(PLANNING_ERRORS.PACKAGE_NOT_FOUND, `Package ${id} not found`);
        }
        return pkg;
    }

    getRoute(id: string): Route {
        const route = this.routes.get(id);
        if (!route) {
            throw new PlanningError(PLANNING_ERRORS.ROUTE_NOT_FOUND, `Route ${id} not found`);
        }
        return route;
    }

    getVehicle(id: string): Vehicle {
        const vehicle = this.vehicles.get(id);
        if (!vehicle) {
            throw new PlanningError(PLANNING_ERRORS.VEHICLE_NOT_FOUND, `Vehicle ${id} not found`);
        }
        return vehicle;
    }

    getDriver(id: string): Driver {
        const driver = this.drivers.get(id);
        if (!driver) {
            throw new PlanningError(PLANNING_ERRORS.DRIVER_NOT_FOUND, `Driver ${id} not found`);
        }
        return driver;
    }

    /** Scanning into the facility moves a created package in transit */
    scanPackage(id: string): Package {
        const pkg = this.getPackage(id);
        if (pkg.status === 'Created') {
            pkg.status = 'InTransit';
        }
        return pkg;
    }

    updatePackageStatus(id: string, status: PackageStatus, proofOfDelivery?: string): Package {
        const pkg = this.getPackage(id);
        pkg.status = status;
        if (proofOfDelivery) {
            pkg.proofOfDelivery = proofOfDelivery;
        }
        return pkg;
    }

    /** Builds an unsequenced route by hand. Unknown ids and packages already on a route are skipped. */
    createRoute(routeId: string, packageIds: ReadonlyArray<string>): Route {
        if (this.routes.has(routeId)) {
            throw new PlanningError(PLANNING_ERRORS.INVALID_INPUT, `Route ${routeId} already exists`);
        }

        const route = createRoute(routeId);

        for (const id of packageIds) {
            const pkg = this.packages.get(id);
            if (!pkg || pkg.assignedRouteId !== undefined) {
                continue;
            }

            addPackageToRoute(route, pkg);
        }

        this.routes.set(routeId, route);
        return route;
    }

    optimizeRoute(routeId: string): Route {
        return sequenceRoute(this.getRoute(routeId), this.depot, this.config.distanceCalc);
    }

    /** Runs a strategy over the unassigned packages and stores the routes it produces */
    computeRoutes(strategy: RouteStrategy): PlanResult {
        const input: StrategyInput = {
            packages: [...this.packages.values()],
            vehicles: [...this.vehicles.values()],
            drivers: [...this.drivers.values()],
            depot: this.depot,
            existingRoutes: this.routes,
        };

        const result = strategy.computeRoutes(input, this.config);

        for (const [id, route] of result.routes) {
            this.routes.set(id, route);
        }

        return result;
    }

    autoCreateRoutes(k: number): PartitionResult {
        return autoPartitionRoutes(
            {
                packages: [...this.packages.values()],
                k,
                maxWeightPerRoute: this.config.maxWeightPerRoute,
                depot: this.depot,
                routes: this.routes,
                vehicles: [...this.vehicles.values()],
                drivers: [...this.drivers.values()],
            },
            this.config,
        );
    }

    /** Driver confirms the start of a planned route */
    startRoute(routeId: string, driverId: string): Route {
        const route = this.getRoute(routeId);
        const driver = this.getDriver(driverId);

        if (route.status !== 'Planned') {
            throw new PlanningError(PLANNING_ERRORS.INVALID_INPUT, `Route ${routeId} is ${route.status}, not Planned`);
        }
        if (route.driverId !== undefined && route.driverId !== driverId) {
            throw new PlanningError(
                PLANNING_ERRORS.INVALID_INPUT,
                `Route ${routeId} is assigned to driver ${route.driverId}`,
            );
        }

        route.driverId = driverId;
        route.status = 'InProgress';
        driver.currentRouteId = routeId;

        return route;
    }

    /** Closes a route in progress and releases its vehicle and driver */
    completeRoute(routeId: string): Route {
        const route = this.getRoute(routeId);

        if (route.status !== 'InProgress') {
            throw new PlanningError(
                PLANNING_ERRORS.INVALID_INPUT,
                `Route ${routeId} is ${route.status}, not InProgress`,
            );
        }

        route.status = 'Completed';

        const vehicle = route.vehicleId === undefined ? undefined : this.vehicles.get(route.vehicleId);
        if (vehicle && vehicle.currentRouteId === routeId) {
            vehicle.currentRouteId = undefined;
            vehicle.currentLoad = 0;
            vehicle.status = 'Available';
        }

        const driver = route.driverId === undefined ? undefined : this.drivers.get(route.driverId);
        if (driver && driver.currentRouteId === routeId) {
            driver.currentRouteId = undefined;
        }

        return route;
    }

    routesForDriver(driverId: string): Route[] {
        return [...this.routes.values()].filter(route => route.driverId === driverId);
    }

    report(): AnalyticsReport {
        return summarize(this.packages.values(), this.routes.values(), this.vehicles.values());
    }
}
