import type { PlanningIssue } from '../errors';
import type { Driver, Package, Point, Route, Vehicle } from './types';

export type DistanceCalculator = (from: Point, to: Point) => number;

export type PlannerLogger = Pick<Console, 'info' | 'warn'>;

export interface PlannerConfig {
    distanceCalc: DistanceCalculator;
    partitionRounds: number; // fixed, no convergence check
    maxWeightPerRoute: number;
    routeId: (sequence: number) => string;
    logger: PlannerLogger;
}

export interface StrategyInput {
    packages: ReadonlyArray<Package>;
    vehicles: ReadonlyArray<Vehicle>;
    drivers: ReadonlyArray<Driver>;
    depot?: Point;
    existingRoutes?: ReadonlyMap<string, Route>; // ids of new routes avoid these
}

export interface PlanResult {
    routes: Map<string, Route>;
    issues: PlanningIssue[];
}

export interface PartitionResult {
    routeIds: string[];
    issues: PlanningIssue[];
}

/** Interchangeable route computation, e.g. greedy assignment or cluster-first partitioning */
export interface RouteStrategy {
    readonly name: string;
    computeRoutes: (input: StrategyInput, config?: Partial<PlannerConfig>) => PlanResult;
}

export interface AnalyticsReport {
    readonly totalPackages: number;
    readonly delivered: number;
    readonly pending: number;
    readonly successRate: number | null; // null when there are no packages
    readonly totalDistance: number;
    readonly activeVehicles: number;
}
