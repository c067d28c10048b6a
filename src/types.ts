export type {
    AnalyticsReport,
    DistanceCalculator,
    PartitionResult,
    PlannerConfig,
    PlannerLogger,
    PlanResult,
    RouteStrategy,
    StrategyInput,
} from './types/algorithm';
export type { Problem, ProblemJson } from './types/problem-json';
export type {
    Driver,
    Package,
    PackageStatus,
    Point,
    Route,
    RouteStatus,
    Vehicle,
    VehicleStatus,
} from './types/types';
