export { autoPartitionRoutes, planRoutes, summarize } from './planner';
export type { AutoPartitionInput } from './planner';
export { formatReport } from './analytics';
export { FleetState, PACKAGE_ID_PATTERN } from './fleet';
export { StrategyFactory, createDefaultStrategyFactory } from './factory';
export { ClusterStrategy, NearestNeighborStrategy } from './algorithms/strategies';
export { assignPackages, findVehicleIndex } from './algorithms/assignment';
export type { AssignmentCursor } from './algorithms/assignment';
export { buildNearestNeighborTour, ORIGIN, sequenceRoute } from './algorithms/tour';
export type { Tour } from './algorithms/tour';
export { materializeClusters, partitionPackages } from './algorithms/cluster';
export type { Cluster, MaterializeContext, PartitionOutcome } from './algorithms/cluster';
export { canAccept, commit } from './algorithms/capacity-ledger';
export { DEFAULT_PLANNER_CONFIG, resolvePlannerConfig } from './config';
export { isPlanningError, PLANNING_ERRORS, PlanningError } from './errors';
export type { PlanningErrorCode, PlanningIssue } from './errors';
export { euclideanDistanceCalculator } from './utils/euclideanDistanceCalculator';
export { manhattanDistanceCalculator } from './utils/manhattanDistanceCalculator';
export { formatPoint, parsePoint } from './utils/parsePoint';
export { ProblemLoader } from './utils/problem-loader';
export type { LoadedProblem, ProblemMetadata } from './utils/problem-loader';
export { problemJsonSchema } from './types/problem-json';
export { driverSchema, packageSchema, pointSchema, routeSchema, vehicleSchema } from './types/types';
export type * from './types';
