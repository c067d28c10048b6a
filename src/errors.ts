export const PLANNING_ERRORS = {
    CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
    INVALID_INPUT: 'INVALID_INPUT',
    ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
    PACKAGE_NOT_FOUND: 'PACKAGE_NOT_FOUND',
    VEHICLE_NOT_FOUND: 'VEHICLE_NOT_FOUND',
    DRIVER_NOT_FOUND: 'DRIVER_NOT_FOUND',
} as const;

export type PlanningErrorCode = (typeof PLANNING_ERRORS)[keyof typeof PLANNING_ERRORS];

/** Failure recorded by a planning run instead of aborting the batch */
export interface PlanningIssue {
    readonly code: PlanningErrorCode;
    readonly message: string;
    readonly packageId?: string;
}

export class PlanningError extends Error {
    constructor(
        readonly code: PlanningErrorCode,
        message: string,
    ) {
        super(message);
        this.name = 'PlanningError';
    }

    toIssue(packageId?: string): PlanningIssue {
        return packageId === undefined
            ? { code: this.code, message: this.message }
            : { code: this.code, message: this.message, packageId };
    }
}

export const isPlanningError = (error: unknown, code?: PlanningErrorCode): error is PlanningError =>
    error instanceof PlanningError && (code === undefined || error.code === code);
