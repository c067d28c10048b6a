import { AnalyticsReport } from './types/algorithm';
import { Package, Route, Vehicle } from './types/types';

/** Reduces the current fleet state into dashboard figures. Does not mutate anything. */
export const summarize = (
    packages: Iterable<Package>,
    routes: Iterable<Route>,
    vehicles: Iterable<Vehicle>,
): AnalyticsReport => {
    let totalPackages = 0;
    let delivered = 0;
    for (const { status } of packages) {
        ++totalPackages;
        if (status === 'Delivered') {
            ++delivered;
        }
    }

    let totalDistance = 0;
    for (const route of routes) {
        totalDistance += route.totalDistance;
    }

    let activeVehicles = 0;
    for (const { status } of vehicles) {
        if (status === 'InUse') {
            ++activeVehicles;
        }
    }

    return {
        totalPackages,
        delivered,
        pending: totalPackages - delivered,
        successRate: totalPackages === 0 ? null : (delivered / totalPackages) * 100,
        totalDistance,
        activeVehicles,
    };
};

export const formatReport = (report: AnalyticsReport): string =>
    [
        '=== Business Analytics Dashboard ===',
        `Total Packages: ${report.totalPackages}`,
        `Delivered: ${report.delivered}`,
        `Pending: ${report.pending}`,
        `Success Rate: ${report.successRate === null ? 'N/A' : `${report.successRate.toFixed(1)}%`}`,
        `Total Fleet Distance: ${report.totalDistance.toFixed(2)} km`,
        `Active Trucks: ${report.activeVehicles}`,
        '====================================',
    ].join('\n');
