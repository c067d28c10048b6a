/**
 * @module tour-sequencer
 * @description
 * Orders a route's stops with the nearest-neighbor heuristic and closes the tour at the depot.
 *
 * Starting at the depot, the closest remaining stop is visited next until none remain, then the vehicle returns to
 * the depot. Equally close stops are resolved in favour of the one listed first on the route.
 *
 * Complexity:
 * O(n^2) in the number of stops.
 */

import { DistanceCalculator } from '../../types/algorithm';
import { Point, Route } from '../../types/types';
import { pointsEqual } from '../../utils/route-utils';

export const ORIGIN: Point = Object.freeze({ x: 0, y: 0 });

export interface Tour {
    orderedStops: Point[];
    totalDistance: number;
}

export const buildNearestNeighborTour = (
    stops: ReadonlyArray<Point>,
    depot: Point,
    distanceCalc: DistanceCalculator,
): Tour => {
    const remaining = stops.filter((stop, index) => stops.findIndex(other => pointsEqual(other, stop)) === index);
    const orderedStops: Point[] = [];

    let current = depot;
    let totalDistance = 0;

    while (remaining.length > 0) {
        let nearestIndex = 0;
        let nearestDistance = distanceCalc(current, remaining[0]);

        for (let i = 1; i < remaining.length; ++i) {
            const distance = distanceCalc(current, remaining[i]);
            if (distance < nearestDistance) {
                nearestDistance = distance;
                nearestIndex = i;
            }
        }

        const [next] = remaining.splice(nearestIndex, 1);
        orderedStops.push(next);
        totalDistance += nearestDistance;
        current = next;
    }

    totalDistance += distanceCalc(current, depot);

    return { orderedStops, totalDistance };
};

/** Seals the route: stops in visiting order, closed-tour distance, `optimized` set */
export const sequenceRoute = (route: Route, depot: Point, distanceCalc: DistanceCalculator): Route => {
    const { orderedStops, totalDistance } = buildNearestNeighborTour(route.orderedStops, depot, distanceCalc);

    route.orderedStops = orderedStops;
    route.totalDistance = totalDistance;
    route.optimized = true;

    return route;
};
