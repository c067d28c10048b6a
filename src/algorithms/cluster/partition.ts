/**
 * @module cluster-partition
 * @description
 * Weight-constrained, k-means-like partitioning of packages into route-sized clusters.
 *
 * Algorithm:
 * 1. Seeds k centroids from the locations of the first k packages in pool order.
 * 2. For a fixed number of rounds:
 *    - places packages heaviest first, each into the nearest centroid whose cluster still has room for it;
 *    - moves every non-empty cluster's centroid to the mean of its members.
 * 3. Returns the clusters of the last round.
 *
 * A package that fits in no cluster during a round stays out of that round; it is not retried. Packages left out
 * in the last round are reported as unplaced.
 *
 * There is no convergence check and no randomness: the same pool yields the same clusters.
 *
 * Complexity:
 * O(R * P * k) for R rounds and P packages.
 */

import { PLANNING_ERRORS, PlanningError } from '../../errors';
import { PlannerConfig } from '../../types/algorithm';
import { Package, Point } from '../../types/types';
import { manhattanDistanceCalculator } from '../../utils/manhattanDistanceCalculator';

export interface Cluster {
    centroid: Point;
    members: Package[];
    accumulatedWeight: number;
}

export interface PartitionOutcome {
    clusters: Cluster[];
    unplaced: Package[];
}

const meanPosition = (members: ReadonlyArray<Package>): Point => {
    const sum = members.reduce((acc, { location }) => ({ x: acc.x + location.x, y: acc.y + location.y }), {
        x: 0,
        y: 0,
    });

    return { x: sum.x / members.length, y: sum.y / members.length };
};

export const partitionPackages = (
    pool: ReadonlyArray<Package>,
    requestedClusters: number,
    maxWeight: number,
    { distanceCalc, partitionRounds }: Pick<PlannerConfig, 'distanceCalc' | 'partitionRounds'>,
): PartitionOutcome => {
    if (!Number.isInteger(requestedClusters)) {
        throw new PlanningError(
            PLANNING_ERRORS.INVALID_INPUT,
            `Cluster count must be an integer, got ${requestedClusters}`,
        );
    }
    if (!(maxWeight > 0)) {
        throw new PlanningError(
            PLANNING_ERRORS.INVALID_INPUT,
            `Max weight per cluster must be positive, got ${maxWeight}`,
        );
    }

    const k = Math.min(requestedClusters, pool.length);

    if (k < 1) {
        return { clusters: [], unplaced: [] };
    }

    const centroids: Point[] = pool.slice(0, k).map(({ location }) => ({ x: location.x, y: location.y }));

    // The pool does not change between rounds, so one stable sort serves every round
    const heaviestFirst = [...pool].sort((a, b) => b.weight - a.weight);

    let clusters: Cluster[] = [];
    let unplaced: Package[] = [];

    for (let round = 0; round < partitionRounds; ++round) {
        clusters = centroids.map(centroid => ({ centroid, members: [], accumulatedWeight: 0 }));
        unplaced = [];

        for (const pkg of heaviestFirst) {
            let bestIndex = -1;
            let bestDistance = Infinity;

            clusters.forEach((cluster, index) => {
                if (cluster.accumulatedWeight + pkg.weight > maxWeight) {
                    return;
                }

                const distance = distanceCalc(pkg.location, cluster.centroid);
                if (distance < bestDistance) {
                    bestDistance = distance;
                    bestIndex = index;
                }
            });

            if (bestIndex === -1) {
                unplaced.push(pkg);
                continue;
            }

            clusters[bestIndex].members.push(pkg);
            clusters[bestIndex].accumulatedWeight += pkg.weight;
        }

        clusters.forEach((cluster, index) => {
            if (cluster.members.length > 0) {
                cluster.centroid = meanPosition(cluster.members);
                centroids[index] = cluster.centroid;
            }
        });
    }

    return { clusters, unplaced };
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    const config = { distanceCalc: manhattanDistanceCalculator, partitionRounds: 10 };

    const makePackage = (id: string, x: number, y: number, weight: number = 1): Package => ({
        id,
        location: { x, y },
        weight,
        status: 'Created',
    });

    describe('meanPosition', () => {
        test('should average member locations', () => {
            expect(meanPosition([makePackage('A', 0, 0), makePackage('B', 1, 1), makePackage('C', 2, 4)])).toEqual({
                x: 1,
                y: 5 / 3,
            });
        });
    });

    describe('partitionPackages', () => {
        test('should return no clusters for an empty pool', () => {
            expect(partitionPackages([], 3, 100, config)).toEqual({ clusters: [], unplaced: [] });
        });

        test('should return no clusters when k is below one', () => {
            expect(partitionPackages([makePackage('A', 1, 1)], 0, 100, config)).toEqual({ clusters: [], unplaced: [] });
        });

        test('should reject a non-positive max weight', () => {
            expect(() => partitionPackages([makePackage('A', 1, 1)], 1, 0, config)).toThrowError(
                'Max weight per cluster must be positive, got 0',
            );
        });

        test('should separate two distant groups', () => {
            const pool = [
                makePackage('A', 0, 0),
                makePackage('B', 1, 1),
                makePackage('C', 100, 100),
                makePackage('D', 101, 101),
            ];

            const { clusters, unplaced } = partitionPackages(pool, 2, 100, config);

            expect(unplaced).toEqual([]);
            expect(clusters.map(cluster => cluster.members.map(({ id }) => id))).toEqual([
                ['A', 'B'],
                ['C', 'D'],
            ]);
            expect(clusters[0].centroid).toEqual({ x: 0.5, y: 0.5 });
            expect(clusters[1].centroid).toEqual({ x: 100.5, y: 100.5 });
            expect(clusters.map(cluster => cluster.accumulatedWeight)).toEqual([2, 2]);
        });

        test('should leave out a package that fits in no cluster', () => {
            const pool = [makePackage('A', 0, 0, 60), makePackage('B', 1, 0, 60), makePackage('C', 2, 0, 60)];

            const { clusters, unplaced } = partitionPackages(pool, 2, 100, config);

            expect(clusters.map(cluster => cluster.members.map(({ id }) => id))).toEqual([['A'], ['B']]);
            expect(unplaced.map(({ id }) => id)).toEqual(['C']);
        });
    });
}
