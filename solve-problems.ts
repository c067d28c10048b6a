import fs from 'fs/promises';
import cloneDeep from 'lodash/cloneDeep';
import path from 'path';
import { fileURLToPath } from 'url';

import { ClusterStrategy } from './src/algorithms/strategies';
import { formatReport } from './src/analytics';
import { createDefaultStrategyFactory } from './src/factory';
import { FleetState } from './src/fleet';
import { formatPoint } from './src/utils/parsePoint';
import { ProblemLoader, SOLVED_SUFFIX } from './src/utils/problem-loader';

const problemsDir = path.resolve(process.argv[2] ?? fileURLToPath(new URL('problems', import.meta.url)));

const main = async () => {
    const problems = await new ProblemLoader().loadFromDirectory(problemsDir);

    for (const { problem, metadata } of problems) {
        const factory = createDefaultStrategyFactory();
        const routeCount = problem.constraints?.routeCount;
        if (routeCount !== undefined) {
            factory.register('cluster', () => new ClusterStrategy(routeCount));
        }

        console.log(
            `Solving ${metadata.filename}: ${metadata.packageCount} packages, ${metadata.vehicleCount} vehicles, ${metadata.driverCount} drivers`,
        );

        const solutions: Record<string, unknown> = {};

        for (const name of factory.getAvailable()) {
            // every strategy starts from the untouched problem
            const fleet = FleetState.fromProblem(cloneDeep(problem));

            const start = process.hrtime.bigint();
            const { issues } = fleet.computeRoutes(factory.create(name));
            const end = process.hrtime.bigint();

            const report = fleet.report();

            console.log(`Strategy ${name} finished in ${Number((end - start) / BigInt(1e6))}ms`);
            console.log(formatReport(report));
            issues.forEach(issue => console.log(`\t${issue.code}: ${issue.message}`));
            console.log();

            solutions[name] = {
                routes: [...fleet.routes.values()].map(route => ({
                    ...route,
                    orderedStops: route.orderedStops.map(formatPoint),
                })),
                issues,
                report,
            };
        }

        await fs.writeFile(
            path.resolve(problemsDir, `${metadata.filename}${SOLVED_SUFFIX}.json`),
            JSON.stringify(solutions, null, 2),
        );
    }
};

main().catch(err => {
    console.error(err);
    process.exit(1);
});
