import { readFile } from 'fs/promises';
import { glob } from 'glob';
import path from 'path';
import { ZodError } from 'zod';

import { Problem, problemJsonSchema } from '../types/problem-json';

export interface LoadedProblem {
    problem: Problem;
    metadata: ProblemMetadata;
}

export interface ProblemMetadata {
    filename: string;
    packageCount: number;
    vehicleCount: number;
    driverCount: number;
}

export const SOLVED_SUFFIX = '_solved';

export class ProblemLoader {
    constructor(private readonly logger: Pick<Console, 'info' | 'error'> = console) {}

    /** Loads every problem file below `directoryPath`, skipping files that fail to load and solved outputs */
    async loadFromDirectory(directoryPath: string): Promise<LoadedProblem[]> {
        const problems: LoadedProblem[] = [];

        const files = (await glob('**/*.json', { cwd: directoryPath, absolute: true }))
            .filter(file => !path.basename(file, '.json').endsWith(SOLVED_SUFFIX))
            .sort();

        this.logger.info(`Found ${files.length} problem files in "${directoryPath}"`);

        for (const file of files) {
            try {
                problems.push(await this.loadFromFile(file));
                this.logger.info(`\tLoaded ${path.basename(file)} successfully`);
            } catch (error) {
                this.logger.error(`\tFailed to load ${path.basename(file)}:`, error);
            }
        }

        return problems;
    }

    async loadFromFile(filePath: string): Promise<LoadedProblem> {
        const content = await readFile(filePath, 'utf-8');
        return this.parse(content, filePath);
    }

    parse(content: string, source: string): LoadedProblem {
        try {
            const problem = problemJsonSchema.parse(JSON.parse(content));
            return { problem, metadata: this.extractMetadata(problem, source) };
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(`Invalid JSON in ${source}: ${error.message}`);
            }
            if (error instanceof ZodError) {
                const details = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
                throw new Error(`Invalid problem in ${source}: ${details}`);
            }
            throw error;
        }
    }

    private extractMetadata(problem: Problem, source: string): ProblemMetadata {
        return {
            filename: path.basename(source, '.json'),
            packageCount: problem.packages.length,
            vehicleCount: problem.vehicles.length,
            driverCount: problem.drivers.length,
        };
    }
}
