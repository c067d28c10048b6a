import z from 'zod';

import { parsePoint } from '../utils/parsePoint';
import { driverSchema, packageSchema, pointSchema, vehicleSchema } from './types';

// Package locations come either as points or as "x, y" address labels
const locationJsonSchema = z.union([pointSchema, z.string()]).transform((value, ctx) => {
    if (typeof value !== 'string') {
        return value;
    }

    try {
        return parsePoint(value);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
    }
});

export const packageJsonSchema = packageSchema.extend({
    location: locationJsonSchema,
});

export const problemJsonSchema = z.object({
    depot: pointSchema.default({ x: 0, y: 0 }),
    packages: packageJsonSchema.array(),
    vehicles: vehicleSchema.array(),
    drivers: driverSchema.array().default([]),
    constraints: z
        .object({
            maxWeightPerRoute: z.number().positive().optional(),
            routeCount: z.number().int().min(1).optional(),
        })
        .optional(),
});

export type ProblemJson = z.input<typeof problemJsonSchema>;

export type Problem = z.infer<typeof problemJsonSchema>;
