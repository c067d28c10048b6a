import z from 'zod';

export const pointSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
});

export type Point = Readonly<z.infer<typeof pointSchema>>;

export const packageStatusSchema = z.enum([
    'Created',
    'InTransit',
    'OutForDelivery',
    'Delivered',
    'Returned',
    'Exception',
]);

export type PackageStatus = z.infer<typeof packageStatusSchema>;

export const vehicleStatusSchema = z.enum(['Available', 'InUse', 'Maintenance']);

export type VehicleStatus = z.infer<typeof vehicleStatusSchema>;

export const routeStatusSchema = z.enum(['Planned', 'InProgress', 'Completed']);

export type RouteStatus = z.infer<typeof routeStatusSchema>;

export const packageSchema = z.object({
    id: z.string().min(1),
    location: pointSchema,
    weight: z.number().nonnegative(),
    status: packageStatusSchema.default('Created'),
    assignedRouteId: z.string().optional(),
    label: z.string().optional(),
    proofOfDelivery: z.string().optional(),
});

export type Package = z.infer<typeof packageSchema>;

export const vehicleSchema = z
    .object({
        id: z.string().min(1),
        capacity: z.number().positive(),
        currentLoad: z.number().nonnegative().default(0),
        status: vehicleStatusSchema.default('Available'),
        currentRouteId: z.string().optional(),
    })
    .refine(v => v.currentLoad <= v.capacity, { message: 'currentLoad must not exceed capacity' });

export type Vehicle = z.infer<typeof vehicleSchema>;

export const driverSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    licenseNumber: z.string().optional(),
    currentRouteId: z.string().optional(),
});

export type Driver = z.infer<typeof driverSchema>;

export const routeSchema = z.object({
    id: z.string().min(1),
    vehicleId: z.string().optional(),
    driverId: z.string().optional(),
    orderedStops: pointSchema.array(),
    packageIds: z.string().array(),
    totalDistance: z.number().nonnegative(),
    optimized: z.boolean(),
    status: routeStatusSchema,
});

export type Route = z.infer<typeof routeSchema>;
