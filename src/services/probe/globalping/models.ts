import { z } from 'zod';

/**
 * UN M49 geographic regions, the granularity measurements are spread over.
 */
export const GEOGRAPHIC_REGIONS = [
  'Northern Africa',
  'Eastern Africa',
  'Middle Africa',
  'Southern Africa',
  'Western Africa',
  'Caribbean',
  'Central America',
  'South America',
  'Northern America',
  'Central Asia',
  'Eastern Asia',
  'South-eastern Asia',
  'Southern Asia',
  'Western Asia',
  'Eastern Europe',
  'Northern Europe',
  'Southern Europe',
  'Western Europe',
  'Australia and New Zealand',
  'Melanesia',
  'Micronesia',
  'Polynesia',
] as const;

export interface MeasurementLocation {
  region?: string;
  country?: string;
  city?: string;
  limit: number;
}

export interface PingMeasurementRequest {
  type: 'ping';
  target: string;
  locations: MeasurementLocation[];
  measurementOptions: { packets: number };
}

export const probeSchema = z.object({
  location: z
    .object({
      region: z.string().optional(),
      country: z.string().optional(),
      city: z.string().optional(),
    })
    .passthrough(),
});

export const probesResponseSchema = z.array(probeSchema);

export const createMeasurementResponseSchema = z.object({
  id: z.string().default(''),
  probesCount: z.number().int().nonnegative().default(0),
});

export const measurementResultSchema = z.object({
  probe: probeSchema.optional(),
  result: z
    .object({
      status: z.string().optional(),
      resolvedAddress: z.string().nullable().optional(),
    })
    .passthrough(),
});

export const measurementResponseSchema = z.object({
  id: z.string().default(''),
  status: z.string(),
  results: z.array(measurementResultSchema).default([]),
});

export const errorResponseSchema = z.object({
  error: z.object({
    type: z.string().default('unknown'),
    message: z.string().default(''),
    params: z.record(z.string()).optional(),
  }),
});

export type MeasurementResponse = z.infer<typeof measurementResponseSchema>;
export type MeasurementResult = z.infer<typeof measurementResultSchema>;
