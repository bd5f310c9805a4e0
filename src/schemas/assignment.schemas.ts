import { z } from 'zod';
import { DEFAULT_ALTITUDE_THRESHOLD_FT, DEFAULT_RADIUS_KM } from '../config';

export const assignmentOptionsSchema = z.object({
  altitudeThresholdFt: z.number().finite().default(DEFAULT_ALTITUDE_THRESHOLD_FT),
  radiusKm: z.number().finite().positive().default(DEFAULT_RADIUS_KM),
  targetLocations: z.array(z.string().trim().min(1)).optional(),
  includeFixes: z.boolean().default(false),
});

export type AssignmentOptions = z.infer<typeof assignmentOptionsSchema>;
export type AssignmentOptionsInput = z.input<typeof assignmentOptionsSchema>;
