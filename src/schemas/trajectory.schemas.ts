import { z } from 'zod';

const numericString = z.string().trim().min(1).pipe(z.coerce.number());

export const trackRowSchema = z.object({
  time: z.string().trim().min(1),
  callsign: z.string().trim().min(1),
  latitude: numericString.pipe(z.number().min(-90).max(90)),
  longitude: numericString.pipe(z.number().min(-180).max(180)),
  altitude: numericString.pipe(z.number().int()),
  category: z.string().trim().default(''),
});
