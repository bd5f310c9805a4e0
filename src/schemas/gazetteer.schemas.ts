import { z } from 'zod';

export const gazetteerRowSchema = z.object({
  name: z.string().trim().min(1),
  latDms: z.string().trim().min(1),
  lonDms: z.string().trim().min(1),
  line: z.number().int().positive().optional(),
});
