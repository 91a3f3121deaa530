import { z } from 'zod';

// numeric and bigint columns come back from pg as strings
const boundSchema = z.union([z.null(), z.coerce.number()]).optional();

export const airportRowSchema = z.object({
  airport_id: z.coerce.number().int(),
  ident: z.string().min(1),
  laty: z.coerce.number().min(-90).max(90),
  lonx: z.coerce.number().min(-180).max(180),
  left_lonx: boundSchema,
  right_lonx: boundSchema,
  bottom_laty: boundSchema,
  top_laty: boundSchema,
});

export type AirportRow = z.infer<typeof airportRowSchema>;
