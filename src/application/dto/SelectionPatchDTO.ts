import { z } from 'zod';

export const SelectionPatchSchema = z.object({
  year: z.coerce.number().int().optional(),
  category: z.string().optional(),
  subCategories: z.array(z.string()).optional(),
  displayMode: z.enum(['ABSOLUTE', 'PERCENT']).optional(),
});

export type SelectionPatchDTO = z.infer<typeof SelectionPatchSchema>;
