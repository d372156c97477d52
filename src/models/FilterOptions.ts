import { z } from 'zod';

// Paths are checked but never rewritten: a padded name is still the file the user asked for
const FilePath = (message: string) => z.string().refine((value) => value.trim().length > 0, message);
export const FilterOptionsSchema = z.object({
  input: FilePath('Input path is required'),
  output: FilePath('Output path is required'),
  long: z.boolean().default(false),
  cities: z.array(z.string()).min(1, 'At least one city is required')
});
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;
