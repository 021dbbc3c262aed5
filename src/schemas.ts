import { z } from 'zod';

export const depthLimitSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Invalid limit: expected a positive integer')
  .transform(Number)
  .pipe(z.number().int().positive('Invalid limit: expected a positive integer'));

export const searchTreeInputShape = {
  directory: z.string().min(1).default('.'),
  pattern: z.string().default(''),
  exactMatch: z.boolean().optional().default(false),
  showHidden: z.boolean().optional().default(false),
  type: z.enum(['all', 'files', 'dirs']).optional().default('all'),
  depthLimit: z.number().int().positive().optional(),
  limit: z.number().int().min(1).max(5000).optional().default(1000),
};

export const searchTreeInputSchema = z.object(searchTreeInputShape);

export type SearchTreeInput = z.infer<typeof searchTreeInputSchema>;

export const skippedDirectorySchema = z.object({
  path: z.string(),
  code: z.string(),
});

export const searchTreeOutputShape = {
  paths: z.array(z.string()),
  truncated: z.boolean(),
  skipped: z.array(skippedDirectorySchema),
};

export const searchTreeOutputSchema = z.object(searchTreeOutputShape);

export type SearchTreeOutput = z.infer<typeof searchTreeOutputSchema>;
