import { z } from 'zod';
import { PRIORITIES } from '../store/types.js';

export const MAX_QUERY_LENGTH = 2000;

export const QueryContextSchema = z.object({
  customer_id: z.number().int().positive().optional(),
  priority: z.enum(PRIORITIES).optional(),
  email: z.string().trim().toLowerCase().email().optional(),
}).strict();

export const QueryRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').max(MAX_QUERY_LENGTH),
  context: QueryContextSchema.optional(),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
