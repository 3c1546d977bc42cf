import { z } from 'zod';

export const traceIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const listTracesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  session_id: z.string().uuid().optional(),
});

export type ListTracesQuery = z.infer<typeof listTracesQuerySchema>;
