import { z } from 'zod';

export const usageIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const globalUsageQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});
