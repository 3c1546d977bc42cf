import { z } from 'zod';

export const sessionIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const createSessionSchema = z.object({
  user_id: z.string().trim().min(1).max(120).default('anonymous'),
  agent_slug: z.string().trim().min(1).max(120).optional(),
  context_data: z.record(z.unknown()).default({}),
});

export type CreateSessionBody = z.infer<typeof createSessionSchema>;
