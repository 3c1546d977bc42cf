import { z } from 'zod';

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1).max(4000),
  session_id: z.string().uuid().optional(),
  user_id: z.string().trim().min(1).max(120).default('anonymous'),
  max_iterations: z.coerce.number().int().min(1).max(50).optional(),
  run_name: z.string().trim().min(1).max(200).optional(),
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;
