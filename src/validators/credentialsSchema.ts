import { z } from 'zod';

export const credentialsSchema = z
  .object({
    email: z.string({ required_error: 'email is required' }).trim().email('invalid email format'),
    apiKey: z.string().min(1).optional(),
    password: z.string().min(1).optional()
  })
  .refine((c) => Boolean(c.apiKey || c.password), {
    message: 'authentication required: provide either an API key or a password',
    path: ['apiKey']
  });

export type Credentials = z.infer<typeof credentialsSchema>;

export const agentIdSchema = z.string({ required_error: 'agent id is required' }).trim().min(1, 'agent id is required');
