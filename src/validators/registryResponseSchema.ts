import { z } from 'zod';

export const loginResponseSchema = z.object({
  token: z.string().min(1)
});

export const registrationResultSchema = z
  .object({
    agentId: z.string().min(1),
    status: z.string(),
    trustScore: z.number().int().min(0).max(100),
    message: z.string().optional(),
    verificationUrl: z.string().optional()
  })
  .passthrough();

export const verificationResultSchema = z
  .object({
    agentId: z.string().optional(),
    status: z.string(),
    verified: z.boolean().optional(),
    trustScore: z.number().int().min(0).max(100).optional(),
    agent: z.record(z.unknown()).optional()
  })
  .passthrough();

export const healthStatusSchema = z
  .object({
    status: z.string()
  })
  .passthrough();

export type RegistrationResult = z.infer<typeof registrationResultSchema>;
export type VerificationResult = z.infer<typeof verificationResultSchema>;
export type HealthStatus = z.infer<typeof healthStatusSchema>;
