import { z } from 'zod';
import type { AgentIdentity } from './types.js';
import { InvalidIdentityError } from './errors.js';

// Agent ids name pid records and status entries, so they stay filename-safe
export const agentIdSchema = z
  .string()
  .trim()
  .min(1, 'Agent ID must not be empty')
  .max(64, 'Agent ID must be at most 64 characters')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Agent ID may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit');

export const identitySchema = z.object({
  id: agentIdSchema,
  kind: z.string().trim().min(1, 'Agent type must not be empty'),
  description: z.string().trim(),
});

export function parseAgentId(raw: string): string {
  const parsed = agentIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidIdentityError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return parsed.data;
}

export function parseIdentity(raw: { id: string; kind: string; description: string }): AgentIdentity {
  const parsed = identitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidIdentityError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return parsed.data;
}
