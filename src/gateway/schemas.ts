import { z } from 'zod';
import { ValidationError } from '../shared/errors';
import { GuestTokenRequest } from '../shared/types';

const rlsRuleSchema = z.object({
  clause: z.string({ required_error: 'clause is required' }),
  dataset: z.number().int().optional(),
});

/** POST /generate-token body */
export const generateTokenSchema = z.object({
  dashboard: z.string().trim().min(1, 'dashboard is required'),
  username: z.string().trim().min(1).max(255).nullish(),
  rls: z.array(rlsRuleSchema).nullish(),
});

function describeIssues(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'Invalid request body';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Boundary validation: turns an untrusted JSON body into a GuestTokenRequest
 * or throws ValidationError. Nothing past this point re-checks field types.
 */
export function parseGenerateTokenBody(body: unknown): GuestTokenRequest {
  const result = generateTokenSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }

  const { dashboard, username, rls } = result.data;
  return {
    dashboardReference: dashboard,
    requestingUser: username ?? undefined,
    rlsRules: rls ?? undefined,
  };
}
