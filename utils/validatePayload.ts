import { z } from 'zod';
import { ValidationError } from '../services/base/ServiceError';

export function validatePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label = 'payload'): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}: ${result.error.message}`, { issues: result.error.issues.map(issue => issue.message) });
  }
  return result.data;
}
