import { z } from 'zod';
import { ValidationError } from './errors';

export const secondsSchema = z.coerce.number().nonnegative();
export const probabilitySchema = z.coerce.number().min(0).max(1);
export const positiveIntSchema = z.coerce.number().int().positive();
export const portSchema = z.coerce.number().int().min(0).max(65535);

/** Accepts the usual env spellings of a flag: true/false, 1/0, yes/no. */
export const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', '0', 'no', 'off'].includes(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid boolean flag: ${value}` });
    return z.NEVER;
  });

export const csvListSchema = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid request body', formatIssues(result.error));
  }
  return result.data;
}
