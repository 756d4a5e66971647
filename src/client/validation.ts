import { z } from 'zod';
import { InvalidArgumentError } from '../utils/errors.js';
import { buildBaseUrl } from '../transport/http.js';

export const connectionSchema = z
  .object({
    host: z.string().trim().min(1, 'host cannot be empty'),
    port: z.number().int().min(1).max(65535).optional(),
    scheme: z.enum(['http', 'https']).optional()
  })
  .superRefine((connection, ctx) => {
    const { host } = connection;
    if (/[\/@?#\s]/.test(host)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['host'], message: 'host must be a bare hostname or address' });
      return;
    }
    // One colon is host:port; IPv6 literals carry at least two.
    if (!host.startsWith('[') && host.split(':').length === 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['host'], message: 'host must not include a port; use the port field' });
      return;
    }
    if (!URL.canParse(buildBaseUrl(connection))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['host'], message: 'host is not a valid hostname or address' });
    }
  });

export const credentialsSchema = z.union([
  z.object({ username: z.string().min(1, 'username cannot be empty'), password: z.string() }),
  z.object({ token: z.string().min(1, 'token cannot be empty') })
]);

export function requireValid<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, name: string): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(name);
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(name, issue ? issue.message : 'is malformed');
  }
  return parsed.data;
}
