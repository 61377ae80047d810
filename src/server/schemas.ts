import { z } from 'zod';
import { CookieSet } from '../types/index.js';
import { parseCookieHeader } from '../utils/cookie-header.js';
import { AppError } from './middleware/index.js';

export const loginRequestSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});

const cookieEntrySchema = z.union([
  z.string().min(1),
  z.object({
    value: z.string().min(1),
    domain: z.string().min(1).optional(),
    expiresAt: z.string().optional(),
  }),
]);

const cookieMapSchema = z.record(cookieEntrySchema);

/**
 * Accepts `{ cookies: { NAME: value | { value, domain?, expiresAt? } } }`,
 * `{ cookies: "A=1; B=2" }`, or the bare name/value map. Parses to either the
 * header string or the map.
 */
export const manualCookiesSchema = z.union([
  z
    .object({ cookies: z.union([z.string().trim().min(1), cookieMapSchema]) })
    .transform(body => body.cookies),
  cookieMapSchema,
]);

/**
 * Validates a request body, raising `AppError.badRequest` with every issue
 * as `path: message`, joined by `; `.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw AppError.badRequest(message);
  }
  return parsed.data;
}

export type LoginRequest = z.infer<typeof loginRequestSchema>;
export type ManualCookiesInput = z.infer<typeof manualCookiesSchema>;

export function toCookieSet(input: ManualCookiesInput, defaultDomain: string): CookieSet {
  if (typeof input === 'string') {
    return parseCookieHeader(input, defaultDomain);
  }

  const cookieSet: CookieSet = {};
  for (const [name, entry] of Object.entries(input)) {
    if (typeof entry === 'string') {
      cookieSet[name] = { value: entry, domain: defaultDomain };
      continue;
    }
    cookieSet[name] = {
      value: entry.value,
      domain: entry.domain ?? defaultDomain,
      ...(entry.expiresAt ? { expiresAt: entry.expiresAt } : {}),
    };
  }
  return cookieSet;
}
