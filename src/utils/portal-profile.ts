import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { FLOW_VARIANTS, FieldName, FieldSpec, FlowVariant } from '../types/index.js';

export const DEFAULT_PROFILE_PATH = path.resolve(__dirname, '../../config/portal-profile.json');

const candidateSchema = z.object({
  selector: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

const candidateListSchema = z.array(candidateSchema).min(1);

const variantSchema = z.object({
  entryUrl: z.string().url(),
  urlPatterns: z.array(z.string().min(1)).min(1),
  fields: z.object({
    username: candidateListSchema,
    password: candidateListSchema,
    submit: candidateListSchema,
  }),
});

export const portalProfileSchema = z.object({
  name: z.string().min(1),
  loginUrl: z.string().url(),
  postLoginUrl: z.string().url().optional(),
  variantOrder: z.array(z.enum(FLOW_VARIANTS)).min(1),
  variants: z.object({
    DirectLogin: variantSchema,
    SsoRedirect: variantSchema,
    IdentityProviderRedirect: variantSchema,
  }),
  challenge: z.object({
    widgetSelectors: z.array(z.string().min(1)),
    textPatterns: z.array(z.string().min(1)),
  }),
  errorTextPatterns: z.array(z.string().min(1)),
  cookieDomains: z.array(z.string().min(1)).min(1),
  requiredCookies: z.array(z.string().min(1)).min(1),
  manualCookieDomain: z.string().min(1),
});

export type PortalProfile = z.infer<typeof portalProfileSchema>;

const FIELD_ORDER: FieldName[] = ['username', 'password', 'submit'];

export function loadPortalProfile(profilePath: string = DEFAULT_PROFILE_PATH): PortalProfile {
  if (!fs.existsSync(profilePath)) {
    throw new Error(`Portal profile not found: ${profilePath}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(profilePath, 'utf-8'));
  const parsed = portalProfileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid portal profile ${profilePath}:\n${problems.join('\n')}`);
  }
  return parsed.data;
}

/**
 * Classifies the page reached after navigation by URL. Variants are checked
 * in profile order and the first whose pattern matches wins.
 */
export function detectVariant(url: string, profile: PortalProfile): FlowVariant | undefined {
  for (const variant of profile.variantOrder) {
    const patterns = profile.variants[variant].urlPatterns;
    if (patterns.some(pattern => new RegExp(pattern, 'i').test(url))) {
      return variant;
    }
  }
  return undefined;
}

export function fieldSpecsFor(profile: PortalProfile, variant: FlowVariant): FieldSpec[] {
  const fields = profile.variants[variant].fields;
  return FIELD_ORDER.map(field => ({ field, candidates: fields[field] }));
}

/**
 * Selectors that indicate the credential form is still on screen. Only the
 * password candidates count: username candidates such as `input[type="text"]`
 * also match search boxes on the pages a successful login lands on.
 */
export function credentialSelectors(profile: PortalProfile, variant: FlowVariant): string[] {
  return profile.variants[variant].fields.password.map(candidate => candidate.selector);
}
