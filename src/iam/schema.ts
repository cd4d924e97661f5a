import { isIPv4, isIPv6 } from 'node:net';
import { z } from 'zod';

/** Message for a missing or empty required value. */
export const BLANK = 'cannot be blank';

/** Path segment the API resolves to the authenticated caller. */
export const SELF = 'self';

/**
 * How allowed values are joined: `'A', 'B' or 'C'` for `serial`, `'A' or 'B' or 'C'` for `or`.
 * The API's messages use both, depending on the field.
 */
export type ChoiceStyle = 'serial' | 'or';

export function listChoices(values: readonly string[], style: ChoiceStyle = 'serial'): string {
  const quoted = values.map((value) => `'${value}'`);
  if (style === 'or' || quoted.length < 2) {
    return quoted.join(' or ');
  }

  return `${quoted.slice(0, -1).join(', ')} or ${quoted[quoted.length - 1]}`;
}

/**
 * Closed string enumeration. An unknown value is reported with the list of allowed values,
 * a missing or empty one as blank.
 */
export function oneOf<const T extends readonly [string, ...string[]]>(
  values: T,
  style: ChoiceStyle = 'serial',
) {
  return z.enum(values, {
    errorMap: (_issue, ctx) => {
      if (ctx.data === undefined || ctx.data === '') {
        return { message: BLANK };
      }

      return { message: `value '${String(ctx.data)}' is invalid. Must be one of: ${listChoices(values, style)}` };
    },
  });
}

export const requiredString = () => z.string({ required_error: BLANK }).min(1, BLANK);

/** Identifier that must be present and non-zero. */
export const requiredId = () => z.number({ required_error: BLANK }).int().refine((value) => value !== 0, BLANK);

/** Identifier the API numbers from 1. */
export const positiveId = () => z.number({ required_error: BLANK }).int().min(1, 'must be no less than 1');

export const email = () => requiredString().email('must be a valid email address');

/**
 * Checks `address/prefix` notation for IPv4 and IPv6. Zone identifiers are not
 * accepted in a block.
 */
export function isCIDR(value: string): boolean {
  const parts = value.split('/');
  if (parts.length !== 2) {
    return false;
  }

  const [address, prefix] = parts;
  if (!/^\d{1,3}$/.test(prefix) || address.includes('%')) {
    return false;
  }

  const bits = Number(prefix);
  if (isIPv4(address)) {
    return bits <= 32;
  }

  if (isIPv6(address)) {
    return bits <= 128;
  }

  return false;
}

export const cidrBlock = () => requiredString().refine(isCIDR, 'invalid CIDR block');

export const CLIENT_TYPES = ['CLIENT', 'USER_CLIENT', 'SERVICE_ACCOUNT'] as const;
export const clientTypeSchema = z.enum(CLIENT_TYPES);
export type ClientType = z.infer<typeof clientTypeSchema>;

export const ACCESS_LEVELS = ['READ-ONLY', 'READ-WRITE'] as const;
export const accessLevelSchema = z.enum(ACCESS_LEVELS);
export type AccessLevel = z.infer<typeof accessLevelSchema>;

export const CREDENTIAL_STATUSES = ['ACTIVE', 'INACTIVE', 'DELETED'] as const;
export const credentialStatusSchema = z.enum(CREDENTIAL_STATUSES);
export type CredentialStatus = z.infer<typeof credentialStatusSchema>;
