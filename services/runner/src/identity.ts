import { z } from 'zod';

/** Claims checked for a user name, highest priority first. */
export const USERNAME_CLAIMS = ['username', 'user_name', 'preferred_username'] as const;

const claimsSchema = z.record(z.unknown());

export type TokenClaims = z.infer<typeof claimsSchema>;

/**
 * Decode the payload of a JWT. The signature is NOT verified: the claims are
 * only used to name the caller's workspace.
 */
export function decodeTokenClaims(token: string): TokenClaims {
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new Error(`malformed token: expected 3 segments, got ${segments.length}`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(segments[1], 'base64url').toString('utf-8'));
  } catch (err) {
    throw new Error('malformed token: payload is not JSON', { cause: err });
  }
  const parsed = claimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error('malformed token: payload is not a JSON object');
  }
  return parsed.data;
}

export function getUserName(claims: TokenClaims): string {
  for (const claim of USERNAME_CLAIMS) {
    const value = claims[claim];
    if (typeof value === 'string' && value !== '') return value;
  }
  return '';
}
