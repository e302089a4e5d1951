/**
 * Chirpy JWT Types
 */

export const JWT_ISSUER = 'chirpy';
export const JWT_ALGORITHM = 'HS256';

export interface JwtClaims {
  iss: typeof JWT_ISSUER;
  sub: string; // user UUID
  iat: number; // issued at, unix seconds
  exp: number; // expiration, unix seconds
}
