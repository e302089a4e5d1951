/**
 * Authorization header parsing
 */

import { IncomingHttpHeaders } from 'http';
import { ERRORS } from '@chirpy/common/errors';

function readAuthorization(headers: IncomingHttpHeaders): string {
  const value = headers.authorization;
  if (!value) {
    throw ERRORS.MissingCredential('authorization header is missing');
  }
  return value;
}

function fields(value: string): string[] {
  return value.split(/\s+/).filter((field) => field.length > 0);
}

/**
 * Return the second whitespace-separated field of `Authorization`,
 * as in `Bearer <token>`.
 */
export function extractBearerToken(headers: IncomingHttpHeaders): string {
  const parts = fields(readAuthorization(headers));
  if (parts.length < 2) {
    throw ERRORS.MalformedCredential(
      `authorization header has ${parts.length} field(s), expected a scheme and a token`,
    );
  }
  return parts[1];
}

/**
 * Return the last whitespace-separated field of `Authorization`, so both
 * `ApiKey <key>` and a bare `<key>` are accepted.
 */
export function extractApiKey(headers: IncomingHttpHeaders): string {
  const parts = fields(readAuthorization(headers));
  if (parts.length === 0) {
    throw ERRORS.MalformedCredential('authorization header is blank');
  }
  return parts[parts.length - 1];
}
