import { ErrorCode } from './error-codes';
import { ChirpyError } from './chirpy-error';

export const ERRORS = {
  // Credential errors
  MissingCredential: (detail: string) =>
    new ChirpyError({
      code: ErrorCode.MissingCredential,
      message: 'Unauthorized',
      httpStatusCode: 401,
      originalError: new Error(detail),
    }),

  MalformedCredential: (detail: string, e?: Error) =>
    new ChirpyError({
      code: ErrorCode.MalformedCredential,
      message: 'Unauthorized',
      httpStatusCode: 401,
      originalError: e ?? new Error(detail),
    }),

  InvalidSignature: (e?: Error) =>
    new ChirpyError({
      code: ErrorCode.InvalidSignature,
      message: 'Invalid token',
      httpStatusCode: 401,
      originalError: e,
    }),

  TokenExpired: (e?: Error) =>
    new ChirpyError({
      code: ErrorCode.TokenExpired,
      message: 'Invalid token',
      httpStatusCode: 401,
      originalError: e,
    }),

  TokenMalformed: (e?: Error) =>
    new ChirpyError({
      code: ErrorCode.MalformedCredential,
      message: 'Invalid token',
      httpStatusCode: 401,
      originalError: e,
    }),

  InvalidCredentials: (e?: Error) =>
    new ChirpyError({
      code: ErrorCode.InvalidCredentials,
      message: 'Incorrect email or password',
      httpStatusCode: 401,
      originalError: e,
    }),

  InvalidApiKey: () =>
    new ChirpyError({
      code: ErrorCode.InvalidApiKey,
      message: 'Unauthorized',
      httpStatusCode: 401,
    }),

  RefreshTokenInvalid: (reason: 'unknown' | 'expired' | 'revoked') =>
    new ChirpyError({
      code: ErrorCode.RefreshTokenInvalid,
      message: 'Invalid refresh token',
      httpStatusCode: 401,
      metadata: { reason },
    }),

  HashingFailed: (e?: Error) =>
    new ChirpyError({
      code: ErrorCode.HashingFailed,
      message: 'Failed to hash password',
      httpStatusCode: 500,
      originalError: e,
    }),

  // User errors
  UserNotFound: (userId: string, e?: Error) =>
    new ChirpyError({
      code: ErrorCode.UserNotFound,
      message: 'User not found',
      httpStatusCode: 404,
      resource: userId,
      originalError: e,
    }),

  UserAlreadyExists: (email: string, e?: Error) =>
    new ChirpyError({
      code: ErrorCode.UserAlreadyExists,
      message: 'User with this email already exists',
      httpStatusCode: 409,
      resource: email,
      originalError: e,
    }),

  // Chirp errors
  ChirpNotFound: (chirpId: string, e?: Error) =>
    new ChirpyError({
      code: ErrorCode.ChirpNotFound,
      message: 'Chirp not found',
      httpStatusCode: 404,
      resource: chirpId,
      originalError: e,
    }),

  ChirpTooLong: (length: number, maxLength: number) =>
    new ChirpyError({
      code: ErrorCode.ChirpTooLong,
      message: 'Chirp is too long',
      httpStatusCode: 400,
      metadata: { length, maxLength },
    }),

  // Access errors
  AccessDenied: (resource?: string) =>
    new ChirpyError({
      code: ErrorCode.AccessDenied,
      message: 'Access denied',
      httpStatusCode: 403,
      resource,
    }),

  // Database errors
  MigrationChecksumMismatch: (name: string) =>
    new ChirpyError({
      code: ErrorCode.MigrationChecksumMismatch,
      message: `Migration ${name} was modified after it was applied`,
      httpStatusCode: 500,
      resource: name,
    }),

  // General
  ValidationError: (message: string, field?: string) =>
    new ChirpyError({
      code: ErrorCode.ValidationError,
      message,
      httpStatusCode: 400,
      resource: field,
    }),

  InternalError: (message: string, e?: Error) =>
    new ChirpyError({
      code: ErrorCode.InternalError,
      message: message || 'Internal server error',
      httpStatusCode: 500,
      originalError: e,
    }),
};
