export enum ErrorCode {
  // Credential errors
  MissingCredential = 'MissingCredential',
  MalformedCredential = 'MalformedCredential',
  InvalidSignature = 'InvalidSignature',
  TokenExpired = 'TokenExpired',
  InvalidCredentials = 'InvalidCredentials',
  InvalidApiKey = 'InvalidApiKey',
  RefreshTokenInvalid = 'RefreshTokenInvalid',
  HashingFailed = 'HashingFailed',

  // User errors
  UserNotFound = 'UserNotFound',
  UserAlreadyExists = 'UserAlreadyExists',

  // Chirp errors
  ChirpNotFound = 'ChirpNotFound',
  ChirpTooLong = 'ChirpTooLong',

  // Access errors
  AccessDenied = 'AccessDenied',

  // Database errors
  MigrationChecksumMismatch = 'MigrationChecksumMismatch',

  // General errors
  ValidationError = 'ValidationError',
  InternalError = 'InternalError',
}
