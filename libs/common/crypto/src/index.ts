export * from './crypto.module';
export * from './password.service';
export * from './refresh-token.service';
