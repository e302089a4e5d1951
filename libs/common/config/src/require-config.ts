import { ConfigService } from '@nestjs/config';

/**
 * Read a configuration value that has no default, failing at startup
 * when it is missing or empty.
 */
export function requireConfig(config: ConfigService, key: string): string {
  const value = config.get<string>(key);
  if (!value) {
    throw new Error(`${key} configuration is required`);
  }
  return value;
}
