/**
 * Runtime Context Types
 *
 * Small interfaces the platform provides to repositories and services.
 * The domain never constructs these — the platform does.
 */

/**
 * Structured logger.
 * Services and repositories should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** One-way password hashing used when storing user credentials */
export interface PasswordHasher {
  hash(plain: string): Promise<string>;
}
