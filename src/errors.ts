/**
 * @fileoverview Error kinds raised by the restore and save phases.
 * Filesystem failures are not wrapped: Node.js errors propagate unchanged.
 */

/**
 * Base class for every failure the action reports on its own behalf.
 */
export class CacheActionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The `cache-only` input named a segment that does not exist.
 */
export class ParseCacheableItemError extends CacheActionError {
  readonly token: string;

  constructor(token: string) {
    super(`Unknown cacheable item in cache-only input: ${token}`);
    this.token = token;
  }
}

/**
 * A sidecar record could not be produced or parsed.
 */
export class SerializationError extends CacheActionError {}

/**
 * The blob cache rejected a restore or save request.
 */
export class HostCacheError extends CacheActionError {}

/**
 * The segment path recorded during restore differs from the one computed during save.
 */
export class PathMismatchError extends CacheActionError {
  readonly previousPath: string;
  readonly currentPath: string;

  constructor(previousPath: string, currentPath: string) {
    super(`Path to cache changed from ${previousPath} to ${currentPath}. Perhaps CARGO_HOME changed?`);
    this.previousPath = previousPath;
    this.currentPath = currentPath;
  }
}

/**
 * No sidecar record was found for a segment during the save phase.
 */
export class SidecarMissingError extends CacheActionError {}

/**
 * Safely extracts an error message from an unknown type.
 * @param error - The error object or value caught.
 * @returns A string representation of the error message.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error ?? 'Unknown error');
}

/**
 * Checks whether a caught value is a Node.js system error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
