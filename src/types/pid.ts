import { z } from 'zod';
import { InvalidArgumentError } from '../utils/errors';

/**
 * Maximum PID length accepted by the repository
 */
export const MAX_PID_LENGTH = 64;

/**
 * PID format: `namespace:localname`
 * Namespace allows alphanumerics, '-' and '.'; the local part additionally
 * allows '~', '_' and percent-encoded octets.
 */
export const PID_REGEX = /^([A-Za-z0-9]|-|\.)+:(([A-Za-z0-9])|-|\.|~|_|(%[0-9A-F]{2}))+$/;

/**
 * URI prefix the resource index uses for repository objects
 */
export const OBJECT_URI_PREFIX = 'info:fedora/';

export const PidSchema = z
  .string()
  .max(MAX_PID_LENGTH, `PID must be at most ${MAX_PID_LENGTH} characters`)
  .regex(PID_REGEX, 'Invalid PID');

/**
 * Check if a string is a well-formed PID
 */
export function isValidPid(pid: string): boolean {
  return pid.length <= MAX_PID_LENGTH && PID_REGEX.test(pid);
}

/**
 * Assert that a PID is well-formed
 * Throws InvalidArgumentError if not
 */
export function assertValidPid(pid: string, label: string = 'PID'): void {
  if (!isValidPid(pid)) {
    throw new InvalidArgumentError(
      `Invalid ${label}: must be "namespace:localname" (got: ${pid})`,
      { pid }
    );
  }
}

/**
 * Namespace part of a PID (everything before the first ':')
 */
export function getNamespace(pid: string): string {
  const index = pid.indexOf(':');
  return index === -1 ? pid : pid.slice(0, index);
}

/**
 * `info:fedora/test:1` for `test:1`
 */
export function pidToUri(pid: string): string {
  return `${OBJECT_URI_PREFIX}${pid}`;
}

/**
 * `test:1` for `info:fedora/test:1`; other values pass through unchanged
 */
export function uriToPid(uri: string): string {
  return uri.startsWith(OBJECT_URI_PREFIX) ? uri.slice(OBJECT_URI_PREFIX.length) : uri;
}
