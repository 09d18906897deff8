import { InvalidNameError, ok, err } from '../domain/index.js';
import type { Result } from '../domain/index.js';

const GROUP_NAME = /^[a-zA-Z0-9_./-]+$/;
const PLAIN_NAME = /^[a-zA-Z0-9_.-]+$/;

const GROUP_ALLOWED = "a-z, A-Z, 0-9, '_', '-', '/', '.', and '#'";
const PLAIN_ALLOWED = "a-z, A-Z, 0-9, '_', '-', and '.'";

/** `#` is a marker character: it is allowed but does not count towards the length. */
export function isValidGroupName(name: string): boolean {
  const stripped = name.replaceAll('#', '');
  return stripped.length > 1 && GROUP_NAME.test(stripped);
}

/** Rule shared by stream names and container names. */
export function isValidPlainName(name: string): boolean {
  return name.length > 1 && PLAIN_NAME.test(name);
}

export function validateGroupName(name: string): Result<string, InvalidNameError> {
  return isValidGroupName(name) ? ok(name) : err(new InvalidNameError('group', name, GROUP_ALLOWED));
}

export function validateStreamName(name: string): Result<string, InvalidNameError> {
  return isValidPlainName(name) ? ok(name) : err(new InvalidNameError('stream', name, PLAIN_ALLOWED));
}

export { PLAIN_ALLOWED };
