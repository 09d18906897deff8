import { RemoteServiceError } from '../../domain/index.js';

/** Node socket errors that mean the endpoint could not be reached at all. */
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

/**
 * Translates anything the SDK throws into a RemoteServiceError.
 *
 * - credential provider failures → credentials-missing / profile-not-found
 * - socket-level failures → endpoint-unreachable
 * - everything else (service exceptions, validation) → client-error
 */
export function toRemoteServiceError(error: unknown): RemoteServiceError {
  if (error instanceof RemoteServiceError) return error;

  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);

  if (name === 'CredentialsProviderError') {
    return /profile/i.test(message)
      ? new RemoteServiceError('profile-not-found', message, { cause: error })
      : new RemoteServiceError('credentials-missing', message, { cause: error });
  }

  if (UNREACHABLE_CODES.has(errorCode(error)) || name === 'TimeoutError') {
    return new RemoteServiceError('endpoint-unreachable', message, { cause: error });
  }

  return new RemoteServiceError('client-error', message, { cause: error });
}

export function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && error.name === 'ResourceAlreadyExistsException';
}

function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}
