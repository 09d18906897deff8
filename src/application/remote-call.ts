import { RemoteServiceError, ok, err } from '../domain/index.js';
import type { Result } from '../domain/index.js';

/**
 * Runs a single remote call and folds its rejection into a Result.
 * No retry: the first failure is the answer.
 */
export async function callRemote<T>(call: () => Promise<T>): Promise<Result<T, RemoteServiceError>> {
  try {
    return ok(await call());
  } catch (error: unknown) {
    if (error instanceof RemoteServiceError) return err(error);
    const message = error instanceof Error ? error.message : String(error);
    return err(new RemoteServiceError('client-error', message, { cause: error }));
  }
}
