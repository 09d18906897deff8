/**
 * Error taxonomy for the shipping pipeline.
 *
 * Every class carries a literal `code` so the entry point can switch
 * on it without `instanceof` chains.
 */

export class ConfigurationError extends Error {
  readonly code = 'configuration' as const;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidNameError extends Error {
  readonly code = 'invalid-name' as const;

  constructor(
    readonly kind: 'group' | 'stream',
    readonly destination: string,
    allowed: string,
  ) {
    super(`${capitalize(kind)} name '${destination}' is incorrect. Names consist of the following characters: ${allowed}`);
    this.name = 'InvalidNameError';
  }
}

export class GroupExistsError extends Error {
  readonly code = 'group-exists' as const;

  constructor(readonly group: string) {
    super(`Group name '${group}' already exist`);
    this.name = 'GroupExistsError';
  }
}

export class StreamExistsError extends Error {
  readonly code = 'stream-exists' as const;

  constructor(readonly stream: string) {
    super(`Stream name '${stream}' already exist`);
    this.name = 'StreamExistsError';
  }
}

export class GroupNotFoundError extends Error {
  readonly code = 'group-not-found' as const;

  constructor(readonly group: string) {
    super(`Group name '${group}' not found`);
    this.name = 'GroupNotFoundError';
  }
}

export class StreamNotFoundError extends Error {
  readonly code = 'stream-not-found' as const;

  constructor(readonly stream: string) {
    super(`Stream name '${stream}' not found`);
    this.name = 'StreamNotFoundError';
  }
}

export class LineFormatError extends Error {
  readonly code = 'line-format' as const;

  constructor(
    readonly line: string,
    reason: string,
  ) {
    super(`Cannot parse log line (${reason}): ${line}`);
    this.name = 'LineFormatError';
  }
}

export type RemoteServiceErrorKind =
  | 'credentials-missing'
  | 'credentials-partial'
  | 'profile-not-found'
  | 'endpoint-unreachable'
  | 'client-error';

/** Any failed call to the remote log service. Never retried here. */
export class RemoteServiceError extends Error {
  readonly code = 'remote-service' as const;

  constructor(
    readonly kind: RemoteServiceErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RemoteServiceError';
  }
}

export type ContainerErrorKind = 'image-not-found' | 'api-error' | 'log-stream';

/** Failure of the container collaborator that produces the log lines. */
export class ContainerError extends Error {
  readonly code = 'container' as const;

  constructor(
    readonly kind: ContainerErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ContainerError';
  }
}

/** Errors an `ensure*` / `putEvents` / `getEvents` call can return. */
export type ShipperError =
  | InvalidNameError
  | GroupExistsError
  | StreamExistsError
  | GroupNotFoundError
  | StreamNotFoundError
  | RemoteServiceError;

/** Errors that stop the ingestion pipeline. */
export type PipelineError = ShipperError | LineFormatError | ContainerError;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
