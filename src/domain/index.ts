export type { LogEvent, WireEvent } from './event.js';
export { createLogEvent, toWireEvent, fromWireEvent, formatEvent } from './event.js';
export type { Destinations } from './destination.js';
export { Existence, LogGroup, LogStream, createDestinations } from './destination.js';
export type { Result } from './result.js';
export { ok, err } from './result.js';
export type {
  RemoteServiceErrorKind,
  ContainerErrorKind,
  ShipperError,
  PipelineError,
} from './errors.js';
export {
  ConfigurationError,
  InvalidNameError,
  GroupExistsError,
  StreamExistsError,
  GroupNotFoundError,
  StreamNotFoundError,
  LineFormatError,
  RemoteServiceError,
  ContainerError,
} from './errors.js';
