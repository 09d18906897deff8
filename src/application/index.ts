export { parseLogLine, EMPTY_MESSAGE } from './line-parser.js';
export type { ParsedLine } from './line-parser.js';
export {
  isValidGroupName,
  isValidPlainName,
  validateGroupName,
  validateStreamName,
} from './name-rules.js';
export { DestinationCache } from './destination-cache.js';
export { LogShipper } from './log-shipper.js';
export { IngestionPipeline } from './ingestion-pipeline.js';
export type { PipelineState, StoppedState, PipelineDeps } from './ingestion-pipeline.js';
export { runSession } from './session.js';
export type { SessionDeps } from './session.js';
export { fetchEvents } from './fetch-events.js';
export { callRemote } from './remote-call.js';
export {
  loadConfig,
  cliConfigSchema,
  runConfigSchema,
  fetchConfigSchema,
  awsSettingsSchema,
  DEFAULT_REGION,
} from './config-schema.js';
export type { CliArgs, CliConfig, RunConfig, FetchConfig, AwsSettings } from './config-schema.js';
export type {
  LogsRemote,
  CreateOutcome,
  PutEventsAck,
  RejectedEventsInfo,
  RawLogLine,
  LogLineSource,
} from './ports.js';
