export { CloudWatchLogsRemote, createCloudWatchClient, toRemoteServiceError, isAlreadyExists } from './cloudwatch/index.js';
export { DockerContainerSource, CONTAINER_ENV } from './docker/index.js';
export type { ContainerSpec } from './docker/index.js';
export { InMemoryLogsRemote } from './memory/index.js';
