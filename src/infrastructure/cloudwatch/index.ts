export { CloudWatchLogsRemote } from './cloudwatch-remote.js';
export { createCloudWatchClient } from './client.js';
export { toRemoteServiceError, isAlreadyExists } from './errors.js';
