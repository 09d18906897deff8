export { InMemoryLogsRemote } from './in-memory-logs-remote.js';
