export { DockerContainerSource, CONTAINER_ENV } from './container-source.js';
export type { ContainerSpec } from './container-source.js';
