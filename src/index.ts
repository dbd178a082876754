/**
 * @fileoverview Public library API.
 */

export { type BuildContext, createBuildContext } from './build-context';
export {
  type ClientConfig,
  ConfigError,
  DEFAULT_API_VERSION,
  DEFAULT_DOCKERFILE,
  DEFAULT_ENGINE_HOST,
  loadClientConfig,
  resolveClientConfig,
} from './config';
export {
  type BuildOptions,
  type BuildResult,
  createImageClient,
  type DockerHandle,
  DockerImageClient,
  type ImageClient,
  type ImageSummary,
  type OperationOptions,
  type PushResult,
} from './docker-client';
export { PatternMatcher, readDockerignore } from './dockerignore';
export { formatImageReference, type ImageReference, parseImageReference } from './image-reference';
export { detectErrorMessage, type JsonMessage, JsonMessageError, readJsonMessages } from './json-message';
