/**
 * @fileoverview Image operations against the container engine's remote API.
 * Provides build, pull, push, list, tag and remove on top of dockerode.
 */

import * as core from '@actions/core';
import Dockerode from 'dockerode';
import { mapValues } from 'lodash';

import { createBuildContext } from './build-context';
import {
  type ClientConfig,
  createRegistryAuth,
  parseEngineHost,
  type RegistryAuth,
  type ResolvedClientConfig,
  resolveClientConfig,
} from './config';
import { parseImageReference } from './image-reference';
import { findAuxValue, type JsonMessage, logJsonMessage, readJsonMessages } from './json-message';

/**
 * The dockerode APIs in use.
 */
export type DockerHandle = Pick<Dockerode, 'buildImage' | 'pull' | 'listImages'> & {
  getImage(name: string): Pick<Dockerode.Image, 'push' | 'tag' | 'remove'>;
};

/**
 * Metadata of one locally known image, copied from the engine's image list.
 */
export type ImageSummary = {
  readonly containers: number;
  readonly created: number;
  readonly id: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly parentId: string;
  readonly repoDigests: ReadonlyArray<string>;
  readonly repoTags: ReadonlyArray<string>;
  readonly sharedSize: number;
  readonly size: number;
  readonly virtualSize: number;
};

export type OperationOptions = {
  readonly signal?: AbortSignal | undefined;
};

export type BuildOptions = OperationOptions & {
  /** Dockerfile path relative to the context; the default name is used when omitted. */
  readonly dockerfile?: string | undefined;
  readonly labels?: Readonly<Record<string, string>> | undefined;
  readonly target?: string | undefined;
  readonly platform?: string | undefined;
};

export type BuildResult = {
  readonly imageId?: string | undefined;
};

export type PushResult = {
  readonly digest?: string | undefined;
};

/**
 * Image operations offered by the client.
 */
export interface ImageClient {
  build(
    contextDirectory: string,
    imagePath: string,
    args: Readonly<Record<string, string>>,
    options?: BuildOptions
  ): Promise<BuildResult>;
  pull(imagePath: string, options?: OperationOptions): Promise<void>;
  push(imagePath: string, options?: OperationOptions): Promise<PushResult>;
  list(filters: Readonly<Record<string, string>>, options?: OperationOptions): Promise<ReadonlyArray<ImageSummary>>;
  tag(imagePath: string, newImagePath: string, options?: OperationOptions): Promise<void>;
  rmi(imagePath: string, options?: OperationOptions): Promise<void>;
}

/**
 * Runs an engine operation and logs its duration.
 *
 * @param description - Human readable operation, e.g. "push nginx:latest".
 * @param signal - Checked before the operation starts.
 * @param operation - The operation to run.
 */
async function runOperation<T>(
  description: string,
  signal: AbortSignal | undefined,
  operation: () => Promise<T>
): Promise<T> {
  signal?.throwIfAborted();
  core.info(`Executing: ${description}`);

  const executionStartTime = performance.now();
  try {
    const result = await operation();
    const executionTimeMs = Math.round(performance.now() - executionStartTime);
    core.info(`Completed in ${executionTimeMs}ms: ${description}`);
    return result;
  } catch (operationError) {
    const executionTimeMs = Math.round(performance.now() - executionStartTime);
    core.error(`Failed after ${executionTimeMs}ms: ${description}`);
    throw operationError;
  }
}

function consumeResponse(
  stream: NodeJS.ReadableStream,
  signal: AbortSignal | undefined
): Promise<ReadonlyArray<JsonMessage>> {
  return readJsonMessages(stream, { onMessage: logJsonMessage, signal });
}

/**
 * Image client backed by a dockerode handle.
 */
export class DockerImageClient implements ImageClient {
  private readonly registryAuth: RegistryAuth;

  constructor(
    private readonly docker: DockerHandle,
    private readonly config: ResolvedClientConfig
  ) {
    this.registryAuth = createRegistryAuth(config);
  }

  async build(
    contextDirectory: string,
    imagePath: string,
    args: Readonly<Record<string, string>>,
    options: BuildOptions = {}
  ): Promise<BuildResult> {
    return runOperation(`build ${imagePath} from ${contextDirectory}`, options.signal, async () => {
      const buildContext = await createBuildContext(contextDirectory, options.dockerfile);

      let response: NodeJS.ReadableStream;
      try {
        response = await this.docker.buildImage(buildContext.archive, {
          t: imagePath,
          dockerfile: buildContext.dockerfile,
          nocache: this.config.noCache,
          rm: true,
          forcerm: this.config.forceRemove,
          ...(this.config.pullParent ? { pull: true } : {}),
          registryconfig: {
            [this.registryAuth.serveraddress]: {
              username: this.registryAuth.username,
              password: this.registryAuth.password,
            },
          },
          buildargs: { ...args },
          ...(options.labels ? { labels: { ...options.labels } } : {}),
          ...(options.target ? { target: options.target } : {}),
          ...(options.platform ? { platform: options.platform } : {}),
        });
      } catch (buildError) {
        buildContext.archive.destroy();
        throw buildError;
      }

      const messages = await consumeResponse(response, options.signal);
      return { imageId: findAuxValue(messages, 'ID') };
    });
  }

  async pull(imagePath: string, options: OperationOptions = {}): Promise<void> {
    await runOperation(`pull ${imagePath}`, options.signal, async () => {
      const response: NodeJS.ReadableStream = await this.docker.pull(imagePath, {});
      await consumeResponse(response, options.signal);
    });
  }

  async push(imagePath: string, options: OperationOptions = {}): Promise<PushResult> {
    return runOperation(`push ${imagePath}`, options.signal, async () => {
      const { repository, tag } = parseImageReference(imagePath);
      const response = await this.docker.getImage(repository).push({
        tag,
        authconfig: { ...this.registryAuth },
      });
      const messages = await consumeResponse(response, options.signal);
      return { digest: findAuxValue(messages, 'Digest') };
    });
  }

  async list(
    filters: Readonly<Record<string, string>>,
    options: OperationOptions = {}
  ): Promise<ReadonlyArray<ImageSummary>> {
    return runOperation('list images', options.signal, async () => {
      const images = await this.docker.listImages({
        filters: mapValues(filters, (value) => [value]),
      });
      return images.map(
        (image): ImageSummary => ({
          containers: image.Containers ?? 0,
          created: image.Created,
          id: image.Id,
          labels: image.Labels ?? {},
          parentId: image.ParentId,
          repoDigests: image.RepoDigests ?? [],
          repoTags: image.RepoTags ?? [],
          sharedSize: image.SharedSize ?? 0,
          size: image.Size,
          virtualSize: image.VirtualSize ?? 0,
        })
      );
    });
  }

  async tag(imagePath: string, newImagePath: string, options: OperationOptions = {}): Promise<void> {
    await runOperation(`tag ${imagePath} ${newImagePath}`, options.signal, async () => {
      const { repository, tag } = parseImageReference(newImagePath);
      await this.docker.getImage(imagePath).tag({ repo: repository, tag });
    });
  }

  async rmi(imagePath: string, options: OperationOptions = {}): Promise<void> {
    await runOperation(`rmi ${imagePath}`, options.signal, async () => {
      await this.docker.getImage(imagePath).remove({});
    });
  }
}

/**
 * Creates an image client connected to the configured engine.
 *
 * @param config - Client configuration; environment variables and defaults fill the gaps.
 */
export function createImageClient(config: ClientConfig = {}): ImageClient {
  const resolvedConfig = resolveClientConfig(config);
  const connection = parseEngineHost(resolvedConfig.host, resolvedConfig.certPath);
  core.debug(`Connecting to ${resolvedConfig.host} with API ${resolvedConfig.apiVersion}`);

  const docker = new Dockerode({ ...connection, version: resolvedConfig.apiVersion });
  return new DockerImageClient(docker, resolvedConfig);
}
