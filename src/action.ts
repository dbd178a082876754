/**
 * @fileoverview GitHub Action flow: build an image, tag it, optionally push it
 * to a registry and report the result.
 */

import * as core from '@actions/core';
import { chain } from 'lodash';

import {
  type ActionResult,
  createActionSummary,
  logActionCompletion,
  setActionOutputs,
} from './action-outputs';
import { type ClientConfig, loadClientConfig } from './config';
import { createImageClient, type PushResult } from './docker-client';
import { formatTimeBetween } from './format';

const DEFAULT_CONTEXT = '.';

/**
 * Configuration for action inputs.
 */
type ActionConfig = {
  readonly context: string;
  readonly dockerfile: string;
  readonly image: string;
  readonly buildArgs: Readonly<Record<string, string>>;
  readonly labels: Readonly<Record<string, string>>;
  readonly target: string;
  readonly additionalTags: ReadonlyArray<string>;
  readonly push: boolean;
  readonly removeAfterPush: boolean;
  readonly client: ClientConfig;
};

/**
 * Reads a boolean input, returning undefined when it is not set.
 */
function getOptionalBooleanInput(name: string): boolean | undefined {
  if (core.getInput(name) === '') {
    return undefined;
  }
  return core.getBooleanInput(name);
}

/**
 * Parses `KEY=VALUE` lines into a map; keys and values are trimmed. A line holding only a name takes its value from the
 * environment and is skipped when the variable is unset. Blank lines and `#` comments are ignored.
 *
 * @param lines - Input lines.
 * @param env - Environment used for name-only lines.
 */
export function parseKeyValueLines(
  lines: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  return chain(lines)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .flatMap((line): Array<[string, string]> => {
      const separatorIndex = line.indexOf('=');
      if (separatorIndex < 0) {
        const environmentValue = env[line];
        if (environmentValue === undefined) {
          core.debug(`Skipping ${line}: not set in the environment`);
          return [];
        }
        return [[line, environmentValue]];
      }

      const key = line.slice(0, separatorIndex).trim();
      if (!key) {
        core.warning(`Ignoring entry without a name: ${line}`);
        return [];
      }
      return [[key, line.slice(separatorIndex + 1).trim()]];
    })
    .fromPairs()
    .value();
}

function getClientConfig(): ClientConfig {
  const configFile = core.getInput('config-file');
  const fileConfig = configFile ? loadClientConfig(configFile) : {};

  const password = core.getInput('password') || fileConfig.password;
  if (password) {
    core.setSecret(password);
  }

  return {
    ...fileConfig,
    host: core.getInput('docker-host') || fileConfig.host,
    registry: core.getInput('registry') || fileConfig.registry,
    user: core.getInput('username') || fileConfig.user,
    password,
    apiVersion: core.getInput('api-version') || fileConfig.apiVersion,
    noCache: getOptionalBooleanInput('no-cache') ?? fileConfig.noCache,
  };
}

/**
 * Gets action configuration from GitHub Actions environment.
 */
function getActionConfig(): ActionConfig {
  return {
    context: core.getInput('context') || DEFAULT_CONTEXT,
    dockerfile: core.getInput('dockerfile'),
    image: core.getInput('image', { required: true }),
    buildArgs: parseKeyValueLines(core.getMultilineInput('build-args')),
    labels: parseKeyValueLines(core.getMultilineInput('labels')),
    target: core.getInput('target'),
    additionalTags: core.getMultilineInput('additional-tags'),
    push: getOptionalBooleanInput('push') ?? false,
    removeAfterPush: getOptionalBooleanInput('remove-after-push') ?? false,
    client: getClientConfig(),
  };
}

/**
 * Main function that runs the GitHub Action.
 * Handles all orchestration, output, and error management for the action.
 */
export async function run(): Promise<void> {
  const actionStartTime = performance.now();

  try {
    const actionConfig = getActionConfig();
    const client = createImageClient(actionConfig.client);

    const buildResult = await client.build(actionConfig.context, actionConfig.image, actionConfig.buildArgs, {
      dockerfile: actionConfig.dockerfile || undefined,
      labels: actionConfig.labels,
      target: actionConfig.target || undefined,
    });

    for (const additionalTag of actionConfig.additionalTags) {
      await client.tag(actionConfig.image, additionalTag);
    }
    const tags = [actionConfig.image, ...actionConfig.additionalTags];

    const pushResults: PushResult[] = [];
    if (actionConfig.push) {
      for (const tag of tags) {
        pushResults.push(await client.push(tag));
      }
    }

    const [builtImage] = await client.list({ reference: actionConfig.image });

    const result: ActionResult = {
      image: actionConfig.image,
      tags,
      imageId: buildResult.imageId ?? builtImage?.id,
      digest: pushResults[0]?.digest,
      imageSize: builtImage?.size,
      pushed: actionConfig.push,
      removed: false,
      humanReadableDuration: formatTimeBetween(actionStartTime, performance.now()),
    };
    setActionOutputs(result);
    await createActionSummary(result);

    let removed = false;
    if (actionConfig.removeAfterPush) {
      if (actionConfig.push) {
        for (const tag of tags) {
          await client.rmi(tag);
        }
        removed = true;
      } else {
        core.warning("'remove-after-push' has no effect unless 'push' is enabled");
      }
    }

    logActionCompletion({ ...result, removed });
  } catch (executionError) {
    if (executionError instanceof Error) {
      core.setFailed(executionError.message);
    } else {
      core.setFailed('Unknown error occurred');
    }
  }
}
