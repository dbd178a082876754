/**
 * @fileoverview Action outputs and job summary.
 */

import * as core from '@actions/core';

import { formatBytes } from './format';

/**
 * Outcome of one action run.
 */
export type ActionResult = {
  readonly image: string;
  readonly tags: ReadonlyArray<string>;
  readonly imageId?: string | undefined;
  readonly digest?: string | undefined;
  readonly imageSize?: number | undefined;
  readonly pushed: boolean;
  readonly removed: boolean;
  readonly humanReadableDuration: string;
};

export function setActionOutputs(result: ActionResult): void {
  core.setOutput('image', result.image);
  core.setOutput('image-id', result.imageId ?? '');
  core.setOutput('digest', result.digest ?? '');
  core.setOutput('image-size', result.imageSize ?? '');
  core.setOutput('pushed', result.pushed);
}

/**
 * Writes a job summary table. Skipped outside of a workflow run, where no summary file exists.
 */
export async function createActionSummary(result: ActionResult): Promise<void> {
  if (!process.env.GITHUB_STEP_SUMMARY) {
    core.debug('No job summary file available, skipping summary');
    return;
  }

  const rows = result.tags.map((tag) => [tag, result.pushed ? 'Yes' : 'No']);
  await core.summary
    .addHeading('Container Image Build', 2)
    .addTable([
      [
        { data: 'Tag', header: true },
        { data: 'Pushed', header: true },
      ],
      ...rows,
    ])
    .addRaw(`Image ID: ${result.imageId ?? 'unknown'}`, true)
    .addRaw(`Digest: ${result.digest ?? 'N/A'}`, true)
    .addRaw(`Size: ${formatBytes(result.imageSize)}`, true)
    .addRaw(`Duration: ${result.humanReadableDuration}`, true)
    .write();
}

export function logActionCompletion(result: ActionResult): void {
  const pushSummary = result.pushed ? `, pushed ${result.tags.length} tag(s)` : '';
  const removeSummary = result.removed ? ', removed local tags' : '';
  core.info(
    `Built ${result.image} (${formatBytes(result.imageSize)}) in ${result.humanReadableDuration}${pushSummary}${removeSummary}`
  );
}
