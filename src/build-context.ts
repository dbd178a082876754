/**
 * @fileoverview Build context archiving.
 * Walks a context directory, applies .dockerignore exclusions and streams the
 * remaining entries as an uncompressed tar archive.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import * as core from '@actions/core';
import * as tar from 'tar-fs';

import { DEFAULT_DOCKERFILE } from './config';
import { PatternMatcher, readDockerignore } from './dockerignore';

const DOCKERIGNORE_FILE = '.dockerignore';

/**
 * A build context ready to be sent to the engine.
 */
export type BuildContext = {
  readonly archive: Readable;
  /** Dockerfile path relative to the context root, with forward slashes. */
  readonly dockerfile: string;
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function toSlash(value: string): string {
  return value.split(path.sep).join('/');
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.lstat(filePath);
    return true;
  } catch (statError) {
    if (isErrnoException(statError) && statError.code === 'ENOENT') {
      return false;
    }
    throw statError;
  }
}

/**
 * Locates the Dockerfile and returns its path relative to the context root.
 * With no name given, `Dockerfile` is used and a lower-case `dockerfile` is accepted when
 * only that one exists.
 *
 * @param contextDirectory - Build context directory.
 * @param dockerfile - Dockerfile path relative to the context, or an empty string for the default.
 */
export async function resolveDockerfile(contextDirectory: string, dockerfile: string): Promise<string> {
  const absoluteContext = path.resolve(contextDirectory);
  let dockerfileName = dockerfile;
  let filename = path.join(absoluteContext, dockerfile);

  if (!dockerfile) {
    dockerfileName = DEFAULT_DOCKERFILE;
    filename = path.join(absoluteContext, dockerfileName);

    if (!(await pathExists(filename))) {
      const lowerCaseFilename = path.join(absoluteContext, dockerfileName.toLowerCase());
      if (await pathExists(lowerCaseFilename)) {
        dockerfileName = dockerfileName.toLowerCase();
        filename = lowerCaseFilename;
      }
    }
  }

  if (!(await pathExists(filename))) {
    throw new Error(`Cannot locate Dockerfile: ${dockerfileName}`);
  }

  const relativeDockerfile = path.relative(absoluteContext, filename);
  if (relativeDockerfile.startsWith('..') || path.isAbsolute(relativeDockerfile)) {
    throw new Error(`The Dockerfile (${dockerfileName}) must be within the build context (${contextDirectory})`);
  }
  return toSlash(relativeDockerfile);
}

/**
 * Reads the exclusion patterns of a context. A missing .dockerignore yields no patterns;
 * any other read failure propagates.
 */
export async function readContextExcludes(contextDirectory: string): Promise<ReadonlyArray<string>> {
  try {
    const content = await fs.promises.readFile(path.join(contextDirectory, DOCKERIGNORE_FILE), 'utf8');
    return readDockerignore(content);
  } catch (readError) {
    if (isErrnoException(readError) && readError.code === 'ENOENT') {
      return [];
    }
    throw readError;
  }
}

function describeAccessError(accessError: unknown, filePath: string, isDirectory: boolean): unknown {
  if (!isErrnoException(accessError)) {
    return accessError;
  }
  if (accessError.code === 'EACCES' || accessError.code === 'EPERM') {
    return new Error(isDirectory ? `can't stat '${filePath}'` : `no permission to read from '${filePath}'`);
  }
  if (accessError.code === 'ENOENT') {
    return new Error(`file ('${filePath}') not found or excluded by .dockerignore`);
  }
  return accessError;
}

/**
 * Walks the context and collects the context-relative paths to archive.
 * Readable access is checked on every regular file; symlinks are archived as links without being
 * opened. Named pipes, sockets and devices cannot be archived and are left out.
 * Excluded directories are skipped unless an exception pattern or a kept file lies beneath them.
 *
 * @param root - Absolute context directory.
 * @param matcher - Compiled exclusion patterns.
 * @param keep - Paths archived regardless of the exclusions.
 */
export async function collectContextEntries(
  root: string,
  matcher: PatternMatcher,
  keep: ReadonlySet<string>
): Promise<ReadonlySet<string>> {
  const entries = new Set<string>();
  const keptPaths = [...keep];

  const visit = async (relativeDirectory: string): Promise<void> => {
    const absoluteDirectory = path.join(root, relativeDirectory);
    let directoryEntries: fs.Dirent[];
    try {
      directoryEntries = await fs.promises.readdir(absoluteDirectory, { withFileTypes: true });
    } catch (readdirError) {
      throw describeAccessError(readdirError, absoluteDirectory, true);
    }

    for (const directoryEntry of directoryEntries) {
      const relativePath = relativeDirectory ? `${relativeDirectory}/${directoryEntry.name}` : directoryEntry.name;
      const excluded = !keep.has(relativePath) && matcher.matches(relativePath);

      if (directoryEntry.isDirectory()) {
        const holdsKeptPath = keptPaths.some((keptPath) => keptPath.startsWith(`${relativePath}/`));
        if (excluded && !holdsKeptPath && !matcher.mayContainExceptions(relativePath)) {
          continue;
        }
        entries.add(relativePath);
        await visit(relativePath);
        continue;
      }

      if (excluded) {
        continue;
      }
      if (directoryEntry.isSymbolicLink()) {
        entries.add(relativePath);
        continue;
      }
      if (!directoryEntry.isFile()) {
        core.debug(`Skipping special file ${relativePath}`);
        continue;
      }
      entries.add(relativePath);

      const absolutePath = path.join(root, relativePath);
      try {
        await fs.promises.access(absolutePath, fs.constants.R_OK);
      } catch (accessError) {
        throw describeAccessError(accessError, absolutePath, false);
      }
    }
  };

  await visit('');
  return entries;
}

/**
 * Creates the build context archive for a directory.
 *
 * When the exclusions match .dockerignore or the Dockerfile, both files are still
 * archived so the engine can read them.
 *
 * @param contextDirectory - Directory to archive.
 * @param dockerfile - Dockerfile path relative to the context; the default name is used when empty.
 * @returns The tar stream and the canonical Dockerfile name to send with the build.
 */
export async function createBuildContext(contextDirectory: string, dockerfile = ''): Promise<BuildContext> {
  const absoluteContext = path.resolve(contextDirectory);
  const dockerfileName = await resolveDockerfile(contextDirectory, dockerfile);
  const excludes = await readContextExcludes(contextDirectory);
  const matcher = new PatternMatcher(excludes);

  const keep = new Set<string>();
  if (matcher.matches(DOCKERIGNORE_FILE) || matcher.matches(dockerfileName)) {
    keep.add(DOCKERIGNORE_FILE);
    keep.add(dockerfileName);
  }

  let entries: ReadonlySet<string>;
  try {
    entries = await collectContextEntries(absoluteContext, matcher, keep);
  } catch (walkError) {
    const reason = walkError instanceof Error ? walkError.message : String(walkError);
    throw new Error(`Error checking context is accessible: '${reason}'. Please check permissions and try again.`, {
      cause: walkError,
    });
  }

  core.debug(`Build context ${absoluteContext}: ${entries.size} entries, Dockerfile ${dockerfileName}`);

  const packed: NodeJS.ReadableStream = tar.pack(absoluteContext, {
    ignore: (name) => !entries.has(toSlash(path.relative(absoluteContext, name))),
  });

  return { archive: Readable.from(packed, { objectMode: false }), dockerfile: dockerfileName };
}
