/**
 * @fileoverview Image reference parsing.
 */

/**
 * An image reference split into repository, tag and digest.
 */
export type ImageReference = {
  readonly repository: string;
  readonly tag?: string | undefined;
  readonly digest?: string | undefined;
};

/**
 * Splits an image reference such as `registry:5000/team/app:1.0@sha256:...`.
 * The tag is the text after the last `:` that follows the last `/`, so a registry
 * port is never taken for a tag.
 *
 * @param reference - Image reference to parse.
 */
export function parseImageReference(reference: string): ImageReference {
  if (!reference.trim()) {
    throw new Error('Invalid image reference: empty');
  }

  let remainder = reference;
  let digest: string | undefined;
  const digestSeparator = remainder.indexOf('@');
  if (digestSeparator >= 0) {
    digest = remainder.slice(digestSeparator + 1);
    remainder = remainder.slice(0, digestSeparator);
  }

  let tag: string | undefined;
  const tagSeparator = remainder.lastIndexOf(':');
  if (tagSeparator > remainder.lastIndexOf('/')) {
    tag = remainder.slice(tagSeparator + 1);
    remainder = remainder.slice(0, tagSeparator);
  }

  if (!remainder) {
    throw new Error(`Invalid image reference: ${reference}`);
  }
  return { repository: remainder, tag, digest };
}

export function formatImageReference({ repository, tag, digest }: ImageReference): string {
  return `${repository}${tag ? `:${tag}` : ''}${digest ? `@${digest}` : ''}`;
}
