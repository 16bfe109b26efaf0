/**
 * Image reference naming
 *
 * ECR destinations keep every replicated image in the one repository named
 * by the destination, told apart by tag. Any other destination gets one
 * repository per image, tagged `latest`.
 */

import { DEFAULT_TAG, type CloudKind } from '../types/config.js';
import type { ImageReference } from '../types/registry.js';

/**
 * Collapse an image name and tag into a single tag token.
 * e.g. "app/service:v1" -> "app-service-v1"
 */
export function toEcrTag(image: string): string {
  return image.replace(/[/:]/g, '-');
}

export function deriveImageReference(
  image: string,
  destinationRegistry: string,
  cloud?: CloudKind
): ImageReference {
  if (cloud === 'aws') {
    return { repository: destinationRegistry, tag: toEcrTag(image) };
  }

  return { repository: `${destinationRegistry}/${image}`, tag: DEFAULT_TAG };
}

export function getSourceReference(registry: string, image: string): string {
  return `${registry}/${image}`;
}

export function formatReference(reference: ImageReference): string {
  return `${reference.repository}:${reference.tag}`;
}
