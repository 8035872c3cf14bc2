import { ConfigError } from '../errors.js';
import { getComponentLogger } from '../utils/logging.js';

export interface ImageParts {
  imageName: string;
  tag: string;
}

/**
 * Clean an image name: drop a registry host left in front of it and split off
 * an embedded `:tag`. An explicitly passed tag wins over the embedded one.
 */
export function parseImageParts(imageName: string, tag: string): ImageParts {
  let name = imageName.trim();
  let resolvedTag = tag.trim();

  const segments = name.split('/');
  if (segments.length > 1 && segments[0].includes('.')) {
    name = segments.slice(1).join('/');
  }

  const colon = name.indexOf(':');
  if (colon !== -1) {
    const embeddedTag = name.slice(colon + 1);
    name = name.slice(0, colon);
    if (!resolvedTag) {
      resolvedTag = embeddedTag;
    }
  }

  return { imageName: name, tag: resolvedTag };
}

/**
 * Build the app image URI, prefixed with the container registry when one is given
 * @throws ConfigError when the image name or tag ends up empty
 */
export function buildImageUri(containerRegistry: string | undefined, imageName: string, tag: string): string {
  const parts = parseImageParts(imageName, tag);
  if (!parts.imageName) {
    throw new ConfigError('Image name is required');
  }
  if (!parts.tag) {
    throw new ConfigError(`Image tag is required for image '${parts.imageName}'`);
  }

  const registry = containerRegistry?.trim();
  const uri = registry ? `${registry}/${parts.imageName}:${parts.tag}` : `${parts.imageName}:${parts.tag}`;
  getComponentLogger('images').info({ image: uri }, 'Container image URI');
  return uri;
}

/**
 * Private sidecar images always come from the sidecar registry
 */
export function sidecarImageUri(registry: string | undefined, imageName: string, sidecar: string): string {
  const host = registry?.trim();
  if (!host) {
    throw new ConfigError(`A registry is required to use the custom ${sidecar} image '${imageName}'`);
  }
  return `${host}/${imageName}`;
}
