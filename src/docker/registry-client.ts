/**
 * Pull / tag / push against the local container runtime
 */

import { deriveImageReference, formatReference, getSourceReference } from '../naming/index.js';
import {
  ImagePullError,
  ImagePushError,
  MissingPushCredentialsError,
  TagImageError,
  describeError,
} from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { err, ok, type ImageReference, type RegistryCredentials, type Result } from '../types/registry.js';
import type { AuthMode, CloudKind, SourceCredentials } from '../types/config.js';
import { findProgressError } from './progress.js';
import { toRegistryAuth, type ContainerRuntime, type RegistryAuth } from './runtime.js';

export interface RegistryClientOptions {
  cloud?: CloudKind;
  authMode: AuthMode;
}

function isComplete(credentials?: Partial<RegistryCredentials>): credentials is RegistryCredentials {
  return Boolean(credentials?.registryUrl && credentials.username && credentials.password);
}

export class RegistryClient {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: RegistryClientOptions
  ) {}

  /**
   * Fetch `registry/image` into local storage, logging in first when
   * credentials are given. Always goes to the network.
   */
  async pull(registry: string, image: string, credentials?: SourceCredentials): Promise<string> {
    const reference = getSourceReference(registry, image);
    let auth: RegistryAuth | undefined;

    if (credentials) {
      const login = { ...credentials, registryUrl: registry };
      await this.runtime.login(login);
      auth = toRegistryAuth(login);
    }

    logger.verbose(`Pulling ${reference}`);
    const events = await this.runtime.pull(reference, auth);

    const failure = findProgressError(events);
    if (failure) {
      throw new ImagePullError(reference, failure);
    }

    logger.success(`Pulled ${reference}`);
    return reference;
  }

  /**
   * Give the pulled `oldRegistry/image` its destination reference
   */
  async tag(image: string, oldRegistry: string, newRegistry: string): Promise<Result<ImageReference, TagImageError>> {
    const source = getSourceReference(oldRegistry, image);

    try {
      if (!(await this.runtime.imageExists(source))) {
        return err(new TagImageError(source, 'image not found locally'));
      }

      const target = deriveImageReference(image, newRegistry, this.options.cloud);
      await this.runtime.tag(source, target);
      logger.verbose(`Tagged ${source} as ${formatReference(target)}`);
      return ok(target);
    } catch (error) {
      return err(new TagImageError(source, describeError(error)));
    }
  }

  async push(reference: ImageReference, credentials?: Partial<RegistryCredentials>): Promise<void> {
    const formatted = formatReference(reference);
    let auth: RegistryAuth | undefined;

    if (isComplete(credentials)) {
      await this.runtime.login(credentials);
      auth = toRegistryAuth(credentials);
    } else if (this.options.cloud && this.options.authMode === 'strict') {
      throw new MissingPushCredentialsError(formatted);
    } else {
      logger.verbose(`Pushing ${formatted} with the stored Docker login for its registry, if any`);
    }

    logger.info(`Pushing image: ${formatted}`);
    const events = await this.runtime.push(reference, auth);

    const failure = findProgressError(events);
    if (failure) {
      throw new ImagePushError(formatted, failure);
    }

    logger.success(`Pushed ${formatted}`);
  }
}
