/**
 * Local container runtime, reached through the Docker Engine API
 */

import Docker from 'dockerode';
import type { ImageReference, ProgressEvent, RegistryCredentials } from '../types/registry.js';
import * as logger from '../utils/logger.js';
import { anonymousAuth, findStoredAuth, getDockerConfigPath, getRegistryHost } from './client-config.js';
import { formatProgressEvent, readProgress } from './progress.js';

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

/**
 * The runtime operations replication needs. Everything that talks to the
 * Docker daemon goes through here.
 */
export interface ContainerRuntime {
  login(credentials: RegistryCredentials): Promise<void>;
  pull(reference: string, auth?: RegistryAuth): Promise<ProgressEvent[]>;
  imageExists(reference: string): Promise<boolean>;
  tag(reference: string, target: ImageReference): Promise<void>;
  /** Without `auth`, the login stored by `docker login` for the target's host is used. */
  push(target: ImageReference, auth?: RegistryAuth): Promise<ProgressEvent[]>;
}

export function toRegistryAuth(credentials: RegistryCredentials): RegistryAuth {
  return {
    username: credentials.username,
    password: credentials.password,
    serveraddress: credentials.registryUrl,
  };
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'statusCode') === 404;
}

function logProgress(event: ProgressEvent): void {
  const line = formatProgressEvent(event);
  if (line) logger.verbose(line);
}

export interface DockerRuntimeOptions {
  /** Docker client config holding `docker login` entries */
  configPath?: string;
}

export class DockerRuntime implements ContainerRuntime {
  private readonly configPath: string;

  constructor(
    private readonly docker: Docker = new Docker(),
    options: DockerRuntimeOptions = {}
  ) {
    this.configPath = options.configPath ?? getDockerConfigPath();
  }

  async login(credentials: RegistryCredentials): Promise<void> {
    logger.verbose(`Logging in to ${credentials.registryUrl} as ${credentials.username}`);
    await this.docker.checkAuth(toRegistryAuth(credentials));
  }

  async pull(reference: string, auth?: RegistryAuth): Promise<ProgressEvent[]> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(reference, auth ? { authconfig: auth } : {});
    return readProgress(stream, logProgress);
  }

  async imageExists(reference: string): Promise<boolean> {
    try {
      await this.docker.getImage(reference).inspect();
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async tag(reference: string, target: ImageReference): Promise<void> {
    await this.docker.getImage(reference).tag({ repo: target.repository, tag: target.tag });
  }

  async push(target: ImageReference, auth?: RegistryAuth): Promise<ProgressEvent[]> {
    const authconfig = auth ?? (await this.storedAuth(target.repository));
    const stream = await this.docker.getImage(target.repository).push({
      tag: target.tag,
      authconfig,
    });
    return readProgress(stream, logProgress);
  }

  private async storedAuth(repository: string): Promise<RegistryAuth> {
    const host = getRegistryHost(repository);
    const stored = await findStoredAuth(host, this.configPath);

    if (stored) {
      logger.verbose(`Using stored Docker login for ${host} (${stored.username})`);
      return stored;
    }

    logger.verbose(`No stored Docker login for ${host}, pushing anonymously`);
    return anonymousAuth(host);
  }
}
