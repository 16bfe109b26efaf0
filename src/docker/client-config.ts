/**
 * Logins stored by `docker login` in the Docker client config
 *
 * The daemon keeps no registry logins; the CLI writes them to
 * $DOCKER_CONFIG/config.json (default ~/.docker/config.json) and sends
 * them with every request. Only inline `auths[host].auth` entries are read;
 * logins held by a credential helper are not.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { describeError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import type { RegistryAuth } from './runtime.js';

const DOCKER_HUB_HOST = 'index.docker.io';
const DOCKER_HUB_ALIASES = new Set(['docker.io', 'registry-1.docker.io', DOCKER_HUB_HOST]);

export function getDockerConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(env.DOCKER_CONFIG ?? join(homedir(), '.docker'), 'config.json');
}

function normalizeHost(address: string): string {
  const host = address.replace(/^[a-z]+:\/\//i, '').split('/')[0].toLowerCase();
  return DOCKER_HUB_ALIASES.has(host) ? DOCKER_HUB_HOST : host;
}

/**
 * Registry host of a repository, e.g. "dest.example.com/app" -> "dest.example.com".
 * Repositories without a registry component belong to Docker Hub.
 */
export function getRegistryHost(repository: string): string {
  const slash = repository.indexOf('/');
  if (slash === -1) return DOCKER_HUB_HOST;

  const first = repository.slice(0, slash);
  const isRegistry = first === 'localhost' || first.includes('.') || first.includes(':');
  return isRegistry ? normalizeHost(first) : DOCKER_HUB_HOST;
}

function decodeAuth(auth: string, serveraddress: string): RegistryAuth | undefined {
  const decoded = Buffer.from(auth, 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator === -1) return undefined;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
    serveraddress,
  };
}

async function readConfig(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    logger.verbose(`No Docker client config read from ${configPath}: ${describeError(error)}`);
    return undefined;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    logger.warn(`Ignoring invalid Docker client config ${configPath}: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Find the stored login for a registry host, if `docker login` left one
 */
export async function findStoredAuth(
  host: string,
  configPath: string = getDockerConfigPath()
): Promise<RegistryAuth | undefined> {
  const config = await readConfig(configPath);
  const auths: unknown = typeof config === 'object' && config !== null ? Reflect.get(config, 'auths') : undefined;
  if (typeof auths !== 'object' || auths === null) return undefined;

  const wanted = normalizeHost(host);
  for (const [address, entry] of Object.entries(auths)) {
    if (normalizeHost(address) !== wanted) continue;
    if (typeof entry !== 'object' || entry === null) continue;

    const auth: unknown = Reflect.get(entry, 'auth');
    if (typeof auth === 'string' && auth.length > 0) {
      return decodeAuth(auth, host);
    }
  }

  return undefined;
}

/**
 * Auth to send when no login is stored: the Engine API wants the
 * X-Registry-Auth header on push even for anonymous registries.
 */
export function anonymousAuth(serveraddress: string): RegistryAuth {
  return { username: '', password: '', serveraddress };
}
