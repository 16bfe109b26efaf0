/**
 * Replication job parser
 *
 * Merges command-line flags over an optional replicate.yaml file and
 * validates the result into an immutable ReplicationJob.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import {
  InvalidJobError,
  InvalidRegistryUrlError,
  JobFileError,
  describeError,
} from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import {
  isValidRegistryUrl,
  normalizeSourceRegistry,
  parseImageList,
  validateAwsRegion,
} from '../utils/validation.js';
import {
  CLOUD_KINDS,
  DEFAULT_AWS_PROFILE,
  type AuthMode,
  type CloudKind,
  type JobFileDefinition,
  type ReplicateOptions,
  type ReplicationJob,
  type SourceCredentials,
} from '../types/config.js';

const STRING_KEYS = [
  'source',
  'destination',
  'cloud',
  'region',
  'auth_mode',
  'source_username',
  'source_password',
  'aws_profile',
  'aws_credentials_file',
] as const;

function isCloudKind(value: string): value is CloudKind {
  return CLOUD_KINDS.some(kind => kind === value);
}

function isAuthMode(value: string): value is AuthMode {
  return value === 'strict' || value === 'lenient';
}

/**
 * Check the parsed YAML document field by field
 */
export function parseJobDefinition(document: unknown, path: string): JobFileDefinition {
  if (document === null || document === undefined) {
    return {};
  }

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new JobFileError(path, 'expected a mapping at the top level');
  }

  const definition: JobFileDefinition = {};

  for (const key of STRING_KEYS) {
    const value: unknown = Reflect.get(document, key);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new JobFileError(path, `"${key}" must be a string`);
    }
    definition[key] = value;
  }

  const images: unknown = Reflect.get(document, 'images');
  if (images !== undefined && images !== null) {
    if (!Array.isArray(images) || !images.every((image): image is string => typeof image === 'string')) {
      throw new JobFileError(path, '"images" must be a list of image names');
    }
    definition.images = images;
  }

  return definition;
}

export async function loadJobFile(path: string): Promise<JobFileDefinition> {
  logger.verbose(`Loading job file: ${path}`);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new JobFileError(path, `Could not read file: ${describeError(error)}`);
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new JobFileError(path, `Invalid YAML: ${describeError(error)}`);
  }

  return parseJobDefinition(document, path);
}

function resolveCloud(value?: string): CloudKind | undefined {
  if (!value) return undefined;

  const normalized = value.toLowerCase();
  if (!isCloudKind(normalized)) {
    throw new InvalidJobError(`Unsupported cloud "${value}". Expected one of: ${CLOUD_KINDS.join(', ')}`);
  }
  return normalized;
}

function resolveAuthMode(strictFlag?: boolean, fileValue?: string): AuthMode {
  if (strictFlag) return 'strict';
  if (!fileValue) return 'lenient';
  if (!isAuthMode(fileValue)) {
    throw new InvalidJobError(`Invalid auth_mode "${fileValue}". Expected strict or lenient`);
  }
  return fileValue;
}

function resolveSourceCredentials(username?: string, password?: string): SourceCredentials | undefined {
  if (!username && !password) return undefined;
  if (!username || !password) {
    throw new InvalidJobError('Source registry credentials need both a username and a password');
  }
  return Object.freeze({ username, password });
}

export function buildReplicationJob(
  options: ReplicateOptions,
  file: JobFileDefinition = {},
  env: NodeJS.ProcessEnv = process.env
): ReplicationJob {
  const source = options.from ?? file.source;
  if (!source) {
    throw new InvalidJobError('A source registry is required (--from or "source" in the job file)');
  }
  if (!isValidRegistryUrl(source)) {
    throw new InvalidRegistryUrlError(source);
  }

  const destination = options.to ?? file.destination;
  if (!destination) {
    throw new InvalidJobError('A destination registry is required (--to or "destination" in the job file)');
  }

  const images = options.images !== undefined ? parseImageList(options.images) : (file.images ?? []);
  const cloud = resolveCloud(options.cloud ?? file.cloud);
  const region = options.region ?? file.region ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION;

  if (cloud === 'aws') {
    if (!region) {
      throw new InvalidJobError('An AWS region is required when --cloud is aws (--region or AWS_REGION)');
    }
    try {
      validateAwsRegion(region);
    } catch (error) {
      throw new InvalidJobError(describeError(error));
    }
  }

  return Object.freeze({
    sourceRegistry: normalizeSourceRegistry(source),
    destinationRegistry: destination,
    images: Object.freeze([...images]),
    cloud,
    region,
    verbose: options.verbose ?? false,
    authMode: resolveAuthMode(options.strictAuth, file.auth_mode),
    sourceCredentials: resolveSourceCredentials(
      options.sourceUsername ?? file.source_username,
      options.sourcePassword ?? file.source_password
    ),
    awsProfile: options.awsProfile ?? file.aws_profile ?? DEFAULT_AWS_PROFILE,
    awsCredentialsFile: options.awsCredentialsFile ?? file.aws_credentials_file,
  });
}
