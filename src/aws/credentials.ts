/**
 * Static AWS credentials from the shared credentials file
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { fromIni } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { CredentialsFileError, describeError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { err, ok, type Result } from '../types/registry.js';

export interface StaticCredentialsOptions {
  profile: string;
  filepath?: string;
}

export function getDefaultCredentialsPath(): string {
  return join(homedir(), '.aws', 'credentials');
}

/**
 * Read access and secret keys for one profile of ~/.aws/credentials.
 * The same file is passed as the config file so ~/.aws/config is not merged
 * in; role_arn or credential_process entries in the profile are still honoured.
 * A missing, unreadable or malformed profile comes back as an error result;
 * the caller decides whether that aborts the run.
 */
export async function loadStaticCredentials(
  options: StaticCredentialsOptions
): Promise<Result<AwsCredentialIdentity, CredentialsFileError>> {
  const filepath = options.filepath ?? getDefaultCredentialsPath();
  logger.verbose(`Reading AWS credentials profile '${options.profile}' from ${filepath}`);

  try {
    const provider = fromIni({
      profile: options.profile,
      filepath,
      configFilepath: filepath,
      ignoreCache: true,
    });
    const credentials = await provider();

    if (!credentials.accessKeyId || !credentials.secretAccessKey) {
      return err(new CredentialsFileError(options.profile, 'aws_access_key_id or aws_secret_access_key is empty'));
    }

    return ok(credentials);
  } catch (error) {
    return err(new CredentialsFileError(options.profile, describeError(error)));
  }
}
