/**
 * ECR authorization: exchange AWS credentials for a registry login
 */

import { ECRClient, GetAuthorizationTokenCommand } from '@aws-sdk/client-ecr';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { EcrAuthorizationError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { ECR_USERNAME, type AuthMode } from '../types/config.js';
import type { RegistryCredentials } from '../types/registry.js';
import type { CredentialProvider } from '../auth/index.js';
import { loadStaticCredentials } from './credentials.js';

const TOKEN_PREFIX = `${ECR_USERNAME}:`;

export interface EcrCredentialProviderOptions {
  registryUrl: string;
  region: string;
  profile: string;
  credentialsFile?: string;
  authMode: AuthMode;
}

export function createECRClient(region: string, credentials?: AwsCredentialIdentity): ECRClient {
  return new ECRClient({ region, credentials });
}

/**
 * Decode an ECR authorization token ("AWS:<password>", base64) to its password
 */
export function decodeAuthorizationToken(token: string): string {
  const decoded = Buffer.from(token, 'base64').toString('utf-8');
  return decoded.startsWith(TOKEN_PREFIX) ? decoded.slice(TOKEN_PREFIX.length) : decoded;
}

export class EcrCredentialProvider implements CredentialProvider {
  readonly kind = 'aws';

  constructor(private readonly options: EcrCredentialProviderOptions) {}

  async getCredentials(): Promise<RegistryCredentials> {
    const { registryUrl, region, profile, credentialsFile, authMode } = this.options;

    const staticCredentials = await loadStaticCredentials({ profile, filepath: credentialsFile });
    let credentials: AwsCredentialIdentity | undefined;

    if (staticCredentials.ok) {
      credentials = staticCredentials.value;
    } else if (authMode === 'strict') {
      throw staticCredentials.error;
    } else {
      logger.warn(staticCredentials.error.message);
      logger.warn('Continuing with the default AWS credential chain');
    }

    const client = createECRClient(region, credentials);

    logger.verbose(`Requesting ECR authorization token in ${region}`);
    const response = await client.send(new GetAuthorizationTokenCommand({}));
    const authData = response.authorizationData?.[0];

    if (!authData?.authorizationToken) {
      throw new EcrAuthorizationError('no authorization data returned');
    }

    if (authData.expiresAt) {
      logger.verbose(`ECR token expires at ${authData.expiresAt.toISOString()}`);
    }

    return {
      username: ECR_USERNAME,
      password: decodeAuthorizationToken(authData.authorizationToken),
      registryUrl,
    };
  }
}
