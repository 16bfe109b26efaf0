/**
 * Destination registry authentication
 *
 * One provider per cloud kind, picked once per run from the job.
 */

import type { CloudKind, ReplicationJob } from '../types/config.js';
import type { RegistryCredentials } from '../types/registry.js';
import { EcrCredentialProvider } from '../aws/ecr-auth.js';
import { AcrCredentialProvider } from '../azure/acr-auth.js';
import type { CommandRunner } from '../azure/cli.js';
import { InvalidJobError } from '../utils/errors.js';

export interface CredentialProvider {
  readonly kind: CloudKind | 'none';
  getCredentials(): Promise<RegistryCredentials | undefined>;
}

/**
 * Anonymous access: pull and push run without a login
 */
export class NoCredentialProvider implements CredentialProvider {
  readonly kind = 'none';

  async getCredentials(): Promise<undefined> {
    return undefined;
  }
}

export interface CredentialProviderDeps {
  azureRunner?: CommandRunner;
}

export function createCredentialProvider(
  job: ReplicationJob,
  deps: CredentialProviderDeps = {}
): CredentialProvider {
  switch (job.cloud) {
    case 'aws':
      if (!job.region) {
        throw new InvalidJobError('An AWS region is required when --cloud is aws');
      }
      return new EcrCredentialProvider({
        registryUrl: job.destinationRegistry,
        region: job.region,
        profile: job.awsProfile,
        credentialsFile: job.awsCredentialsFile,
        authMode: job.authMode,
      });
    case 'azure':
      return new AcrCredentialProvider({
        registryUrl: job.destinationRegistry,
        runner: deps.azureRunner,
      });
    case undefined:
      return new NoCredentialProvider();
  }
}
