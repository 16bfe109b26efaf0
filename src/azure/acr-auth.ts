/**
 * ACR authorization through `az acr login --expose-token`
 */

import { AzureCliError, describeError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { getAcrName } from '../utils/validation.js';
import { ACR_TOKEN_USERNAME } from '../types/config.js';
import type { RegistryCredentials } from '../types/registry.js';
import type { CredentialProvider } from '../auth/index.js';
import { AZURE_CLI, runCommand, type CommandRunner } from './cli.js';

export interface AcrCredentialProviderOptions {
  registryUrl: string;
  runner?: CommandRunner;
}

export function getAcrLoginArgs(acrName: string): string[] {
  return ['acr', 'login', '--name', acrName, '--expose-token'];
}

/**
 * Pull the access token out of the CLI's JSON output
 */
export function parseAccessToken(stdout: string): string | undefined {
  const parsed: unknown = JSON.parse(stdout);
  if (typeof parsed !== 'object' || parsed === null || !('accessToken' in parsed)) {
    return undefined;
  }

  const { accessToken } = parsed;
  return typeof accessToken === 'string' && accessToken.length > 0 ? accessToken : undefined;
}

export class AcrCredentialProvider implements CredentialProvider {
  readonly kind = 'azure';
  private readonly runner: CommandRunner;

  constructor(private readonly options: AcrCredentialProviderOptions) {
    this.runner = options.runner ?? runCommand;
  }

  async getCredentials(): Promise<RegistryCredentials> {
    const { registryUrl } = this.options;
    const acrName = getAcrName(registryUrl);

    logger.verbose(`Requesting ACR access token for ${acrName}`);

    let stdout: string;
    try {
      stdout = await this.runner(AZURE_CLI, getAcrLoginArgs(acrName));
    } catch (error) {
      throw new AzureCliError(acrName, describeError(error));
    }

    let accessToken: string | undefined;
    try {
      accessToken = parseAccessToken(stdout);
    } catch (error) {
      throw new AzureCliError(acrName, `invalid JSON output: ${describeError(error)}`);
    }

    if (!accessToken) {
      throw new AzureCliError(acrName, 'no accessToken in CLI output');
    }

    return {
      username: ACR_TOKEN_USERNAME,
      password: accessToken,
      registryUrl,
    };
  }
}
