/**
 * Custom error types for better error handling
 */

export class ReplicatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReplicatorError';
  }
}

export class InvalidRegistryUrlError extends ReplicatorError {
  url: string;

  constructor(url: string) {
    super('The source registry does not have a valid URL!');
    this.name = 'InvalidRegistryUrlError';
    this.url = url;
  }
}

export class InvalidJobError extends ReplicatorError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidJobError';
  }
}

export class JobFileError extends ReplicatorError {
  path: string;

  constructor(path: string, cause: string) {
    super(`Failed to load job file ${path}: ${cause}`);
    this.name = 'JobFileError';
    this.path = path;
  }
}

export class CredentialsFileError extends ReplicatorError {
  profile: string;

  constructor(profile: string, cause: string) {
    super(`Could not read AWS credentials for profile '${profile}': ${cause}`);
    this.name = 'CredentialsFileError';
    this.profile = profile;
  }
}

export class EcrAuthorizationError extends ReplicatorError {
  constructor(cause: string) {
    super(`Failed to obtain an ECR authorization token: ${cause}`);
    this.name = 'EcrAuthorizationError';
  }
}

export class AzureCliError extends ReplicatorError {
  registryName: string;

  constructor(registryName: string, cause: string) {
    super(`Failed to obtain an access token for ACR '${registryName}': ${cause}`);
    this.name = 'AzureCliError';
    this.registryName = registryName;
  }
}

export class ImagePullError extends ReplicatorError {
  reference: string;

  constructor(reference: string, cause: string) {
    super(`Failed to pull image ${reference}: ${cause}`);
    this.name = 'ImagePullError';
    this.reference = reference;
  }
}

export class TagImageError extends ReplicatorError {
  reference: string;

  constructor(reference: string, cause: string) {
    super(`Failed to tag image ${reference}: ${cause}`);
    this.name = 'TagImageError';
    this.reference = reference;
  }
}

export class ImagePushError extends ReplicatorError {
  reference: string;

  constructor(reference: string, cause: string) {
    super(`Failed to push image ${reference}: ${cause}`);
    this.name = 'ImagePushError';
    this.reference = reference;
  }
}

export class MissingPushCredentialsError extends ReplicatorError {
  reference: string;

  constructor(reference: string) {
    super(
      `Refusing to push ${reference} without registry credentials. ` +
      'Drop --strict-auth to push with the login stored by docker login.'
    );
    this.name = 'MissingPushCredentialsError';
    this.reference = reference;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
